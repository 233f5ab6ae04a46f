import { Injectable, Logger } from '@nestjs/common';
import { AiService } from 'src/ai/ai.service';
import { envs } from 'src/config/envs';
import { VectorIndexRepository } from 'src/vector/domain/repositories/vector-index.repository';
import { cosineSimilarity } from 'src/vector/helpers';

interface VectorEntry {
  documentId: string;
  text: string;
  embedding: number[];
}

/**
 * Índice vectorial efímero en memoria, una colección por sesión.
 * Los embeddings se calculan con el proveedor de IA configurado.
 */
@Injectable()
export class InMemoryVectorIndexRepository implements VectorIndexRepository {
  private readonly logger = new Logger(InMemoryVectorIndexRepository.name);
  private readonly collections = new Map<string, VectorEntry[]>();

  constructor(private readonly aiService: AiService) {}

  async ingest(
    sessionId: string,
    documentId: string,
    chunks: string[],
    signal?: AbortSignal,
  ): Promise<void> {
    if (!chunks.length) return;

    const embeddings = await this.aiService.embed(chunks, signal);
    signal?.throwIfAborted();
    if (embeddings.length !== chunks.length) {
      throw new Error(
        `Expected ${chunks.length} embeddings, received ${embeddings.length}`,
      );
    }

    // Se insertan todas juntas para no dejar documentos a medio indexar
    const entries = chunks.map((text, i) => ({
      documentId,
      text,
      embedding: embeddings[i],
    }));
    const collection = this.collections.get(sessionId) ?? [];
    collection.push(...entries);
    this.collections.set(sessionId, collection);

    this.logger.log(
      `Documento indexado: session=${sessionId} doc=${documentId} fragmentos=${entries.length}`,
    );
  }

  async query(
    sessionId: string,
    question: string,
    topK = envs.retrievalTopK,
  ): Promise<string> {
    const collection = this.collections.get(sessionId);
    if (!collection?.length) return '';

    const [questionEmbedding] = await this.aiService.embed([question]);
    return collection
      .map((entry) => ({
        entry,
        score: cosineSimilarity(questionEmbedding, entry.embedding),
      }))
      .sort((a, b) => b.score - a.score)
      .slice(0, topK)
      .map(({ entry }) => entry.text)
      .join('\n\n');
  }

  async deleteDocument(sessionId: string, documentId: string): Promise<void> {
    const collection = this.collections.get(sessionId);
    if (!collection) return;

    const remaining = collection.filter((e) => e.documentId !== documentId);
    if (remaining.length) {
      this.collections.set(sessionId, remaining);
    } else {
      this.collections.delete(sessionId);
    }
  }

  async deleteSession(sessionId: string): Promise<void> {
    if (this.collections.delete(sessionId)) {
      this.logger.log(`Entradas vectoriales eliminadas: session=${sessionId}`);
    }
  }

  countEntries(sessionId: string): number {
    return this.collections.get(sessionId)?.length ?? 0;
  }
}
