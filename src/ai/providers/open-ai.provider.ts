import { Injectable } from '@nestjs/common';
import OpenAI from 'openai';
import { envs } from 'src/config/envs';
import { AIProvider, NO_ANSWER_TEXT } from './ai-provider.interface';

// La API de embeddings acepta hasta 2048 entradas por solicitud
const EMBEDDING_BATCH_SIZE = 512;

@Injectable()
export class OpenAiProvider implements AIProvider {
  private client: OpenAI | null = null;

  private getClient(): OpenAI {
    if (!envs.openAiAPIKey) {
      throw new Error('OpenAI API key is not configured');
    }
    this.client ??= new OpenAI({ apiKey: envs.openAiAPIKey });
    return this.client;
  }

  async answer(
    question: string,
    context: string,
    signal?: AbortSignal,
  ): Promise<string> {
    const response = await this.getClient().responses.create(
      {
        model: envs.openAiModel,
        input: [
          {
            role: 'system',
            content: `
              You answer questions about documents uploaded by the user.
              - Answer only with information found in the context below.
              - If the answer cannot be found in the context, say "${NO_ANSWER_TEXT}"
              - Be precise, clear and concise.

              Context:
              ${context}
            `.trim(),
          },
          { role: 'user', content: question },
        ],
      },
      { signal },
    );

    return response.output_text;
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let start = 0; start < texts.length; start += EMBEDDING_BATCH_SIZE) {
      const batch = texts.slice(start, start + EMBEDDING_BATCH_SIZE);
      const response = await this.getClient().embeddings.create(
        { model: envs.openAiEmbeddingModel, input: batch },
        { signal },
      );
      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      vectors.push(...ordered.map((item) => item.embedding));
    }
    return vectors;
  }
}
