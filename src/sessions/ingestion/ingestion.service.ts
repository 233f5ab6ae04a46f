import { Inject, Injectable, Logger } from '@nestjs/common';
import { describeError, IngestionError } from 'src/common/errors';
import { envs } from 'src/config/envs';
import {
  DOCUMENT_STORAGE,
  DocumentStorageRepository,
} from 'src/documents/domain/repositories/document-storage.repository';
import {
  PDF_REPOSITORY,
  PdfRepository,
} from 'src/pdf/domain/repositories/pdf.repository';
import {
  VECTOR_INDEX,
  VectorIndexRepository,
} from 'src/vector/domain/repositories/vector-index.repository';
import { chunkText } from 'src/vector/helpers';
import { DocumentRecord } from 'src/sessions/domain/entities/document-record.entity';
import { DocumentStatusSink } from './document-status.sink';

export const CANCELLED_REASON = 'Ingestion cancelled';

interface IngestionTask {
  controller: AbortController;
  done: Promise<void>;
}

/**
 * Ingesta en segundo plano: un task por documento, independiente de los demás.
 *
 * Los tasks quedan registrados por sesión para que la limpieza pueda
 * cancelarlos y esperar a que terminen antes de borrar archivos o vectores.
 */
@Injectable()
export class IngestionService {
  private readonly logger = new Logger(IngestionService.name);
  private readonly tasks = new Map<string, Map<string, IngestionTask>>();

  constructor(
    @Inject(DOCUMENT_STORAGE)
    private readonly storage: DocumentStorageRepository,
    @Inject(PDF_REPOSITORY)
    private readonly pdfRepository: PdfRepository,
    @Inject(VECTOR_INDEX)
    private readonly vectorIndex: VectorIndexRepository,
  ) {}

  schedule(
    sessionId: string,
    document: DocumentRecord,
    sink: DocumentStatusSink,
  ): void {
    const controller = new AbortController();
    const sessionTasks = this.tasks.get(sessionId) ?? new Map<string, IngestionTask>();
    this.tasks.set(sessionId, sessionTasks);

    const done = this.run(sessionId, document, sink, controller.signal)
      .catch((error) => {
        // run() ya registra los fallos; esto solo cubre un sink que lance
        this.logger.error(
          `Error inesperado en ingesta: session=${sessionId} doc=${document.id}`,
          error instanceof Error ? error.stack : String(error),
        );
      })
      .finally(() => {
        sessionTasks.delete(document.id);
        if (!sessionTasks.size && this.tasks.get(sessionId) === sessionTasks) {
          this.tasks.delete(sessionId);
        }
      });

    sessionTasks.set(document.id, { controller, done });
  }

  inFlight(sessionId: string): number {
    return this.tasks.get(sessionId)?.size ?? 0;
  }

  /**
   * Cancela los tasks pendientes de la sesión. Un documento cancelado
   * termina en `failed`, nunca queda en `processing`.
   */
  cancelSession(sessionId: string): number {
    const sessionTasks = this.tasks.get(sessionId);
    if (!sessionTasks) return 0;

    for (const task of sessionTasks.values()) {
      task.controller.abort(new IngestionError(CANCELLED_REASON));
    }
    return sessionTasks.size;
  }

  async waitForSession(sessionId: string): Promise<void> {
    const sessionTasks = this.tasks.get(sessionId);
    if (!sessionTasks) return;
    await Promise.allSettled([...sessionTasks.values()].map((t) => t.done));
  }

  private async run(
    sessionId: string,
    document: DocumentRecord,
    sink: DocumentStatusSink,
    signal: AbortSignal,
  ): Promise<void> {
    // Se cede el turno para que createSession retorne antes de empezar
    await Promise.resolve();
    if (!(await sink.markProcessing(sessionId, document.id))) {
      return;
    }

    let indexed = false;
    try {
      signal.throwIfAborted();
      const buffer = await this.step('Could not read stored file', () =>
        this.storage.read(document.path),
      );

      signal.throwIfAborted();
      const text = await this.step('Text extraction failed', () =>
        this.pdfRepository.extractText(buffer, signal),
      );

      const chunks = chunkText(text, envs.chunkSize, envs.chunkOverlap);
      if (!chunks.length) {
        throw new IngestionError('No extractable text found');
      }

      signal.throwIfAborted();
      await this.step('Indexing failed', () =>
        this.vectorIndex.ingest(sessionId, document.id, chunks, signal),
      );
      indexed = true;
      signal.throwIfAborted();

      await sink.markReady(sessionId, document.id);
      this.logger.log(
        `Documento listo: session=${sessionId} doc=${document.id} fragmentos=${chunks.length}`,
      );
    } catch (error) {
      const reason = signal.aborted ? CANCELLED_REASON : describeError(error);
      if (indexed) {
        await this.vectorIndex
          .deleteDocument(sessionId, document.id)
          .catch((deleteError: unknown) =>
            this.logger.error(
              `No se pudieron eliminar los vectores del documento ${document.id}: ${describeError(deleteError)}`,
            ),
          );
      }

      this.logger.warn(
        `Ingesta fallida: session=${sessionId} doc=${document.id} motivo="${reason}"`,
      );
      await sink.markFailed(sessionId, document.id, reason);
    }
  }

  private async step<T>(label: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof IngestionError) throw error;
      throw new IngestionError(`${label}: ${describeError(error)}`, {
        cause: error,
      });
    }
  }
}
