import {
  Inject,
  Injectable,
  Logger,
  OnApplicationShutdown,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { CleanupError } from 'src/common/errors';
import { envs } from 'src/config/envs';
import {
  DOCUMENT_STORAGE,
  DocumentStorageRepository,
} from 'src/documents/domain/repositories/document-storage.repository';
import {
  VECTOR_INDEX,
  VectorIndexRepository,
} from 'src/vector/domain/repositories/vector-index.repository';
import { IngestionService } from 'src/sessions/ingestion/ingestion.service';
import { SessionsService } from 'src/sessions/sessions.service';

export type CleanupReason = 'disconnect' | 'expired' | 'shutdown';

/**
 * Libera los recursos de una sesión en orden:
 * 1. marca la sesión como cerrada (no acepta nuevas conexiones),
 * 2. cancela y/o espera la ingesta en curso,
 * 3. borra archivos y entradas vectoriales,
 * 4. elimina la sesión del registro.
 *
 * Además barre periódicamente las sesiones que nunca se conectaron.
 */
@Injectable()
export class CleanupService
  implements OnModuleInit, OnModuleDestroy, OnApplicationShutdown
{
  private readonly logger = new Logger(CleanupService.name);
  private readonly running = new Map<string, Promise<boolean>>();
  private sweepInterval: NodeJS.Timeout | null = null;

  constructor(
    private readonly sessionsService: SessionsService,
    private readonly ingestionService: IngestionService,
    @Inject(DOCUMENT_STORAGE)
    private readonly storage: DocumentStorageRepository,
    @Inject(VECTOR_INDEX)
    private readonly vectorIndex: VectorIndexRepository,
  ) {}

  onModuleInit() {
    this.sweepInterval = setInterval(() => {
      this.sweep().catch((error: unknown) =>
        this.logger.error(
          'Error al barrer sesiones huérfanas',
          error instanceof Error ? error.stack : String(error),
        ),
      );
    }, envs.sessionSweepIntervalMs);
    this.sweepInterval.unref();
  }

  onModuleDestroy() {
    if (this.sweepInterval) {
      clearInterval(this.sweepInterval);
      this.sweepInterval = null;
    }
  }

  async onApplicationShutdown() {
    const sessions = this.sessionsService.listSessions();
    await Promise.all(
      sessions.map((session) => this.cleanupSession(session.id, 'shutdown')),
    );
  }

  /**
   * Limpia la sesión. Las llamadas concurrentes comparten la misma ejecución y
   * una sesión ya limpiada es un no-op.
   * @returns `true` si esta llamada (o la que estaba en curso) eliminó la sesión.
   */
  cleanupSession(sessionId: string, reason: CleanupReason): Promise<boolean> {
    const current = this.running.get(sessionId);
    if (current) return current;
    if (!this.sessionsService.getSession(sessionId)) {
      return Promise.resolve(false);
    }

    const execution = this.execute(sessionId, reason).finally(() => {
      this.running.delete(sessionId);
    });
    this.running.set(sessionId, execution);
    return execution;
  }

  /**
   * Elimina las sesiones sin conexión cuya última actividad supera el TTL.
   * @returns ids de las sesiones eliminadas.
   */
  async sweep(now = Date.now()): Promise<string[]> {
    const expired = this.sessionsService
      .listSessions()
      .filter(
        (session) =>
          session.connection === 'unconnected' &&
          now - session.lastActivity.getTime() > envs.sessionTtlMs,
      );
    if (!expired.length) return [];

    this.logger.log(`Sesiones huérfanas a eliminar: ${expired.length}`);
    const results = await Promise.all(
      expired.map(async (session) =>
        (await this.cleanupSession(session.id, 'expired')) ? session.id : null,
      ),
    );
    return results.filter((id): id is string => id !== null);
  }

  private async execute(
    sessionId: string,
    reason: CleanupReason,
  ): Promise<boolean> {
    // El barrido eligió la sesión fuera del lock: si se conectó entre medio, se conserva
    const closed = await this.sessionsService.markClosed(
      sessionId,
      reason === 'expired' ? { onlyIf: 'unconnected' } : {},
    );
    if (!closed && reason === 'expired') {
      this.logger.log(
        `Barrido omitido, la sesión se conectó: session=${sessionId}`,
      );
      return false;
    }

    if (envs.cancelIngestionOnCleanup) {
      const cancelled = this.ingestionService.cancelSession(sessionId);
      if (cancelled) {
        this.logger.log(
          `Ingesta cancelada: session=${sessionId} tareas=${cancelled}`,
        );
      }
    }
    // Nunca se borran archivos que un task de ingesta todavía está leyendo
    await this.ingestionService.waitForSession(sessionId);

    await this.runStep(sessionId, 'files', () =>
      this.storage.deleteSession(sessionId),
    );
    await this.runStep(sessionId, 'vectors', () =>
      this.vectorIndex.deleteSession(sessionId),
    );

    const removed = await this.sessionsService.removeSession(sessionId);
    this.logger.log(`Sesión limpiada: session=${sessionId} motivo=${reason}`);
    return removed;
  }

  private async runStep(
    sessionId: string,
    step: string,
    fn: () => Promise<void>,
  ): Promise<void> {
    try {
      await fn();
    } catch (error) {
      const cleanupError = new CleanupError(sessionId, step, { cause: error });
      this.logger.error(
        cleanupError.message,
        error instanceof Error ? error.stack : String(error),
      );
    }
  }
}
