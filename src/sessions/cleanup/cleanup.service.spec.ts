jest.mock('src/config/envs', () => ({
  envs: {
    maxFileSizeBytes: 1024 * 1024,
    readinessTimeoutMs: 50,
    chunkSize: 1000,
    chunkOverlap: 100,
    sessionTtlMs: 1_000,
    sessionSweepIntervalMs: 60_000,
    cancelIngestionOnCleanup: true,
  },
}));

import { envs } from 'src/config/envs';
import { DocumentStorageRepository } from 'src/documents/domain/repositories/document-storage.repository';
import { PdfRepository } from 'src/pdf/domain/repositories/pdf.repository';
import { VectorIndexRepository } from 'src/vector/domain/repositories/vector-index.repository';
import { Session } from 'src/sessions/domain/entities/session.entity';
import { UploadedDocument } from 'src/sessions/dto/uploaded-document.dto';
import { CANCELLED_REASON, IngestionService } from 'src/sessions/ingestion/ingestion.service';
import { SessionStore } from 'src/sessions/session.store';
import { SessionsService } from 'src/sessions/sessions.service';
import { CleanupService } from './cleanup.service';

const pdf = (originalName: string): UploadedDocument => ({
  originalName,
  mimeType: 'application/pdf',
  size: 8,
  buffer: Buffer.from('%PDF-1.4'),
});

describe('CleanupService', () => {
  let storage: jest.Mocked<DocumentStorageRepository>;
  let pdfRepository: jest.Mocked<PdfRepository>;
  let vectorIndex: jest.Mocked<VectorIndexRepository>;
  let sessionsService: SessionsService;
  let service: CleanupService;
  let events: string[];

  beforeEach(() => {
    events = [];
    storage = {
      save: jest.fn(
        async (sessionId: string, originalName: string, _content: Buffer) => ({
          savedName: originalName,
          path: `/uploads/${sessionId}/${originalName}`,
          size: 8,
        }),
      ),
      read: jest.fn().mockResolvedValue(Buffer.from('%PDF-1.4')),
      deleteSession: jest.fn(async (_sessionId: string) => {
        events.push('files');
      }),
    };
    pdfRepository = {
      validate: jest.fn().mockResolvedValue(null),
      extractText: jest.fn().mockResolvedValue('texto del documento'),
    };
    vectorIndex = {
      ingest: jest.fn().mockResolvedValue(undefined),
      query: jest.fn(),
      deleteDocument: jest.fn().mockResolvedValue(undefined),
      deleteSession: jest.fn(async (_sessionId: string) => {
        events.push('vectors');
      }),
    };

    const ingestionService = new IngestionService(
      storage,
      pdfRepository,
      vectorIndex,
    );
    sessionsService = new SessionsService(
      new SessionStore(),
      ingestionService,
      storage,
      pdfRepository,
    );
    service = new CleanupService(
      sessionsService,
      ingestionService,
      storage,
      vectorIndex,
    );
  });

  afterEach(() => {
    envs.cancelIngestionOnCleanup = true;
    jest.useRealTimers();
  });

  const createSession = (): Promise<Session> =>
    sessionsService.createSession([pdf('a.pdf')]);

  describe('cleanupSession', () => {
    it('borra archivos y vectores y elimina la sesión', async () => {
      const session = await createSession();

      await expect(service.cleanupSession(session.id, 'disconnect')).resolves.toBe(
        true,
      );

      expect(storage.deleteSession).toHaveBeenCalledWith(session.id);
      expect(vectorIndex.deleteSession).toHaveBeenCalledWith(session.id);
      expect(events).toEqual(['files', 'vectors']);
      expect(sessionsService.getSession(session.id)).toBeUndefined();
    });

    it('es idempotente', async () => {
      const session = await createSession();
      await service.cleanupSession(session.id, 'disconnect');

      await expect(service.cleanupSession(session.id, 'expired')).resolves.toBe(
        false,
      );
      expect(storage.deleteSession).toHaveBeenCalledTimes(1);
    });

    it('comparte la ejecución entre llamadas concurrentes', async () => {
      const session = await createSession();

      const results = await Promise.all([
        service.cleanupSession(session.id, 'disconnect'),
        service.cleanupSession(session.id, 'expired'),
      ]);

      expect(results).toEqual([true, true]);
      expect(storage.deleteSession).toHaveBeenCalledTimes(1);
      expect(vectorIndex.deleteSession).toHaveBeenCalledTimes(1);
    });

    it('cierra la sesión antes de liberar recursos', async () => {
      const session = await createSession();

      const cleanup = service.cleanupSession(session.id, 'disconnect');
      await expect(
        sessionsService.attachConnection(session.id, 'c1'),
      ).resolves.toBe('not-found');
      await cleanup;
    });

    it('cancela la ingesta en curso y espera a que termine antes de borrar', async () => {
      pdfRepository.extractText.mockImplementation(
        (_buffer: Buffer, signal?: AbortSignal) =>
          new Promise<string>((_resolve, reject) => {
            signal?.addEventListener('abort', () =>
              reject(new Error('aborted')),
            );
          }),
      );
      const session = await createSession();
      const [document] = session.documents;
      storage.deleteSession.mockImplementation(async () => {
        events.push(`files:${document.status}`);
      });

      await service.cleanupSession(session.id, 'disconnect');

      expect(document.status).toBe('failed');
      expect(document.failureReason).toBe(CANCELLED_REASON);
      expect(events).toEqual(['files:failed', 'vectors']);
    });

    it('sin cancelación espera a que la ingesta termine', async () => {
      envs.cancelIngestionOnCleanup = false;
      const session = await createSession();
      const [document] = session.documents;
      storage.deleteSession.mockImplementation(async () => {
        events.push(`files:${document.status}`);
      });

      await service.cleanupSession(session.id, 'disconnect');

      expect(events).toEqual(['files:ready', 'vectors']);
    });

    it('continúa con los demás pasos si uno falla', async () => {
      const session = await createSession();
      storage.deleteSession.mockRejectedValueOnce(new Error('EACCES'));

      await expect(service.cleanupSession(session.id, 'disconnect')).resolves.toBe(
        true,
      );

      expect(vectorIndex.deleteSession).toHaveBeenCalledWith(session.id);
      expect(sessionsService.getSession(session.id)).toBeUndefined();
    });
  });

  describe('sweep', () => {
    it('elimina solo las sesiones sin conexión que superaron el TTL', async () => {
      const now = Date.now();
      const stale = await createSession();
      const fresh = await createSession();
      const connected = await createSession();
      stale.lastActivity = new Date(now - 5_000);
      connected.lastActivity = new Date(now - 5_000);
      await sessionsService.attachConnection(connected.id, 'c1');
      connected.lastActivity = new Date(now - 5_000);

      await expect(service.sweep(now)).resolves.toEqual([stale.id]);

      expect(sessionsService.getSession(stale.id)).toBeUndefined();
      expect(sessionsService.getSession(fresh.id)).toBe(fresh);
      expect(sessionsService.getSession(connected.id)).toBe(connected);
    });

    it('conserva la sesión que se conecta mientras el barrido la elige', async () => {
      const now = Date.now();
      const session = await createSession();
      session.lastActivity = new Date(now - 5_000);

      const [attached, swept] = await Promise.all([
        sessionsService.attachConnection(session.id, 'c1'),
        service.sweep(now),
      ]);

      expect(attached).toBe('attached');
      expect(swept).toEqual([]);
      expect(sessionsService.getSession(session.id)).toBe(session);
      expect(session.connection).toBe('connected');
      expect(storage.deleteSession).not.toHaveBeenCalled();
      expect(vectorIndex.deleteSession).not.toHaveBeenCalled();
    });

    it('se ejecuta periódicamente hasta que se detiene el módulo', () => {
      jest.useFakeTimers();
      const sweep = jest.spyOn(service, 'sweep').mockResolvedValue([]);

      service.onModuleInit();
      jest.advanceTimersByTime(60_000);
      expect(sweep).toHaveBeenCalledTimes(1);

      service.onModuleDestroy();
      jest.advanceTimersByTime(120_000);
      expect(sweep).toHaveBeenCalledTimes(1);
    });
  });

  it('al apagar la aplicación limpia todas las sesiones', async () => {
    await createSession();
    await createSession();

    await service.onApplicationShutdown();

    expect(sessionsService.listSessions()).toEqual([]);
    expect(storage.deleteSession).toHaveBeenCalledTimes(2);
  });
});
