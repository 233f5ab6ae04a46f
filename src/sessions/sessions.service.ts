import { Inject, Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import * as path from 'path';
import { BehaviorSubject, filter, firstValueFrom, of, timeout } from 'rxjs';
import {
  describeError,
  FileRejection,
  SessionNotFoundException,
  UploadValidationException,
} from 'src/common/errors';
import { envs } from 'src/config/envs';
import {
  DOCUMENT_STORAGE,
  DocumentStorageRepository,
} from 'src/documents/domain/repositories/document-storage.repository';
import {
  PDF_MIME_TYPE,
  PDF_REPOSITORY,
  PdfRepository,
} from 'src/pdf/domain/repositories/pdf.repository';
import {
  canTransition,
  DocumentRecord,
  DocumentStatus,
} from './domain/entities/document-record.entity';
import {
  computeReadiness,
  ConnectionState,
  ReadinessState,
  Session,
} from './domain/entities/session.entity';
import { UploadedDocument } from './dto/uploaded-document.dto';
import { DocumentStatusSink } from './ingestion/document-status.sink';
import { IngestionService } from './ingestion/ingestion.service';
import { SessionStore } from './session.store';

export type AttachResult = 'attached' | 'not-found' | 'busy';

export interface MarkClosedOptions {
  connectionId?: string;
  onlyIf?: ConnectionState;
}

@Injectable()
export class SessionsService implements DocumentStatusSink {
  private readonly logger = new Logger(SessionsService.name);

  constructor(
    private readonly store: SessionStore,
    private readonly ingestionService: IngestionService,
    @Inject(DOCUMENT_STORAGE)
    private readonly storage: DocumentStorageRepository,
    @Inject(PDF_REPOSITORY)
    private readonly pdfRepository: PdfRepository,
  ) {}

  /**
   * Crea una sesión a partir de los archivos subidos.
   *
   * - Valida todos los archivos antes de guardar nada; si alguno falla se lanza
   *   `UploadValidationException` con el motivo de cada archivo rechazado.
   * - Guarda los bytes, registra los documentos como `queued` y agenda su ingesta.
   * - Retorna sin esperar la ingesta.
   */
  async createSession(files: UploadedDocument[]): Promise<Session> {
    if (!files.length) {
      throw new UploadValidationException([], 'No files were provided');
    }

    const rejections: FileRejection[] = [];
    for (const file of files) {
      const error = await this.validateFile(file);
      if (error) {
        rejections.push({ filename: file.originalName || 'Unknown', error });
      }
    }
    if (rejections.length) {
      this.logger.warn(
        `Subida rechazada: ${rejections.length}/${files.length} archivos no válidos`,
      );
      throw new UploadValidationException(rejections);
    }

    const sessionId = randomUUID();
    const documents: DocumentRecord[] = [];
    try {
      for (const file of files) {
        const stored = await this.storage.save(
          sessionId,
          file.originalName,
          file.buffer,
        );
        documents.push({
          id: randomUUID(),
          originalName: file.originalName,
          savedName: stored.savedName,
          path: stored.path,
          size: stored.size,
          status: 'queued',
          updatedAt: new Date(),
        });
      }
    } catch (error) {
      await this.storage.deleteSession(sessionId).catch((cleanupError: unknown) =>
        this.logger.error(
          `No se pudieron eliminar los archivos de la subida fallida ${sessionId}: ${describeError(cleanupError)}`,
        ),
      );
      throw error;
    }

    const now = new Date();
    const session: Session = {
      id: sessionId,
      createdAt: now,
      lastActivity: now,
      documents,
      connection: 'unconnected',
      connectionId: null,
      readiness$: new BehaviorSubject<ReadinessState>('pending'),
    };
    this.store.add(session);
    this.logger.log(
      `Sesión creada: session=${sessionId} documentos=${documents.length}`,
    );

    for (const document of documents) {
      this.ingestionService.schedule(sessionId, document, this);
    }
    return session;
  }

  getSession(sessionId: string): Session | undefined {
    return this.store.get(sessionId);
  }

  getSessionOrFail(sessionId: string): Session {
    const session = this.store.get(sessionId);
    if (!session) {
      throw new SessionNotFoundException(sessionId);
    }
    return session;
  }

  listSessions(): Session[] {
    return this.store.values();
  }

  markProcessing(sessionId: string, documentId: string): Promise<boolean> {
    return this.transition(sessionId, documentId, 'processing');
  }

  markReady(sessionId: string, documentId: string): Promise<boolean> {
    return this.transition(sessionId, documentId, 'ready');
  }

  markFailed(
    sessionId: string,
    documentId: string,
    reason: string,
  ): Promise<boolean> {
    return this.transition(sessionId, documentId, 'failed', reason);
  }

  touch(sessionId: string): Promise<boolean> {
    return this.store.withSession(sessionId, (session) => {
      if (!session) return false;
      session.lastActivity = new Date();
      return true;
    });
  }

  /**
   * Asocia una conexión en tiempo real a la sesión. Solo se admite una
   * conexión activa por sesión; una sesión cerrada ya no acepta conexiones.
   */
  attachConnection(
    sessionId: string,
    connectionId: string,
  ): Promise<AttachResult> {
    return this.store.withSession(sessionId, (session) => {
      if (!session || session.connection === 'closed') return 'not-found';
      if (session.connection === 'connected') return 'busy';

      session.connection = 'connected';
      session.connectionId = connectionId;
      session.lastActivity = new Date();
      return 'attached';
    });
  }

  /**
   * Marca la sesión como cerrada. Con `connectionId` solo la conexión dueña
   * puede cerrarla; con `onlyIf` solo se cierra si el estado de conexión
   * coincide al tomar el lock. Sin opciones se cierra incondicionalmente.
   */
  markClosed(
    sessionId: string,
    options: MarkClosedOptions = {},
  ): Promise<boolean> {
    return this.store.withSession(sessionId, (session) => {
      if (!session) return false;
      if (options.connectionId && session.connectionId !== options.connectionId) {
        return false;
      }
      if (options.onlyIf && session.connection !== options.onlyIf) return false;

      session.connection = 'closed';
      session.connectionId = null;
      return true;
    });
  }

  /**
   * Espera hasta que la sesión deje de estar `pending` o venza el plazo.
   * Retorna el estado observado; `pending` indica que venció el plazo.
   */
  async waitForReadiness(
    sessionId: string,
    timeoutMs = envs.readinessTimeoutMs,
  ): Promise<ReadinessState> {
    const session = this.store.get(sessionId);
    if (!session) {
      throw new SessionNotFoundException(sessionId);
    }

    return firstValueFrom(
      session.readiness$.pipe(
        filter((state) => state !== 'pending'),
        timeout({ first: timeoutMs, with: () => of<ReadinessState>('pending') }),
      ),
      { defaultValue: 'pending' },
    );
  }

  async removeSession(sessionId: string): Promise<boolean> {
    const session = await this.store.delete(sessionId);
    if (!session) return false;

    session.readiness$.complete();
    this.logger.log(`Sesión eliminada: session=${sessionId}`);
    return true;
  }

  private transition(
    sessionId: string,
    documentId: string,
    to: DocumentStatus,
    reason?: string,
  ): Promise<boolean> {
    return this.store.withSession(sessionId, (session) => {
      const document = session?.documents.find((d) => d.id === documentId);
      if (!session || !document) return false;

      if (!canTransition(document.status, to)) {
        this.logger.warn(
          `Transición no permitida: doc=${documentId} ${document.status} -> ${to}`,
        );
        return false;
      }

      document.status = to;
      document.updatedAt = new Date();
      if (to === 'failed') {
        document.failureReason = reason;
      }

      const readiness = computeReadiness(session.documents);
      if (readiness !== session.readiness$.getValue()) {
        session.readiness$.next(readiness);
      }
      return true;
    });
  }

  private async validateFile(file: UploadedDocument): Promise<string | null> {
    if (!file.originalName) {
      return 'Filename is missing';
    }
    if (file.size > envs.maxFileSizeBytes) {
      const sizeMb = (file.size / (1024 * 1024)).toFixed(2);
      const limitMb = envs.maxFileSizeBytes / (1024 * 1024);
      return `File size ${sizeMb}MB exceeds the limit of ${limitMb}MB`;
    }
    if (
      path.extname(file.originalName).toLowerCase() !== '.pdf' ||
      file.mimeType !== PDF_MIME_TYPE
    ) {
      return `Invalid file type. Only PDF files are allowed (got ${file.mimeType || 'unknown'})`;
    }
    return this.pdfRepository.validate(file.buffer);
  }
}
