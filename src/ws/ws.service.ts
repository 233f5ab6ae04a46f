import { Inject, Injectable, Logger } from '@nestjs/common';
import { AiService } from 'src/ai/ai.service';
import { describeError } from 'src/common/errors';
import { KeyedLock } from 'src/common/utils/keyed-lock';
import { envs } from 'src/config/envs';
import { RateLimiterService } from 'src/rate-limit/rate-limiter.service';
import { CleanupService } from 'src/sessions/cleanup/cleanup.service';
import {
  computeReadiness,
  ReadinessState,
  Session,
} from 'src/sessions/domain/entities/session.entity';
import { SessionsService } from 'src/sessions/sessions.service';
import {
  VECTOR_INDEX,
  VectorIndexRepository,
} from 'src/vector/domain/repositories/vector-index.repository';
import {
  CloseCode,
  ErrorCode,
  NoticeCode,
  RealtimeChannel,
} from './interfaces/realtime.interface';

export type ConnectionPhase = 'PENDING' | 'AUTHORIZED' | 'ACTIVE' | 'CLOSED';

interface ConnectedClient {
  channel: RealtimeChannel;
  phase: ConnectionPhase;
  /** Solo se asigna cuando la conexión quedó registrada en la sesión. */
  sessionId: string | null;
}

export const MAX_QUESTION_LENGTH = 4000;

export const APOLOGY_ANSWER =
  'Sorry, I could not answer your question right now. Please try again in a moment.';

export const STILL_PROCESSING_MESSAGE =
  'Your documents are still being processed. Please ask again shortly.';

/**
 * Máquina de estados del canal de preguntas y respuestas:
 * PENDING -> AUTHORIZED -> ACTIVE -> CLOSED.
 *
 * Todo lo que ocurre en una conexión (apertura y cada pregunta) se encola
 * por id de conexión, así las respuestas salen en el orden de las preguntas.
 */
@Injectable()
export class WsService {
  private logger = new Logger(WsService.name);
  private readonly connectedClients = new Map<string, ConnectedClient>();
  private readonly queue = new KeyedLock();

  constructor(
    private readonly sessionsService: SessionsService,
    private readonly cleanupService: CleanupService,
    private readonly rateLimiter: RateLimiterService,
    private readonly aiService: AiService,
    @Inject(VECTOR_INDEX)
    private readonly vectorIndex: VectorIndexRepository,
  ) {}

  /**
   * Registra un nuevo cliente.
   *
   * - Si la sesión no existe, cierra con `SESSION_UNKNOWN`.
   * - Si la sesión ya tiene una conexión activa, rechaza la nueva con `SESSION_BUSY`.
   * - En otro caso la conexión queda `ACTIVE` y se notifica el estado de los documentos.
   */
  open(channel: RealtimeChannel): Promise<ConnectionPhase> {
    const client: ConnectedClient = {
      channel,
      phase: 'PENDING',
      sessionId: null,
    };
    this.connectedClients.set(channel.id, client);

    return this.queue.run(channel.id, async () => {
      const sessionId = channel.sessionId;
      if (!sessionId || !this.sessionsService.getSession(sessionId)) {
        this.rejectUnknown(client, sessionId);
        return client.phase;
      }
      client.phase = 'AUTHORIZED';

      const attach = await this.sessionsService.attachConnection(
        sessionId,
        channel.id,
      );
      if (isClosed(client)) {
        // El cliente se fue mientras se registraba: la sesión debe liberarse igual
        if (attach === 'attached') {
          client.sessionId = sessionId;
          await this.release(client);
        }
        return client.phase;
      }
      if (attach === 'not-found') {
        this.rejectUnknown(client, sessionId);
        return client.phase;
      }
      if (attach === 'busy') {
        this.logger.warn(
          `Conexión rechazada, la sesión ya tiene un cliente: socket=${channel.id} session=${sessionId}`,
        );
        this.reject(
          client,
          CloseCode.SESSION_BUSY,
          'Session already has an active connection',
        );
        return client.phase;
      }

      client.sessionId = sessionId;
      client.phase = 'ACTIVE';

      const session = this.sessionsService.getSession(sessionId);
      channel.send('notice', {
        code: NoticeCode.CONNECTED,
        message: session
          ? describeDocuments(session)
          : 'Connected to session',
      });
      this.logger.log(
        `Cliente conectado: session=${sessionId} socket=${channel.id} activos=${this.getConnectedClients()}`,
      );
      return client.phase;
    });
  }

  handleQuestion(channelId: string, payload: unknown): Promise<void> {
    const client = this.connectedClients.get(channelId);
    if (!client) return Promise.resolve();

    return this.queue.run(channelId, () => this.answer(client, payload));
  }

  /**
   * El cliente pidió terminar la sesión: se confirma con cierre normal.
   * La limpieza la dispara la desconexión resultante.
   */
  async endSession(channelId: string): Promise<void> {
    const client = this.connectedClients.get(channelId);
    if (!client || client.phase === 'CLOSED') return;

    await this.queue.run(channelId, () => {
      client.channel.close(CloseCode.NORMAL, 'Session closed');
    });
  }

  /**
   * Desconexión (ordenada o abrupta). Si la conexión era la dueña de la
   * sesión, se liberan todos los recursos de la sesión.
   */
  async close(channelId: string): Promise<void> {
    const client = this.connectedClients.get(channelId);
    if (!client) return;

    client.phase = 'CLOSED';
    this.connectedClients.delete(channelId);
    await this.release(client);
  }

  getConnectedClients(): number {
    return this.connectedClients.size;
  }

  getPhase(channelId: string): ConnectionPhase {
    return this.connectedClients.get(channelId)?.phase ?? 'CLOSED';
  }

  private async answer(client: ConnectedClient, payload: unknown) {
    const { channel, sessionId } = client;
    if (client.phase !== 'ACTIVE' || !sessionId) return;

    const decision = await this.rateLimiter.check(channel.identity);
    if (!decision.allowed) {
      channel.send('error', {
        code: ErrorCode.RATE_LIMITED,
        message: `Too many questions. Retry in ${decision.retryAfterSeconds}s`,
        retryAfterSeconds: decision.retryAfterSeconds,
      });
      return;
    }

    const question = typeof payload === 'string' ? payload.trim() : '';
    if (!question || question.length > MAX_QUESTION_LENGTH) {
      channel.send('error', {
        code: ErrorCode.INVALID_QUESTION,
        message: `Question must be a non-empty text of at most ${MAX_QUESTION_LENGTH} characters`,
      });
      return;
    }

    const session = this.sessionsService.getSession(sessionId);
    if (!session || !(await this.sessionsService.touch(sessionId))) {
      this.reject(client, CloseCode.SESSION_UNKNOWN, 'Session unknown');
      return;
    }

    const readiness = await this.resolveReadiness(session);
    if (isClosed(client)) return;

    if (readiness === 'pending') {
      channel.send('notice', {
        code: NoticeCode.STILL_PROCESSING,
        message: STILL_PROCESSING_MESSAGE,
      });
      return;
    }
    if (readiness === 'failed') {
      channel.send('error', {
        code: ErrorCode.INGESTION_FAILED,
        message: `None of your documents could be processed. ${describeFailures(session)}`,
      });
      return;
    }

    try {
      const context = await this.vectorIndex.query(sessionId, question);
      const answer = await this.aiService.answer(question, context);
      channel.send('answer', answer);
    } catch (error) {
      this.logger.error(
        `No se pudo responder la pregunta: session=${sessionId} error=${describeError(error)}`,
      );
      channel.send('answer', APOLOGY_ANSWER);
    }
  }

  private async release(client: ConnectedClient) {
    const sessionId = client.sessionId;
    if (!sessionId) return;

    this.logger.log(
      `Cliente desconectado: session=${sessionId} socket=${client.channel.id}`,
    );
    const closed = await this.sessionsService.markClosed(sessionId, {
      connectionId: client.channel.id,
    });
    if (closed) {
      await this.cleanupService.cleanupSession(sessionId, 'disconnect');
    }
  }

  private async resolveReadiness(session: Session): Promise<ReadinessState> {
    const readiness = computeReadiness(session.documents);
    if (readiness !== 'pending') return readiness;

    try {
      return await this.sessionsService.waitForReadiness(
        session.id,
        envs.readinessTimeoutMs,
      );
    } catch (error) {
      this.logger.warn(
        `La sesión ${session.id} dejó de existir mientras se esperaba: ${describeError(error)}`,
      );
      return 'pending';
    }
  }

  private rejectUnknown(client: ConnectedClient, sessionId: string | undefined) {
    this.logger.warn(
      `Conexión rechazada, sesión desconocida: socket=${client.channel.id} session=${sessionId ?? '-'}`,
    );
    this.reject(client, CloseCode.SESSION_UNKNOWN, 'Session unknown');
  }

  private reject(
    client: ConnectedClient,
    code: (typeof CloseCode)[keyof typeof CloseCode],
    reason: string,
  ) {
    client.phase = 'CLOSED';
    client.channel.close(code, reason);
  }
}

// La fase puede cambiar durante un await (desconexión concurrente)
const isClosed = (client: ConnectedClient): boolean =>
  client.phase === 'CLOSED';

const describeDocuments = (session: Session): string => {
  const counts = { queued: 0, processing: 0, ready: 0, failed: 0 };
  for (const document of session.documents) {
    counts[document.status]++;
  }
  return `Connected. Documents ready: ${counts.ready}/${session.documents.length}, failed: ${counts.failed}`;
};

const describeFailures = (session: Session): string =>
  session.documents
    .filter((d) => d.status === 'failed')
    .map((d) => `${d.originalName}: ${d.failureReason ?? 'unknown error'}`)
    .join('; ');
