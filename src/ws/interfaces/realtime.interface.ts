export const CloseCode = {
  NORMAL: 1000,
  SESSION_UNKNOWN: 4404,
  SESSION_BUSY: 4409,
} as const;

export const ErrorCode = {
  INVALID_QUESTION: 4400,
  INGESTION_FAILED: 4422,
  RATE_LIMITED: 4429,
} as const;

export const NoticeCode = {
  CONNECTED: 'connected',
  STILL_PROCESSING: 'still-processing',
} as const;

export interface ServerEvents {
  answer: string;
  notice: {
    code: (typeof NoticeCode)[keyof typeof NoticeCode];
    message: string;
  };
  error: {
    code: (typeof ErrorCode)[keyof typeof ErrorCode];
    message: string;
    retryAfterSeconds?: number;
  };
  'session-closed': {
    code: (typeof CloseCode)[keyof typeof CloseCode];
    reason: string;
  };
}

/**
 * Conexión en tiempo real, independiente del transporte.
 */
export interface RealtimeChannel {
  readonly id: string;
  /** Identidad para el control de admisión (dirección de red). */
  readonly identity: string;
  /** Sesión indicada por el cliente al conectarse. */
  readonly sessionId: string | undefined;

  send<E extends Exclude<keyof ServerEvents, 'session-closed'>>(
    event: E,
    payload: ServerEvents[E],
  ): void;

  /** Notifica el código de cierre y desconecta. */
  close(
    code: ServerEvents['session-closed']['code'],
    reason: string,
  ): void;
}
