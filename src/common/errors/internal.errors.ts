/**
 * Errores que nunca llegan al cliente como respuesta HTTP: se registran
 * en el estado del documento, se traducen a texto o solo se loguean.
 */
abstract class CausedError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Falla de extracción o indexación de un documento. */
export class IngestionError extends CausedError {}

/** Falla del backend de razonamiento o del índice vectorial durante una pregunta. */
export class UpstreamError extends CausedError {}

/** Falla parcial al liberar recursos de una sesión. */
export class CleanupError extends CausedError {
  constructor(
    readonly sessionId: string,
    readonly step: string,
    options?: { cause?: unknown },
  ) {
    super(`Cleanup step "${step}" failed for session ${sessionId}`, options);
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
