/**
 * Receptor de las transiciones de estado que reporta la ingesta.
 * Cada método retorna `false` si la transición no se aplicó
 * (sesión eliminada o transición no permitida).
 */
export interface DocumentStatusSink {
  markProcessing(sessionId: string, documentId: string): Promise<boolean>;
  markReady(sessionId: string, documentId: string): Promise<boolean>;
  markFailed(
    sessionId: string,
    documentId: string,
    reason: string,
  ): Promise<boolean>;
}
