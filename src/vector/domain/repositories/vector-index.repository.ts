export const VECTOR_INDEX = Symbol('VECTOR_INDEX');

export interface VectorIndexRepository {
  /**
   * Indexa los fragmentos de un documento. Las entradas quedan asociadas a la
   * sesión y al documento; si la operación falla o se cancela no queda ninguna.
   */
  ingest(
    sessionId: string,
    documentId: string,
    chunks: string[],
    signal?: AbortSignal,
  ): Promise<void>;

  /**
   * Recupera el contexto más relevante para la pregunta, solo entre las
   * entradas de la sesión. Retorna cadena vacía si la sesión no tiene entradas.
   */
  query(sessionId: string, question: string, topK?: number): Promise<string>;

  deleteDocument(sessionId: string, documentId: string): Promise<void>;

  deleteSession(sessionId: string): Promise<void>;
}
