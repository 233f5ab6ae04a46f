export const DOCUMENT_STORAGE = Symbol('DOCUMENT_STORAGE');

export interface StoredFile {
  /** Nombre con el que se guardó el archivo (`<nombre>_<uuid>.pdf`). */
  savedName: string;
  path: string;
  size: number;
}

export interface DocumentStorageRepository {
  /**
   * Guarda los bytes de un documento bajo el directorio de la sesión.
   */
  save(
    sessionId: string,
    originalName: string,
    content: Buffer,
  ): Promise<StoredFile>;

  read(path: string): Promise<Buffer>;

  /**
   * Elimina todos los archivos de la sesión. No falla si ya no existen.
   */
  deleteSession(sessionId: string): Promise<void>;
}
