/**
 * Archivo recibido en la subida, independiente de multer.
 */
export interface UploadedDocument {
  originalName: string;
  mimeType: string;
  size: number;
  buffer: Buffer;
}
