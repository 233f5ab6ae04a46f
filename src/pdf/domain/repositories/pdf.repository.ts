export const PDF_REPOSITORY = Symbol('PDF_REPOSITORY');

export interface PdfRepository {
  /**
   * Verifica que el buffer sea un PDF que se puede abrir.
   * @returns `null` si es válido, o el motivo del rechazo.
   */
  validate(pdfBuffer: Buffer): Promise<string | null>;

  extractText(pdfBuffer: Buffer, signal?: AbortSignal): Promise<string>;
}

export const PDF_MIME_TYPE = 'application/pdf';
export const PDF_MAGIC = '%PDF-';
