import { Logger } from '@nestjs/common';
import { PDFDocument } from 'pdf-lib';
import {
  PDF_MAGIC,
  PdfRepository,
} from 'src/pdf/domain/repositories/pdf.repository';
import { pdfExtractText } from 'src/pdf/helpers';

// ? Basado en la doc: https://pdf-lib.js.org/ - PDFDocument.load
export class PdfLibRepository implements PdfRepository {
  logger = new Logger('PdfLibRepository');

  /**
   * Valida la cabecera `%PDF-` y que pdf-lib pueda cargar el documento.
   * Los PDF cifrados se aceptan: solo se necesita leer su texto.
   */
  async validate(pdfBuffer: Buffer): Promise<string | null> {
    if (!pdfBuffer.length) {
      return 'File is empty';
    }
    if (pdfBuffer.subarray(0, 1024).indexOf(PDF_MAGIC) === -1) {
      return 'File content is not a PDF document';
    }

    try {
      const pdfDoc = await PDFDocument.load(pdfBuffer, {
        ignoreEncryption: true,
        updateMetadata: false,
      });
      if (pdfDoc.getPageCount() === 0) {
        return 'PDF document has no pages';
      }
      return null;
    } catch (error) {
      this.logger.warn(`PDF no válido: ${error}`);
      return 'File could not be parsed as a PDF document';
    }
  }

  extractText(pdfBuffer: Buffer, signal?: AbortSignal): Promise<string> {
    return pdfExtractText(pdfBuffer, signal);
  }
}
