export * from './pdfExtractText';
