import { PDFDocument, StandardFonts } from 'pdf-lib';
import { PdfLibRepository } from './pdf-lib.repository';

const buildPdf = async (lines: string[]): Promise<Buffer> => {
  const pdfDoc = await PDFDocument.create();
  const font = await pdfDoc.embedFont(StandardFonts.Helvetica);
  const page = pdfDoc.addPage();
  lines.forEach((line, index) => {
    page.drawText(line, { x: 50, y: 700 - index * 20, size: 12, font });
  });
  return Buffer.from(await pdfDoc.save());
};

describe('PdfLibRepository', () => {
  const repository = new PdfLibRepository();

  describe('validate', () => {
    it('acepta un PDF válido', async () => {
      await expect(repository.validate(await buildPdf(['hola']))).resolves.toBeNull();
    });

    it('rechaza un archivo vacío', async () => {
      await expect(repository.validate(Buffer.alloc(0))).resolves.toBe(
        'File is empty',
      );
    });

    it('rechaza contenido sin cabecera PDF', async () => {
      await expect(
        repository.validate(Buffer.from('esto es texto plano')),
      ).resolves.toBe('File content is not a PDF document');
    });

    it('rechaza un PDF truncado', async () => {
      await expect(
        repository.validate(Buffer.from('%PDF-1.7\n1 0 obj\n<<')),
      ).resolves.toBe('File could not be parsed as a PDF document');
    });
  });

  describe('extractText', () => {
    it('extrae el texto de las páginas', async () => {
      const pdf = await buildPdf(['Clausula de prueba']);

      await expect(repository.extractText(pdf)).resolves.toContain(
        'Clausula de prueba',
      );
    });

    it('se interrumpe si la señal ya fue abortada', async () => {
      const pdf = await buildPdf(['texto']);
      const controller = new AbortController();
      controller.abort(new Error('cancelado'));

      await expect(repository.extractText(pdf, controller.signal)).rejects.toThrow(
        'cancelado',
      );
    });
  });
});
