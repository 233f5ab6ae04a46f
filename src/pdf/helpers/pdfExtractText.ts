import type * as PdfJs from 'pdfjs-dist';

// En Node.js se usa el build legacy; los tipos son los mismos que el build principal
// eslint-disable-next-line @typescript-eslint/no-var-requires
const pdfjsLib: typeof PdfJs = require('pdfjs-dist/legacy/build/pdf.js');

/**
 * Extrae el texto de todas las páginas de un PDF.
 *
 * Utiliza PDF.js para procesar el buffer del PDF y concatenar el texto de cada página,
 * separando las páginas con un salto de línea. Si se recibe una señal abortada entre
 * páginas, la extracción se interrumpe con el motivo de la señal.
 *
 * @throws Error si ocurre algún problema al procesar el PDF.
 */
export const pdfExtractText = async (
  pdfBuffer: Buffer,
  signal?: AbortSignal,
): Promise<string> => {
  const loadingTask = pdfjsLib.getDocument({
    data: new Uint8Array(pdfBuffer),
    isEvalSupported: false,
    verbosity: 0,
  });

  try {
    const pdf = await loadingTask.promise;
    const pages: string[] = [];
    for (let i = 1; i <= pdf.numPages; i++) {
      signal?.throwIfAborted();
      const page = await pdf.getPage(i);
      const content = await page.getTextContent();
      const strings = content.items
        .map((item) => ('str' in item ? item.str : ''))
        .join(' ');
      pages.push(strings);
    }
    return pages.join('\n').trim();
  } finally {
    await loadingTask.destroy();
  }
};
