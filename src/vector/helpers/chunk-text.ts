/**
 * Divide el texto en ventanas de `size` caracteres que se solapan `overlap`
 * caracteres. Intenta cortar en un espacio para no partir palabras.
 */
export const chunkText = (
  text: string,
  size: number,
  overlap: number,
): string[] => {
  if (overlap >= size) {
    throw new Error('Chunk overlap must be smaller than chunk size');
  }

  const normalized = text.replace(/\s+/g, ' ').trim();
  if (!normalized) return [];
  if (normalized.length <= size) return [normalized];

  const chunks: string[] = [];
  let start = 0;
  while (start < normalized.length) {
    let end = Math.min(start + size, normalized.length);
    if (end < normalized.length) {
      const lastSpace = normalized.lastIndexOf(' ', end);
      if (lastSpace > start + overlap) {
        end = lastSpace;
      }
    }

    const chunk = normalized.slice(start, end).trim();
    if (chunk) chunks.push(chunk);
    if (end >= normalized.length) break;

    start = end - overlap;
  }
  return chunks;
};
