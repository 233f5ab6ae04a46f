import { chunkText } from './chunk-text';
import { cosineSimilarity } from './cosine-similarity';

describe('chunkText', () => {
  it('retorna un solo fragmento si el texto cabe', () => {
    expect(chunkText('  hola \n\n mundo ', 100, 10)).toEqual(['hola mundo']);
  });

  it('retorna arreglo vacío para texto en blanco', () => {
    expect(chunkText(' \n\t ', 100, 10)).toEqual([]);
  });

  it('divide en ventanas solapadas cortando en espacios', () => {
    expect(chunkText('uno dos tres cuatro cinco', 10, 3)).toEqual([
      'uno dos',
      'dos tres',
      'res cuatro',
      'tro cinco',
    ]);
  });

  it('corta palabras largas sin espacios', () => {
    expect(chunkText('abcdefghij', 4, 1)).toEqual(['abcd', 'defg', 'ghij']);
  });

  it('exige un solapamiento menor al tamaño', () => {
    expect(() => chunkText('texto', 10, 10)).toThrow(
      'Chunk overlap must be smaller than chunk size',
    );
  });
});

describe('cosineSimilarity', () => {
  it('calcula la similitud entre vectores', () => {
    expect(cosineSimilarity([1, 0], [1, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it('falla con dimensiones distintas', () => {
    expect(() => cosineSimilarity([1], [1, 2])).toThrow(
      'Vector dimensions differ: 1 vs 2',
    );
  });
});
