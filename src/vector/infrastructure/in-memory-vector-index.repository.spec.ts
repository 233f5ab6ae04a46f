jest.mock('src/config/envs', () => ({
  envs: { retrievalTopK: 2 },
}));

import { AiService } from 'src/ai/ai.service';
import { InMemoryVectorIndexRepository } from './in-memory-vector-index.repository';

// Embedding determinista: una dimensión por palabra clave
const KEYWORDS = ['pago', 'plazo', 'garantía'];
const fakeEmbed = async (texts: string[]) =>
  texts.map((text) => KEYWORDS.map((k) => (text.includes(k) ? 1 : 0)));

const createIndex = () => {
  const aiService = {
    embed: jest.fn(fakeEmbed),
  };
  const index = new InMemoryVectorIndexRepository(
    aiService as unknown as AiService,
  );
  return { index, aiService };
};

describe('InMemoryVectorIndexRepository', () => {
  it('recupera los fragmentos más parecidos de la sesión', async () => {
    const { index } = createIndex();
    await index.ingest('s1', 'd1', [
      'el pago se realiza mensual',
      'la garantía cubre un año',
      'el plazo es de 30 días',
    ]);

    await expect(index.query('s1', '¿cuál es el plazo?', 1)).resolves.toBe(
      'el plazo es de 30 días',
    );
  });

  it('usa el top-k configurado por defecto', async () => {
    const { index } = createIndex();
    await index.ingest('s1', 'd1', ['pago', 'plazo', 'garantía']);

    const context = await index.query('s1', 'pago y plazo');
    expect(context.split('\n\n')).toHaveLength(2);
  });

  it('no mezcla entradas de otras sesiones', async () => {
    const { index } = createIndex();
    await index.ingest('s1', 'd1', ['el plazo de s1']);
    await index.ingest('s2', 'd2', ['el plazo de s2']);

    await expect(index.query('s2', 'plazo', 5)).resolves.toBe('el plazo de s2');
  });

  it('retorna contexto vacío sin consultar embeddings si no hay entradas', async () => {
    const { index, aiService } = createIndex();

    await expect(index.query('vacía', 'plazo')).resolves.toBe('');
    expect(aiService.embed).not.toHaveBeenCalled();
  });

  it('no deja entradas si la ingesta se cancela', async () => {
    const { index } = createIndex();
    const controller = new AbortController();
    controller.abort(new Error('cancelado'));

    await expect(
      index.ingest('s1', 'd1', ['pago'], controller.signal),
    ).rejects.toThrow('cancelado');
    expect(index.countEntries('s1')).toBe(0);
  });

  it('elimina entradas por documento y por sesión', async () => {
    const { index } = createIndex();
    await index.ingest('s1', 'd1', ['pago']);
    await index.ingest('s1', 'd2', ['plazo', 'garantía']);

    await index.deleteDocument('s1', 'd1');
    expect(index.countEntries('s1')).toBe(2);

    await index.deleteSession('s1');
    await index.deleteSession('s1');
    expect(index.countEntries('s1')).toBe(0);
  });
});
