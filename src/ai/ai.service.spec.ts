import { UpstreamError } from 'src/common/errors';
import { AiService } from './ai.service';
import { AIProvider } from './providers/ai-provider.interface';

const createService = () => {
  const provider: jest.Mocked<AIProvider> = {
    answer: jest.fn(),
    embed: jest.fn(),
  };
  return { service: new AiService(provider), provider };
};

describe('AiService', () => {
  it('retorna la respuesta del proveedor sin espacios sobrantes', async () => {
    const { service, provider } = createService();
    provider.answer.mockResolvedValue('  El plazo es de 30 días.\n');

    await expect(service.answer('¿Plazo?', 'contexto')).resolves.toBe(
      'El plazo es de 30 días.',
    );
    expect(provider.answer).toHaveBeenCalledWith('¿Plazo?', 'contexto');
  });

  it('envuelve los fallos del proveedor en UpstreamError', async () => {
    const { service, provider } = createService();
    const cause = new Error('503 Service Unavailable');
    provider.answer.mockRejectedValue(cause);

    const error = await service.answer('q', 'c').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UpstreamError);
    expect(error).toMatchObject({ message: 'Reasoning backend failed', cause });
  });

  it('delega los embeddings con la señal de cancelación', async () => {
    const { service, provider } = createService();
    const signal = new AbortController().signal;
    provider.embed.mockResolvedValue([[1, 0]]);

    await expect(service.embed(['a'], signal)).resolves.toEqual([[1, 0]]);
    expect(provider.embed).toHaveBeenCalledWith(['a'], signal);
  });
});
