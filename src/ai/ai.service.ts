import { Inject, Injectable, Logger } from '@nestjs/common';
import { UpstreamError } from 'src/common/errors';
import { AI_PROVIDER, AIProvider } from './providers/ai-provider.interface';

/**
 * Punto de acceso al backend de generación. Los errores del proveedor se
 * envuelven en `UpstreamError` para que el canal en tiempo real los traduzca.
 */
@Injectable()
export class AiService {
  private readonly logger = new Logger(AiService.name);

  constructor(
    @Inject(AI_PROVIDER)
    private readonly provider: AIProvider,
  ) {}

  async answer(question: string, context: string): Promise<string> {
    try {
      const text = await this.provider.answer(question, context);
      return text.trim();
    } catch (error) {
      this.logger.error(
        `Error del backend de razonamiento`,
        error instanceof Error ? error.stack : String(error),
      );
      throw new UpstreamError('Reasoning backend failed', { cause: error });
    }
  }

  embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    return this.provider.embed(texts, signal);
  }
}
