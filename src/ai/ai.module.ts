import { Module } from '@nestjs/common';
import { AiService } from './ai.service';
import { OpenAiProvider } from './providers/open-ai.provider';
import { AI_PROVIDER } from './providers/ai-provider.interface';

@Module({
  providers: [{ provide: AI_PROVIDER, useClass: OpenAiProvider }, AiService],
  exports: [AiService],
})
export class AiModule {}
