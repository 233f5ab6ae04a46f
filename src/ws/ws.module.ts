import { Module } from '@nestjs/common';
import { AiModule } from 'src/ai/ai.module';
import { RateLimitModule } from 'src/rate-limit/rate-limit.module';
import { SessionsModule } from 'src/sessions/sessions.module';
import { VectorModule } from 'src/vector/vector.module';
import { WsGateway } from './ws.gateway';
import { WsService } from './ws.service';

@Module({
  imports: [SessionsModule, RateLimitModule, AiModule, VectorModule],
  providers: [WsGateway, WsService],
  exports: [WsService],
})
export class WsModule {}
