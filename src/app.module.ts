import { Module } from '@nestjs/common';
import { AiModule } from './ai/ai.module';
import { DocumentsModule } from './documents/documents.module';
import { PdfModule } from './pdf/pdf.module';
import { RateLimitModule } from './rate-limit/rate-limit.module';
import { SessionsModule } from './sessions/sessions.module';
import { VectorModule } from './vector/vector.module';
import { WsModule } from './ws/ws.module';

@Module({
  imports: [
    RateLimitModule,
    DocumentsModule,
    PdfModule,
    AiModule,
    VectorModule,
    SessionsModule,
    WsModule,
  ],
})
export class AppModule {}
