import { Module } from '@nestjs/common';
import { DocumentsModule } from 'src/documents/documents.module';
import { PdfModule } from 'src/pdf/pdf.module';
import { RateLimitModule } from 'src/rate-limit/rate-limit.module';
import { VectorModule } from 'src/vector/vector.module';
import { CleanupService } from './cleanup/cleanup.service';
import { IngestionService } from './ingestion/ingestion.service';
import { SessionStore } from './session.store';
import { SessionsController } from './sessions.controller';
import { SessionsService } from './sessions.service';

@Module({
  imports: [DocumentsModule, PdfModule, VectorModule, RateLimitModule],
  controllers: [SessionsController],
  providers: [SessionStore, IngestionService, SessionsService, CleanupService],
  exports: [SessionsService, CleanupService],
})
export class SessionsModule {}
