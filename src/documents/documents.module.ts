import { Module } from '@nestjs/common';
import { envs } from 'src/config/envs';
import { DOCUMENT_STORAGE } from './domain/repositories/document-storage.repository';
import { LocalDocumentStorageRepository } from './infrastructure/local-document-storage.repository';

@Module({
  providers: [
    {
      provide: DOCUMENT_STORAGE,
      useFactory: () => new LocalDocumentStorageRepository(envs.uploadDir),
    },
  ],
  exports: [DOCUMENT_STORAGE],
})
export class DocumentsModule {}
