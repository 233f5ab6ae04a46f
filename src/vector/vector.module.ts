import { Module } from '@nestjs/common';
import { AiModule } from 'src/ai/ai.module';
import { VECTOR_INDEX } from './domain/repositories/vector-index.repository';
import { InMemoryVectorIndexRepository } from './infrastructure/in-memory-vector-index.repository';

@Module({
  imports: [AiModule],
  providers: [
    { provide: VECTOR_INDEX, useClass: InMemoryVectorIndexRepository },
  ],
  exports: [VECTOR_INDEX],
})
export class VectorModule {}
