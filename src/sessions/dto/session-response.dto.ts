import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  DocumentRecord,
  DocumentStatus,
} from 'src/sessions/domain/entities/document-record.entity';
import {
  computeReadiness,
  ConnectionState,
  ReadinessState,
  Session,
} from 'src/sessions/domain/entities/session.entity';

export class DocumentStatusDto {
  @ApiProperty({ example: '6a1f1d1e-0f4b-4b8e-9a55-0d1f3c2b7e10' })
  documentId!: string;

  @ApiProperty({ example: 'contrato.pdf' })
  originalName!: string;

  @ApiProperty({ example: 'contrato_1b9d6bcd-bbfd-4b2d-9b5d-ab8dfbbd4bed.pdf' })
  savedName!: string;

  @ApiProperty({ enum: ['queued', 'processing', 'ready', 'failed'] })
  status!: DocumentStatus;

  @ApiPropertyOptional({ example: 'No extractable text found' })
  failureReason?: string;
}

export class UploadResponseDto {
  @ApiProperty({ example: '0f8fad5b-d9cb-469f-a165-70867728950e' })
  sessionId!: string;

  @ApiProperty({ type: [DocumentStatusDto] })
  files!: DocumentStatusDto[];
}

export class SessionStatusDto extends UploadResponseDto {
  @ApiProperty({ enum: ['unconnected', 'connected', 'closed'] })
  connection!: ConnectionState;

  @ApiProperty({ enum: ['pending', 'ready', 'failed'] })
  readiness!: ReadinessState;

  @ApiProperty({ example: '2025-01-01T15:04:05.000Z' })
  createdAt!: string;

  @ApiProperty({ example: '2025-01-01T15:04:05.000Z' })
  lastActivity!: string;
}

export const toDocumentStatus = (
  document: DocumentRecord,
): DocumentStatusDto => ({
  documentId: document.id,
  originalName: document.originalName,
  savedName: document.savedName,
  status: document.status,
  ...(document.failureReason ? { failureReason: document.failureReason } : {}),
});

export const toUploadResponse = (session: Session): UploadResponseDto => ({
  sessionId: session.id,
  files: session.documents.map(toDocumentStatus),
});

export const toSessionStatus = (session: Session): SessionStatusDto => ({
  ...toUploadResponse(session),
  connection: session.connection,
  readiness: computeReadiness(session.documents),
  createdAt: session.createdAt.toISOString(),
  lastActivity: session.lastActivity.toISOString(),
});
