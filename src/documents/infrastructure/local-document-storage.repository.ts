import { Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { mkdir, readFile, rm, writeFile } from 'fs/promises';
import * as path from 'path';
import {
  DocumentStorageRepository,
  StoredFile,
} from 'src/documents/domain/repositories/document-storage.repository';

const SESSION_DIR_PATTERN = /^[A-Za-z0-9-]+$/;

export class LocalDocumentStorageRepository
  implements DocumentStorageRepository
{
  private readonly logger = new Logger(LocalDocumentStorageRepository.name);
  private readonly baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = path.resolve(baseDir);
  }

  async save(
    sessionId: string,
    originalName: string,
    content: Buffer,
  ): Promise<StoredFile> {
    const dir = this.sessionDir(sessionId);
    await mkdir(dir, { recursive: true });

    const savedName = buildSavedName(originalName);
    const filePath = path.join(dir, savedName);
    await writeFile(filePath, content, { flag: 'wx' });

    this.logger.log(`Archivo guardado: session=${sessionId} file=${savedName}`);
    return { savedName, path: filePath, size: content.length };
  }

  read(filePath: string): Promise<Buffer> {
    return readFile(filePath);
  }

  async deleteSession(sessionId: string): Promise<void> {
    await rm(this.sessionDir(sessionId), { recursive: true, force: true });
    this.logger.log(`Archivos eliminados: session=${sessionId}`);
  }

  private sessionDir(sessionId: string): string {
    if (!SESSION_DIR_PATTERN.test(sessionId)) {
      throw new Error(`Invalid session id for storage: ${sessionId}`);
    }
    return path.join(this.baseDir, sessionId);
  }
}

/**
 * `reporte anual.pdf` -> `reporte_anual_<uuid>.pdf`
 */
export const buildSavedName = (originalName: string): string => {
  const extension = path.extname(originalName).toLowerCase() || '.pdf';
  const stem =
    path
      .basename(originalName, path.extname(originalName))
      .replace(/[^\w.-]+/g, '_')
      .replace(/^[._]+/, '')
      .slice(0, 100) || 'document';
  return `${stem}_${randomUUID()}${extension}`;
};
