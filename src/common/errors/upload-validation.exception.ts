import { BadRequestException } from '@nestjs/common';

export interface FileRejection {
  filename: string;
  error: string;
}

/**
 * Rechazo de una subida: ningún archivo se guarda y se informa el motivo de cada uno.
 */
export class UploadValidationException extends BadRequestException {
  constructor(
    readonly errors: FileRejection[],
    message = 'No files were successfully uploaded',
  ) {
    super({ message, errors });
  }
}
