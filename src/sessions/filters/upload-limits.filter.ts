import {
  ArgumentsHost,
  BadRequestException,
  Catch,
  ExceptionFilter,
  HttpException,
  PayloadTooLargeException,
} from '@nestjs/common';
import type { Response } from 'express';
import { UploadValidationException } from 'src/common/errors';
import { envs } from 'src/config/envs';

/** Mensaje con el que multer corta la subida al superar `limits.files`. */
export const MULTER_TOO_MANY_FILES = 'Too many files';

/**
 * Los cortes de multer (`limits`) llegan como 413/400 genéricos; se responden
 * con el mismo cuerpo por archivo que el resto de los rechazos de subida.
 */
export const toUploadException = (exception: HttpException): HttpException => {
  if (exception instanceof PayloadTooLargeException) {
    const limitMb = envs.maxFileSizeBytes / (1024 * 1024);
    return new UploadValidationException([
      { filename: 'Unknown', error: `File size exceeds the limit of ${limitMb}MB` },
    ]);
  }
  if (
    exception instanceof BadRequestException &&
    !(exception instanceof UploadValidationException) &&
    exception.message === MULTER_TOO_MANY_FILES
  ) {
    return new UploadValidationException(
      [],
      `Too many files. At most ${envs.maxFilesPerUpload} files per upload`,
    );
  }
  return exception;
};

@Catch(PayloadTooLargeException, BadRequestException)
export class UploadLimitsFilter implements ExceptionFilter {
  catch(exception: HttpException, host: ArgumentsHost) {
    const mapped = toUploadException(exception);
    host
      .switchToHttp()
      .getResponse<Response>()
      .status(mapped.getStatus())
      .json(mapped.getResponse());
  }
}
