import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Inject,
  PayloadTooLargeException,
} from '@nestjs/common';
import type { Response } from 'express';
import { APP_CONFIG, AppConfig } from '../../config/app.config';
import { fileTooLargeMessage } from '../photo-validation';

/**
 * Multer rejects oversized uploads with 413; the form reports them as 400
 * like every other invalid photo.
 */
@Catch(PayloadTooLargeException)
export class UploadLimitFilter implements ExceptionFilter {
  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  catch(_exception: PayloadTooLargeException, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<Response>();

    response.status(HttpStatus.BAD_REQUEST).json({
      statusCode: HttpStatus.BAD_REQUEST,
      message: fileTooLargeMessage(this.config.uploads.maxFileSize),
      error: 'Bad Request',
    });
  }
}
