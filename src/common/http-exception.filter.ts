import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Response } from 'express';

export const GENERIC_ERROR_MESSAGE = 'Internal server error';

function httpExceptionMessage(exception: HttpException): string {
  const body = exception.getResponse();
  if (typeof body === 'string') return body;
  if (typeof body === 'object' && body !== null && 'message' in body) {
    const { message } = body;
    if (Array.isArray(message) && message.length > 0) return String(message[0]);
    if (typeof message === 'string') return message;
  }
  return exception.message;
}

/**
 * Renders every error as `{ error, success: false }`. Unexpected errors
 * become a 500 whose text is the raw message only when `exposeDetails` is on.
 */
@Catch()
export class ApiExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(ApiExceptionFilter.name);

  constructor(private readonly exposeDetails: boolean) {}

  catch(exception: unknown, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<Response>();

    if (exception instanceof HttpException) {
      response
        .status(exception.getStatus())
        .json({ error: httpExceptionMessage(exception), success: false });
      return;
    }

    const message = exception instanceof Error ? exception.message : String(exception);
    this.logger.error(
      `Unhandled error: ${message}`,
      exception instanceof Error ? exception.stack : undefined,
    );
    response.status(HttpStatus.INTERNAL_SERVER_ERROR).json({
      error: this.exposeDetails ? message : GENERIC_ERROR_MESSAGE,
      success: false,
    });
  }
}
