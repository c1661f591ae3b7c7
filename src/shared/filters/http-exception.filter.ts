import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { getCorrelationId } from '../context/request-context';

type ErrorMessage = string | string[];

const isErrorMessage = (value: unknown): value is ErrorMessage =>
  typeof value === 'string' ||
  (Array.isArray(value) && value.every((item) => typeof item === 'string'));

/**
 * ValidationPipe のエラーは `message: string[]`、それ以外は文字列。
 * どちらでもなければ `exception.message` を使う。
 */
export function extractErrorMessage(exception: HttpException): ErrorMessage {
  const body = exception.getResponse();
  if (typeof body === 'string') return body;
  if ('message' in body && isErrorMessage(body.message)) return body.message;
  return exception.message;
}

@Catch(HttpException)
export class HttpExceptionFilter implements ExceptionFilter {
  constructor(
    @InjectPinoLogger(HttpExceptionFilter.name)
    private readonly logger: PinoLogger,
  ) {}

  catch(exception: HttpException, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();
    const status = exception.getStatus();

    this.logger.warn(
      { status, path: request.url, correlationId: getCorrelationId() },
      `HTTP ${status}: ${request.method} ${request.url}`,
    );

    response.status(status).json({
      statusCode: status,
      timestamp: new Date().toISOString(),
      path: request.url,
      message: extractErrorMessage(exception),
    });
  }
}
