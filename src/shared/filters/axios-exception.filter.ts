import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
} from '@nestjs/common';
import { AxiosError } from 'axios';
import { Request, Response } from 'express';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { getCorrelationId } from '../context/request-context';

/**
 * バックエンドの 4xx はそのまま返す。
 * 5xx とレスポンスなし（タイムアウト、接続拒否）は 502 にする。
 */
export function toClientStatus(backendStatus: number | undefined): number {
  if (
    backendStatus !== undefined &&
    backendStatus >= 400 &&
    backendStatus < 500
  ) {
    return backendStatus;
  }
  return HttpStatus.BAD_GATEWAY;
}

const backendMessage = (data: unknown): string | undefined => {
  if (typeof data !== 'object' || data === null || !('message' in data)) {
    return undefined;
  }
  return typeof data.message === 'string' ? data.message : undefined;
};

@Catch(AxiosError)
export class AxiosExceptionFilter implements ExceptionFilter {
  constructor(
    @InjectPinoLogger(AxiosExceptionFilter.name)
    private readonly logger: PinoLogger,
  ) {}

  catch(exception: AxiosError, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();
    const backendStatus = exception.response?.status;
    const status = toClientStatus(backendStatus);

    this.logger.error(
      {
        url: exception.config?.url,
        backendStatus,
        status,
        code: exception.code,
        correlationId: getCorrelationId(),
      },
      `Backend API error: ${exception.config?.url} → ${backendStatus ?? exception.code}`,
    );

    response.status(status).json({
      statusCode: status,
      timestamp: new Date().toISOString(),
      path: request.url,
      message: backendMessage(exception.response?.data) ?? exception.message,
    });
  }
}
