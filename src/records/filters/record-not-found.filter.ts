import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { getCorrelationId } from '../../shared/context/request-context';
import { RecordNotFoundError } from '../record-not-found.error';

@Catch(RecordNotFoundError)
export class RecordNotFoundFilter implements ExceptionFilter {
  constructor(
    @InjectPinoLogger(RecordNotFoundFilter.name)
    private readonly logger: PinoLogger,
  ) {}

  catch(exception: RecordNotFoundError, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();
    const status = HttpStatus.NOT_FOUND;

    this.logger.warn(
      {
        recordId: exception.recordId,
        path: request.url,
        correlationId: getCorrelationId(),
      },
      exception.message,
    );

    response.status(status).json({
      statusCode: status,
      timestamp: new Date().toISOString(),
      path: request.url,
      message: exception.message,
    });
  }
}
