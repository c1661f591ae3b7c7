import { HttpService } from '@nestjs/axios';
import { Injectable, OnModuleInit } from '@nestjs/common';
import { isAxiosError } from 'axios';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { getCorrelationId } from '../context/request-context';
import { CORRELATION_HEADER } from '../middleware/correlation-id.middleware';

/**
 * バックエンドへの外部呼び出しをログに出し、相関 ID を転送する。
 * 共有 axios インスタンスに登録するので HttpRecordStore の呼び出しも対象になる。
 */
@Injectable()
export class LoggingInterceptor implements OnModuleInit {
  constructor(
    private readonly httpService: HttpService,
    @InjectPinoLogger(LoggingInterceptor.name)
    private readonly logger: PinoLogger,
  ) {}

  onModuleInit() {
    this.httpService.axiosRef.interceptors.request.use((config) => {
      const correlationId = getCorrelationId();
      if (correlationId) {
        config.headers[CORRELATION_HEADER] = correlationId;
      }
      const method = config.method?.toUpperCase() ?? 'GET';
      this.logger.info(
        { direction: 'outbound', method, url: config.url, correlationId },
        `→ ${method} ${config.url}`,
      );
      return config;
    });

    this.httpService.axiosRef.interceptors.response.use(
      (res) => {
        this.logger.info(
          {
            direction: 'inbound',
            status: res.status,
            url: res.config.url,
            correlationId: getCorrelationId(),
          },
          `← ${res.status} ${res.config.url}`,
        );
        return res;
      },
      (err: unknown) => {
        if (isAxiosError(err)) {
          const status = err.response?.status;
          this.logger.warn(
            {
              direction: 'inbound',
              status,
              code: err.code,
              url: err.config?.url,
              correlationId: getCorrelationId(),
            },
            `← ${status ?? err.code} ${err.config?.url}`,
          );
        }
        return Promise.reject(err);
      },
    );
  }
}
