import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { APP_FILTER } from '@nestjs/core';
import { randomUUID } from 'crypto';
import { LoggerModule, Params } from 'nestjs-pino';
import { HealthModule } from './health/health.module';
import { RecordNotFoundFilter } from './records/filters/record-not-found.filter';
import { RecordsModule } from './records/records.module';
import { AxiosExceptionFilter } from './shared/filters/axios-exception.filter';
import { HttpExceptionFilter } from './shared/filters/http-exception.filter';
import { CORRELATION_HEADER } from './shared/middleware/correlation-id.middleware';
import { SharedModule } from './shared/shared.module';

export const HEALTH_PATH_PREFIX = '/api/health';

export function buildLoggerParams(configService: ConfigService): Params {
  const production = configService.get<string>('NODE_ENV') === 'production';
  return {
    pinoHttp: {
      level: configService.get<string>('LOG_LEVEL', 'info'),
      genReqId: (req) => {
        const id = req.headers[CORRELATION_HEADER];
        return typeof id === 'string' ? id : randomUUID();
      },
      transport: production
        ? undefined
        : {
            target: 'pino-pretty',
            options: { colorize: true, singleLine: true },
          },
      serializers: {
        req: (req: { method: string; url: string }) => ({
          method: req.method,
          url: req.url,
        }),
        res: (res: { statusCode: number }) => ({ statusCode: res.statusCode }),
      },
      autoLogging: {
        ignore: (req) => req.url?.startsWith(HEALTH_PATH_PREFIX) ?? false,
      },
    },
  };
}

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
    LoggerModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: buildLoggerParams,
    }),
    SharedModule,
    RecordsModule,
    HealthModule,
  ],
  providers: [
    { provide: APP_FILTER, useClass: AxiosExceptionFilter },
    { provide: APP_FILTER, useClass: HttpExceptionFilter },
    { provide: APP_FILTER, useClass: RecordNotFoundFilter },
  ],
})
export class AppModule {}
