import { HttpModule } from '@nestjs/axios';
import { Global, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { LoggingInterceptor } from './interceptors/logging.interceptor';

@Global()
@Module({
  imports: [
    HttpModule.registerAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        timeout: Number(configService.get('HTTP_TIMEOUT', 5000)),
        maxRedirects: 5,
        baseURL: configService.get<string>('BACKEND_API_BASE_URL'),
        headers: { Accept: 'application/json' },
      }),
    }),
  ],
  providers: [LoggingInterceptor],
  exports: [HttpModule],
})
export class SharedModule {}
