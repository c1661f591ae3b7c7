import { Controller, Get } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  HealthCheck,
  HealthCheckService,
  HealthIndicatorResult,
  HttpHealthIndicator,
} from '@nestjs/terminus';
import { RecordStore } from '../records/stores/record.store';
import {
  RecordStoreKind,
  resolveRecordStoreKind,
} from '../records/record-store.provider';

@Controller('health')
export class HealthController {
  private readonly storeKind: RecordStoreKind;

  constructor(
    private readonly health: HealthCheckService,
    private readonly http: HttpHealthIndicator,
    private readonly store: RecordStore,
    private readonly configService: ConfigService,
  ) {
    this.storeKind = resolveRecordStoreKind(configService);
  }

  @Get('live')
  live(): { status: string } {
    return { status: 'ok' };
  }

  @Get()
  @HealthCheck()
  check() {
    const checks: (() => Promise<HealthIndicatorResult>)[] =
      this.storeKind === 'http'
        ? [
            () =>
              this.http.pingCheck(
                'backend',
                this.configService.getOrThrow<string>('BACKEND_API_BASE_URL'),
              ),
          ]
        : [() => this.countRecords()];
    return this.health.check(checks);
  }

  private async countRecords(): Promise<HealthIndicatorResult> {
    const records = await this.store.fetchAll();
    return { records: { status: 'up', count: records.length } };
  }
}
