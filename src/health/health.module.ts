import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { RecordsModule } from '../records/records.module';
import { HealthController } from './health.controller';

@Module({
  imports: [TerminusModule, RecordsModule],
  controllers: [HealthController],
})
export class HealthModule {}
