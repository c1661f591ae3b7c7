import { Module } from '@nestjs/common';
import { RecordFieldPolicyProvider } from './field-policy.provider';
import { RecordStoreProvider } from './record-store.provider';
import { RecordsController } from './records.controller';
import { RecordsService } from './records.service';

@Module({
  controllers: [RecordsController],
  providers: [
    RecordStoreProvider,
    RecordFieldPolicyProvider,
    RecordsService,
  ],
  exports: [RecordStoreProvider],
})
export class RecordsModule {}
