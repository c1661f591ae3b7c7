import { Inject, Injectable } from '@nestjs/common';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import {
  serializeRecord,
  serializeRecords,
} from '../shared/serialization/attribute-filter';
import { FieldSelectionPolicy } from '../shared/serialization/field-selection-policy';
import {
  BIRD_RECORD_FIELDS,
  SerializedBirdRecord,
} from './entities/bird-record.entity';
import { RECORD_FIELD_POLICY } from './field-policy.provider';
import { RecordStore } from './stores/record.store';

@Injectable()
export class RecordsService {
  constructor(
    private readonly store: RecordStore,
    @Inject(RECORD_FIELD_POLICY) private readonly policy: FieldSelectionPolicy,
    @InjectPinoLogger(RecordsService.name)
    private readonly logger: PinoLogger,
  ) {}

  async findAll(): Promise<SerializedBirdRecord[]> {
    const records = await this.store.fetchAll();
    this.logger.debug(
      { count: records.length, mode: this.policy.mode },
      `Serializing ${records.length} records`,
    );
    return serializeRecords(records, BIRD_RECORD_FIELDS, this.policy);
  }

  // try-catch 不要。RecordNotFoundError は RecordNotFoundFilter が 404 に変換する
  async findOne(id: number): Promise<SerializedBirdRecord> {
    const record = await this.store.fetchById(id);
    return serializeRecord(record, BIRD_RECORD_FIELDS, this.policy);
  }
}
