import * as fs from 'fs';
import * as path from 'path';
import {
  BirdRecord,
  InvalidRecordError,
  toBirdRecords,
} from '../entities/bird-record.entity';
import { RecordNotFoundError } from '../record-not-found.error';
import { RecordStore } from './record.store';

/** 起動時に読み込んだレコードを保持する。id の重複は InvalidRecordError */
export class InMemoryRecordStore extends RecordStore {
  private readonly records: readonly BirdRecord[];
  private readonly byId = new Map<number, BirdRecord>();

  constructor(records: readonly BirdRecord[]) {
    super();
    for (const record of records) {
      if (this.byId.has(record.id)) {
        throw new InvalidRecordError(`Duplicate bird record id ${record.id}`);
      }
      this.byId.set(record.id, record);
    }
    this.records = Object.freeze([...records]);
  }

  static async fromFile(filePath: string): Promise<InMemoryRecordStore> {
    const resolved = path.resolve(process.cwd(), filePath);
    const raw = await fs.promises.readFile(resolved, 'utf-8');
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new Error(`Invalid JSON in record data file ${resolved}`, {
        cause: error,
      });
    }
    return new InMemoryRecordStore(toBirdRecords(data));
  }

  get size(): number {
    return this.records.length;
  }

  async fetchById(id: number): Promise<BirdRecord> {
    const record = this.byId.get(id);
    if (!record) {
      throw new RecordNotFoundError(id);
    }
    return record;
  }

  async fetchAll(): Promise<BirdRecord[]> {
    return [...this.records];
  }
}
