import { HttpService } from '@nestjs/axios';
import { Provider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpRecordStore } from './stores/http-record.store';
import { InMemoryRecordStore } from './stores/in-memory-record.store';
import { RecordStore } from './stores/record.store';

export const RECORD_STORE_KINDS = ['memory', 'http'] as const;

export type RecordStoreKind = (typeof RECORD_STORE_KINDS)[number];

const isRecordStoreKind = (value: string): value is RecordStoreKind =>
  RECORD_STORE_KINDS.some((kind) => kind === value);

export function resolveRecordStoreKind(
  configService: ConfigService,
): RecordStoreKind {
  const kind = configService.get<string>('RECORD_STORE', 'memory');
  if (!isRecordStoreKind(kind)) {
    throw new Error(
      `Unknown RECORD_STORE: "${kind}" (expected one of ${RECORD_STORE_KINDS.join(', ')})`,
    );
  }
  return kind;
}

export async function createRecordStore(
  configService: ConfigService,
  httpService: HttpService,
): Promise<RecordStore> {
  switch (resolveRecordStoreKind(configService)) {
    case 'http':
      // 最初のリクエストではなく起動時に失敗させる
      configService.getOrThrow<string>('BACKEND_API_BASE_URL');
      return new HttpRecordStore(httpService);
    case 'memory':
      return InMemoryRecordStore.fromFile(
        configService.get<string>('RECORDS_DATA_PATH', 'data/records.json'),
      );
  }
}

export const RecordStoreProvider: Provider = {
  provide: RecordStore,
  inject: [ConfigService, HttpService],
  useFactory: createRecordStore,
};
