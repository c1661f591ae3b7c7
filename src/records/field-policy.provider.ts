import { Provider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  FieldSelectionPolicy,
  parseFieldList,
  resolveFieldSelectionPolicy,
} from '../shared/serialization/field-selection-policy';

export const RECORD_FIELD_POLICY = Symbol('RECORD_FIELD_POLICY');

const DEFAULT_EXCEPT = ['createdAt', 'updatedAt'];

/**
 * レコードのレスポンスすべてに適用するフィールド選択ポリシーを組み立てる。
 *
 * - `RECORDS_ONLY=id,name` → include モード
 * - `RECORDS_EXCEPT=createdAt` → exclude モード
 * - どちらも未設定 → `createdAt`, `updatedAt` を除外
 * - 両方設定 → `FieldSelectionConflictError`（アプリは起動しない）
 */
export function createRecordFieldPolicy(
  configService: ConfigService,
): FieldSelectionPolicy {
  const only = parseFieldList(configService.get<string>('RECORDS_ONLY'));
  const except = parseFieldList(configService.get<string>('RECORDS_EXCEPT'));
  if (only === undefined && except === undefined) {
    return resolveFieldSelectionPolicy({ except: DEFAULT_EXCEPT });
  }
  return resolveFieldSelectionPolicy({ only, except });
}

export const RecordFieldPolicyProvider: Provider = {
  provide: RECORD_FIELD_POLICY,
  inject: [ConfigService],
  useFactory: createRecordFieldPolicy,
};
