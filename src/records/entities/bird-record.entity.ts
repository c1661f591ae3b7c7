import { Expose, plainToInstance } from 'class-transformer';
import { IsISO8601, IsInt, IsString, Min, validateSync } from 'class-validator';
import { FilteredRecord } from '../../shared/serialization/attribute-filter';

export class BirdRecord {
  @Expose() @IsInt() @Min(1) id!: number;
  @Expose() @IsString() name!: string;
  @Expose() @IsString() species!: string;
  @Expose() @IsISO8601() createdAt!: string;
  @Expose() @IsISO8601() updatedAt!: string;
}

/** シリアライズ時のフィールド順（正準順序） */
export const BIRD_RECORD_FIELDS = [
  'id',
  'name',
  'species',
  'createdAt',
  'updatedAt',
] as const satisfies readonly (keyof BirdRecord)[];

export type BirdRecordField = (typeof BIRD_RECORD_FIELDS)[number];

export type SerializedBirdRecord = FilteredRecord<BirdRecord, BirdRecordField>;

export class InvalidRecordError extends Error {
  constructor(message: string) {
    super(message);
    this.name = InvalidRecordError.name;
  }
}

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * データファイル・バックエンドから受け取った値を BirdRecord に変換する。
 *
 * - @Expose() がないプロパティは excludeExtraneousValues により除去される
 * - オブジェクト以外、または制約違反は InvalidRecordError
 */
export function toBirdRecord(plain: unknown, index?: number): BirdRecord {
  const label =
    index === undefined ? 'bird record' : `bird record at index ${index}`;
  if (!isPlainObject(plain)) {
    throw new InvalidRecordError(`Invalid ${label}: expected an object`);
  }
  const record = plainToInstance(BirdRecord, plain, {
    excludeExtraneousValues: true,
  });
  const errors = validateSync(record);
  if (errors.length > 0) {
    const details = errors.flatMap((error) =>
      Object.values(error.constraints ?? {}),
    );
    throw new InvalidRecordError(`Invalid ${label}: ${details.join('; ')}`);
  }
  return record;
}

export function toBirdRecords(plain: unknown): BirdRecord[] {
  if (!Array.isArray(plain)) {
    throw new InvalidRecordError('Expected an array of bird records');
  }
  return plain.map((item: unknown, index) => toBirdRecord(item, index));
}
