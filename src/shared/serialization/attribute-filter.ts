import {
  FieldSelectionPolicy,
  isFieldSelected,
} from './field-selection-policy';

export type FilteredRecord<T, K extends keyof T> = Partial<Pick<T, K>>;

/**
 * `policy` が選択した `record` のフィールドを新しいオブジェクトにコピーする。
 *
 * `schema` の順に走査するので、出力のキー順はレコードではなくスキーマに従う。
 * 自身のプロパティのみを「存在する」とみなす。
 *
 * @example
 * ```typescript
 * const BIRD_FIELDS = ['id', 'name', 'species', 'createdAt'] as const;
 * serializeRecord(bird, BIRD_FIELDS, excludeFields('createdAt'));
 * // { id: 3, name: 'Common Starling', species: 'Sturnus Vulgaris' }
 * ```
 */
export function serializeRecord<T extends object, K extends keyof T & string>(
  record: T,
  schema: readonly K[],
  policy: FieldSelectionPolicy,
): FilteredRecord<T, K> {
  const output: FilteredRecord<T, K> = {};
  for (const field of schema) {
    if (!Object.prototype.hasOwnProperty.call(record, field)) continue;
    if (!isFieldSelected(policy, field)) continue;
    output[field] = record[field];
  }
  return output;
}

export function serializeRecords<T extends object, K extends keyof T & string>(
  records: readonly T[],
  schema: readonly K[],
  policy: FieldSelectionPolicy,
): FilteredRecord<T, K>[] {
  return records.map((record) => serializeRecord(record, schema, policy));
}
