/**
 * シリアライズ時にレコードのどのフィールドを残すかを決める。
 *
 * ポリシーごとに有効なモードは 1 つだけ:
 * - `include`: 列挙したフィールドのみ残す
 * - `exclude`: 列挙したフィールド以外をすべて残す
 *
 * レコードに存在しない名前はどちらのモードでも無視する。
 */
export type FieldSelectionPolicy =
  | { readonly mode: 'include'; readonly fields: ReadonlySet<string> }
  | { readonly mode: 'exclude'; readonly fields: ReadonlySet<string> };

export interface FieldSelectionOptions {
  only?: readonly string[];
  except?: readonly string[];
}

export class FieldSelectionConflictError extends Error {
  constructor() {
    super('Field selection accepts either "only" or "except", not both');
    this.name = FieldSelectionConflictError.name;
  }
}

export function includeFields(...fields: string[]): FieldSelectionPolicy {
  return { mode: 'include', fields: new Set(fields) };
}

export function excludeFields(...fields: string[]): FieldSelectionPolicy {
  return { mode: 'exclude', fields: new Set(fields) };
}

/**
 * `only` / `except` オプションをポリシーに変換する。
 *
 * どちらも指定がなければ空の exclude ポリシー（全フィールド）になる。
 *
 * @throws FieldSelectionConflictError 両方指定された場合
 */
export function resolveFieldSelectionPolicy({
  only,
  except,
}: FieldSelectionOptions): FieldSelectionPolicy {
  if (only !== undefined && except !== undefined) {
    throw new FieldSelectionConflictError();
  }
  if (only !== undefined) {
    return includeFields(...only);
  }
  return excludeFields(...(except ?? []));
}

export function isFieldSelected(
  policy: FieldSelectionPolicy,
  field: string,
): boolean {
  switch (policy.mode) {
    case 'include':
      return policy.fields.has(field);
    case 'exclude':
      return !policy.fields.has(field);
  }
}

/**
 * `"id, name,species"` のようなカンマ区切りのリストを分割する。
 * 空白のみの入力は未指定として扱う。
 */
export function parseFieldList(raw: string | undefined): string[] | undefined {
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  return raw
    .split(',')
    .map((field) => field.trim())
    .filter((field) => field.length > 0);
}
