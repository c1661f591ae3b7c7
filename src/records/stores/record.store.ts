import { BirdRecord } from '../entities/bird-record.entity';

/**
 * 読み取り専用のレコード取得元。
 *
 * 該当 id がなければ `fetchById` は `RecordNotFoundError` を投げる。
 * それ以外のエラーはそのまま伝播させる。
 */
export abstract class RecordStore {
  abstract fetchById(id: number): Promise<BirdRecord>;
  abstract fetchAll(): Promise<BirdRecord[]>;
}
