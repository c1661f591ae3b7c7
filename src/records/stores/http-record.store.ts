import { HttpService } from '@nestjs/axios';
import { BadGatewayException, HttpStatus } from '@nestjs/common';
import { isAxiosError } from 'axios';
import {
  BirdRecord,
  InvalidRecordError,
  toBirdRecord,
  toBirdRecords,
} from '../entities/bird-record.entity';
import { RecordNotFoundError } from '../record-not-found.error';
import { RecordStore } from './record.store';

/**
 * BACKEND_API_BASE_URL のバックエンドからレコードを取得する。
 *
 * 共有の HttpService.axiosRef を使うので、外部呼び出しのログは
 * LoggingInterceptor がまとめて出力する。
 */
export class HttpRecordStore extends RecordStore {
  constructor(private readonly httpService: HttpService) {
    super();
  }

  async fetchById(id: number): Promise<BirdRecord> {
    let data: unknown;
    try {
      ({ data } = await this.httpService.axiosRef.get<unknown>(
        `/records/${id}`,
      ));
    } catch (error) {
      if (
        isAxiosError(error) &&
        error.response?.status === HttpStatus.NOT_FOUND
      ) {
        throw new RecordNotFoundError(id);
      }
      throw error;
    }
    return this.normalize(() => toBirdRecord(data));
  }

  // try-catch 不要。AxiosError は AxiosExceptionFilter が処理する
  async fetchAll(): Promise<BirdRecord[]> {
    const { data } = await this.httpService.axiosRef.get<unknown>('/records');
    return this.normalize(() => toBirdRecords(data));
  }

  // 不正なレスポンスはバックエンド側の障害として 502 を返す
  private normalize<T>(convert: () => T): T {
    try {
      return convert();
    } catch (error) {
      if (error instanceof InvalidRecordError) {
        throw new BadGatewayException(
          `Backend returned an invalid payload: ${error.message}`,
        );
      }
      throw error;
    }
  }
}
