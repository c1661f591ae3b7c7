import { ApiPropertyOptional } from '@nestjs/swagger';

// ドキュメント用。実際に含まれるフィールドは RECORDS_ONLY / RECORDS_EXCEPT で決まる
export class RecordResponse {
  @ApiPropertyOptional({ example: 3 })
  id?: number;

  @ApiPropertyOptional({ example: 'Common Starling' })
  name?: string;

  @ApiPropertyOptional({ example: 'Sturnus Vulgaris' })
  species?: string;

  @ApiPropertyOptional({ example: '2019-05-09T21:51:41.543Z' })
  createdAt?: string;

  @ApiPropertyOptional({ example: '2019-05-09T21:51:41.543Z' })
  updatedAt?: string;
}
