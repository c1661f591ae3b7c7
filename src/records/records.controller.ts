import { Controller, Get, Param } from '@nestjs/common';
import {
  ApiBadRequestResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiTags,
} from '@nestjs/swagger';
import { FindRecordParams } from './dto/find-record.params';
import { RecordResponse } from './dto/record.response';
import { SerializedBirdRecord } from './entities/bird-record.entity';
import { RecordsService } from './records.service';

@ApiTags('records')
@Controller('records')
export class RecordsController {
  constructor(private readonly recordsService: RecordsService) {}

  @Get()
  @ApiOkResponse({ type: RecordResponse, isArray: true })
  findAll(): Promise<SerializedBirdRecord[]> {
    return this.recordsService.findAll();
  }

  @Get(':id')
  @ApiOkResponse({ type: RecordResponse })
  @ApiBadRequestResponse({ description: 'id is not a positive integer' })
  @ApiNotFoundResponse({ description: 'No record has this id' })
  findOne(@Param() params: FindRecordParams): Promise<SerializedBirdRecord> {
    return this.recordsService.findOne(params.id);
  }
}
