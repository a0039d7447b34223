import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';

import { ApiEnvelopeResponse } from '../common/decorators/api-envelope.decorator';
import { DesignStoreService } from './design-store.service';
import { DesignSummary } from './interfaces/design-record.interface';

@ApiTags('designs')
@Controller('designs')
export class DesignStoreController {
  constructor(private readonly designStore: DesignStoreService) {}

  @Get()
  @ApiOperation({ summary: 'List stored table designs' })
  @ApiEnvelopeResponse('Design summaries ordered by table name')
  findAll(): DesignSummary[] {
    return this.designStore.list();
  }
}
