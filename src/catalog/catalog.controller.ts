import { Body, Controller, Get, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';

import {
  ApiEnvelopeResponse,
  ApiErrorResponse,
} from '../common/decorators/api-envelope.decorator';
import { CatalogService } from './catalog.service';
import { ExecuteSqlDto } from './dto/execute-sql.dto';
import { DatabaseStatus, ExecutionResult } from './interfaces/catalog.interface';

@ApiTags('database')
@Controller()
export class CatalogController {
  constructor(private readonly catalogService: CatalogService) {}

  @Post('execute-sql')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Execute a raw SQL statement',
    description:
      'Unrestricted: the statement is passed to SQLite verbatim. Changes made here are not ' +
      'recorded in stored designs.',
  })
  @ApiEnvelopeResponse('Query rows or affected-row count')
  @ApiErrorResponse(HttpStatus.BAD_REQUEST, 'SchemaOperationFailed')
  execute(@Body() dto: ExecuteSqlDto): ExecutionResult {
    return this.catalogService.execute(dto.sql);
  }

  @Get('database-status')
  @ApiOperation({ summary: 'Table count, table names and database size' })
  @ApiEnvelopeResponse('Database status')
  status(): DatabaseStatus {
    return this.catalogService.status();
  }
}
