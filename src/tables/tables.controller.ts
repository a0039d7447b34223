import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Put,
} from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';

import {
  ApiEnvelopeResponse,
  ApiErrorResponse,
} from '../common/decorators/api-envelope.decorator';
import { TableStructure } from '../schema-inspector/interfaces/table-structure.interface';
import {
  DropOutcome,
  SyncOutcome,
  TableDetail,
} from '../schema-sync/interfaces/sync-outcome.interface';
import { SchemaSyncService } from '../schema-sync/schema-sync.service';
import { CreateTableDto } from './dto/create-table.dto';
import { FieldBodyDto } from './dto/field.dto';
import { UpdateTableDto } from './dto/update-table.dto';

const REBUILD_NOTE =
  'Under the rebuild strategy the table is dropped and recreated: all of its rows are lost.';

@ApiTags('tables')
@Controller('tables')
export class TablesController {
  constructor(private readonly schemaSync: SchemaSyncService) {}

  @Post()
  @ApiOperation({
    summary: 'Create a table from a design',
    description: 'Fails with 409 when the table exists, unless replace is true.',
  })
  @ApiEnvelopeResponse('Table created or replaced', HttpStatus.CREATED)
  @ApiErrorResponse(HttpStatus.BAD_REQUEST, 'InvalidDesign', 'InvalidField', 'SchemaOperationFailed')
  @ApiErrorResponse(HttpStatus.CONFLICT, 'TableAlreadyExists')
  create(@Body() dto: CreateTableDto): Promise<SyncOutcome> {
    return this.schemaSync.create(dto.table, { replace: dto.replace });
  }

  @Get()
  @ApiOperation({ summary: 'Describe every table in the live schema' })
  @ApiEnvelopeResponse('Structures of all tables')
  findAll(): TableStructure[] {
    return this.schemaSync.listTables();
  }

  @Get(':name')
  @ApiOperation({ summary: 'Live structure, stored design and drift of a table' })
  @ApiEnvelopeResponse('Table detail')
  @ApiErrorResponse(HttpStatus.NOT_FOUND, 'TableNotFound')
  findOne(@Param('name') name: string): TableDetail {
    return this.schemaSync.getTable(name);
  }

  @Put(':name')
  @ApiOperation({ summary: 'Replace a table with a new design', description: REBUILD_NOTE })
  @ApiEnvelopeResponse('Table replaced')
  @ApiErrorResponse(HttpStatus.NOT_FOUND, 'TableNotFound')
  replace(@Param('name') name: string, @Body() dto: UpdateTableDto): Promise<SyncOutcome> {
    return this.schemaSync.replace(name, { ...dto.table, name: dto.table.name ?? '' });
  }

  @Delete(':name')
  @ApiOperation({ summary: 'Drop a table and its stored design' })
  @ApiEnvelopeResponse('Table dropped')
  @ApiErrorResponse(HttpStatus.NOT_FOUND, 'TableNotFound')
  remove(@Param('name') name: string): Promise<DropOutcome> {
    return this.schemaSync.drop(name);
  }

  @Post(':name/fields')
  @ApiOperation({ summary: 'Add a field to a table' })
  @ApiEnvelopeResponse('Field added', HttpStatus.CREATED)
  @ApiErrorResponse(HttpStatus.NOT_FOUND, 'TableNotFound', 'DesignNotFound')
  @ApiErrorResponse(HttpStatus.CONFLICT, 'DuplicateField')
  addField(@Param('name') name: string, @Body() dto: FieldBodyDto): Promise<SyncOutcome> {
    return this.schemaSync.addField(name, dto.field);
  }

  @Put(':name/fields/:fieldName')
  @ApiOperation({ summary: 'Replace a field definition', description: REBUILD_NOTE })
  @ApiEnvelopeResponse('Field replaced')
  @ApiErrorResponse(HttpStatus.NOT_FOUND, 'TableNotFound', 'DesignNotFound', 'FieldNotFound')
  @ApiErrorResponse(HttpStatus.CONFLICT, 'DuplicateField')
  updateField(
    @Param('name') name: string,
    @Param('fieldName') fieldName: string,
    @Body() dto: FieldBodyDto,
  ): Promise<SyncOutcome> {
    return this.schemaSync.updateField(name, fieldName, dto.field);
  }

  @Delete(':name/fields/:fieldName')
  @ApiOperation({ summary: 'Remove a field from a table', description: REBUILD_NOTE })
  @ApiEnvelopeResponse('Field removed')
  @ApiErrorResponse(HttpStatus.NOT_FOUND, 'TableNotFound', 'DesignNotFound', 'FieldNotFound')
  removeField(
    @Param('name') name: string,
    @Param('fieldName') fieldName: string,
  ): Promise<SyncOutcome> {
    return this.schemaSync.removeField(name, fieldName);
  }

  @Post(':name/reconcile')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Rewrite the stored design from the live table' })
  @ApiEnvelopeResponse('Design rewritten from the live table')
  @ApiErrorResponse(HttpStatus.NOT_FOUND, 'TableNotFound')
  reconcile(@Param('name') name: string): Promise<SyncOutcome> {
    return this.schemaSync.reconcile(name);
  }
}
