import { Module } from '@nestjs/common';

import { SchemaSyncModule } from '../schema-sync/schema-sync.module';
import { TablesController } from './tables.controller';

@Module({
  imports: [SchemaSyncModule],
  controllers: [TablesController],
})
export class TablesModule {}
