import { Module } from '@nestjs/common';

import { CatalogModule } from '../catalog/catalog.module';
import { SchemaInspectorService } from './schema-inspector.service';

@Module({
  imports: [CatalogModule],
  providers: [SchemaInspectorService],
  exports: [SchemaInspectorService],
})
export class SchemaInspectorModule {}
