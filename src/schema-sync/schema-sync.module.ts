import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { CatalogModule } from '../catalog/catalog.module';
import type { Env } from '../config/env.validation';
import { DesignStoreModule } from '../design-store/design-store.module';
import { SchemaInspectorModule } from '../schema-inspector/schema-inspector.module';
import { ALTERATION_STRATEGY, createAlterationStrategy } from './alteration-strategy';
import { syncOperationsCounter } from './schema-sync.metrics';
import { SchemaSyncService } from './schema-sync.service';
import { TableLockService } from './table-lock.service';

@Module({
  imports: [CatalogModule, DesignStoreModule, SchemaInspectorModule],
  providers: [
    SchemaSyncService,
    TableLockService,
    syncOperationsCounter,
    {
      provide: ALTERATION_STRATEGY,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<Env, true>) => {
        const strategy = createAlterationStrategy(
          configService.get('SCHEMA_ALTER_STRATEGY', { infer: true }),
        );
        new Logger('SchemaSyncModule').log(`Alteration strategy: ${strategy.name}`);
        return strategy;
      },
    },
  ],
  exports: [SchemaSyncService],
})
export class SchemaSyncModule {}
