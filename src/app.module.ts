import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_FILTER } from '@nestjs/core';
import { PrometheusModule } from '@willsoto/nestjs-prometheus';

import { CatalogModule } from './catalog/catalog.module';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';
import { HealthController } from './common/health.controller';
import { validateEnv } from './config/env.validation';
import { DatabaseModule } from './database/database.module';
import { DesignStoreModule } from './design-store/design-store.module';
import { TablesModule } from './tables/tables.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }),
    PrometheusModule.register(),
    DatabaseModule,

    CatalogModule,
    DesignStoreModule,
    TablesModule,
  ],
  controllers: [HealthController],
  providers: [
    {
      provide: APP_FILTER,
      useClass: HttpExceptionFilter,
    },
  ],
})
export class AppModule {}
