import { Module } from '@nestjs/common';

import { DesignStoreController } from './design-store.controller';
import { DesignStoreService } from './design-store.service';

@Module({
  controllers: [DesignStoreController],
  providers: [DesignStoreService],
  exports: [DesignStoreService],
})
export class DesignStoreModule {}
