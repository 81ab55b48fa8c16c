import { Module } from '@nestjs/common';

import { CacheStoreService } from './cache-store.service';

@Module({
  providers: [CacheStoreService],
  exports: [CacheStoreService],
})
export class CacheStoreModule {}
