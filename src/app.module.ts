import { Module } from '@nestjs/common';

import { ConfigModule } from './config/config.module';
import { ExplorerDataModule } from './explorer-data/explorer-data.module';
import { CacheStoreModule } from './infra/cache/cache-store.module';
import { IntegrationsModule } from './integrations/integrations.module';
import { RateLimitingModule } from './rate-limiting/rate-limiting.module';
import { SubscriptionsModule } from './subscriptions/subscriptions.module';

@Module({
  imports: [
    ConfigModule,
    RateLimitingModule,
    CacheStoreModule,
    IntegrationsModule,
    ExplorerDataModule,
    SubscriptionsModule,
  ],
})
export class AppModule {}
