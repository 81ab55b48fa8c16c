import { Module } from '@nestjs/common';

import { ExplorerDataService } from './explorer-data.service';
import { CacheStoreModule } from '../infra/cache/cache-store.module';
import { IntegrationsModule } from '../integrations/integrations.module';

@Module({
  imports: [CacheStoreModule, IntegrationsModule],
  providers: [ExplorerDataService],
  exports: [ExplorerDataService],
})
export class ExplorerDataModule {}
