import { Module } from '@nestjs/common';

import { SubscriptionManagerService } from './subscription-manager.service';
import { IntegrationsModule } from '../integrations/integrations.module';

@Module({
  imports: [IntegrationsModule],
  providers: [SubscriptionManagerService],
  exports: [SubscriptionManagerService],
})
export class SubscriptionsModule {}
