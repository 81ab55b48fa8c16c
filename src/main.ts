import 'reflect-metadata';

import { type LogLevel, Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';

import { AppModule } from './app.module';
import { AppConfigService } from './config/app-config.service';
import { ExplorerDataService } from './explorer-data/explorer-data.service';
import type { ILimiterSnapshot } from './rate-limiting/bottleneck-rate-limiter.interfaces';
import { BottleneckRateLimiterService } from './rate-limiting/bottleneck-rate-limiter.service';
import { SubscriptionManagerService } from './subscriptions/subscription-manager.service';
import {
  type SubscriptionEvent,
  SubscriptionEventType,
} from './subscriptions/subscription.interfaces';

const HEAD_WATCH_ID = 'head-watch';

const resolveNestLogLevels = (logLevel: string): LogLevel[] => {
  if (logLevel === 'debug') {
    return ['error', 'warn', 'log', 'debug'];
  }

  if (logLevel === 'info') {
    return ['error', 'warn', 'log'];
  }

  if (logLevel === 'warn') {
    return ['error', 'warn'];
  }

  return ['error'];
};

const formatLimiterSnapshot = (snapshot: ILimiterSnapshot): string =>
  `Rate limiter ${snapshot.key}: minTime=${snapshot.minTimeMs}ms ` +
  `maxConcurrent=${snapshot.maxConcurrent} queued=${snapshot.queued} running=${snapshot.running}`;

const bootstrap = async (): Promise<void> => {
  const configuredLogLevel: string = process.env['LOG_LEVEL'] ?? 'info';
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: resolveNestLogLevels(configuredLogLevel),
  });
  app.enableShutdownHooks();

  const appConfigService: AppConfigService = app.get(AppConfigService);
  const explorerDataService: ExplorerDataService = app.get(ExplorerDataService);
  const subscriptionManager: SubscriptionManagerService = app.get(SubscriptionManagerService);
  const logger: Logger = new Logger('Bootstrap');

  logger.log(`Resolved log level: ${appConfigService.logLevel}`);
  logger.log(
    `Runtime config: nodeEnv=${appConfigService.nodeEnv}, chainId=${appConfigService.chainId}, ` +
      `rpcNodeLocal=${String(appConfigService.rpcNodeLocal)}, ` +
      `etherscan=${String(appConfigService.etherscanApiKey !== null)}, ` +
      `cache=${String(appConfigService.cacheEnabled)}`,
  );

  const health = await explorerDataService.testConnection();
  logger.log(`Node health: ok=${String(health.ok)} ${health.details}`);

  for (const snapshot of app.get(BottleneckRateLimiterService).describeLimiters()) {
    logger.log(formatLimiterSnapshot(snapshot));
  }

  subscriptionManager.events$.subscribe((event: SubscriptionEvent): void => {
    if (event.type === SubscriptionEventType.NEW_BLOCK) {
      logger.log(`New block ${event.number} ${event.hash}`);
      return;
    }

    if (event.type === SubscriptionEventType.SUBSCRIPTION_ERROR) {
      logger.error(`Head watch stopped: ${event.message}`);
    }
  });
  subscriptionManager.subscribeToBlocks(HEAD_WATCH_ID);
  logger.log(
    `Watching chain head (mode=${subscriptionManager.hasPushSupport() ? 'push' : 'poll'}).`,
  );
};

void bootstrap();
