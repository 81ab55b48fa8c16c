import { Injectable, Logger, type OnModuleDestroy } from '@nestjs/common';
import Bottleneck from 'bottleneck';

import {
  type ILimiterSnapshot,
  LimiterKey,
  RequestPriority,
} from './bottleneck-rate-limiter.interfaces';
import { NetworkError, toErrorMessage } from '../common/errors/explorer-errors';
import { AppConfigService } from '../config/app-config.service';

interface ILimiterEntry {
  readonly limiter: Bottleneck;
  readonly minTimeMs: number;
  readonly maxConcurrent: number;
}

/**
 * Paces outgoing calls per backend. The Etherscan key is shared by every
 * list and lookup read, the RPC key by every node call.
 */
@Injectable()
export class BottleneckRateLimiterService implements OnModuleDestroy {
  private readonly logger: Logger = new Logger(BottleneckRateLimiterService.name);
  private readonly entries: Map<LimiterKey, ILimiterEntry> = new Map<LimiterKey, ILimiterEntry>();
  private stopped: boolean = false;

  public constructor(appConfigService: AppConfigService) {
    this.register(
      LimiterKey.ETHERSCAN,
      appConfigService.rateLimitEtherscanMinTimeMs,
      appConfigService.rateLimitEtherscanMaxConcurrent,
    );
    this.register(
      LimiterKey.ETH_RPC,
      appConfigService.rateLimitEthRpcMinTimeMs,
      appConfigService.rateLimitEthRpcMaxConcurrent,
    );
  }

  public async schedule<T>(
    key: LimiterKey,
    operation: () => Promise<T>,
    priority: RequestPriority = RequestPriority.LOOKUP,
  ): Promise<T> {
    const entry: ILimiterEntry | undefined = this.entries.get(key);

    if (entry === undefined) {
      throw new Error(`No rate limiter configured for key=${key}`);
    }

    if (this.stopped) {
      throw new NetworkError(`Rate limiter ${key} is stopped`);
    }

    return entry.limiter.schedule({ priority }, operation);
  }

  public describeLimiters(): readonly ILimiterSnapshot[] {
    return [...this.entries].map(
      ([key, entry]: [LimiterKey, ILimiterEntry]): ILimiterSnapshot => {
        const counts: Bottleneck.Counts = entry.limiter.counts();

        return {
          key,
          minTimeMs: entry.minTimeMs,
          maxConcurrent: entry.maxConcurrent,
          queued: counts.RECEIVED + counts.QUEUED,
          running: counts.RUNNING + counts.EXECUTING,
        };
      },
    );
  }

  public async onModuleDestroy(): Promise<void> {
    if (this.stopped) {
      return;
    }

    this.stopped = true;

    await Promise.all(
      [...this.entries].map(
        async ([key, entry]: [LimiterKey, ILimiterEntry]): Promise<void> => {
          try {
            await entry.limiter.stop({ dropWaitingJobs: true });
          } catch (error: unknown) {
            this.logger.warn(`Failed to stop rate limiter key=${key}: ${toErrorMessage(error)}`);
          }
        },
      ),
    );
  }

  private register(key: LimiterKey, minTimeMs: number, maxConcurrent: number): void {
    const limiter: Bottleneck = new Bottleneck({ id: key, minTime: minTimeMs, maxConcurrent });

    limiter.on('error', (error: unknown): void => {
      this.logger.error(`Rate limiter error key=${key}: ${toErrorMessage(error)}`);
    });

    this.entries.set(key, { limiter, minTimeMs, maxConcurrent });
  }
}
