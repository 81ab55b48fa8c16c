import { Injectable, Logger, type OnModuleDestroy } from '@nestjs/common';

import type { ICacheStats } from './cache.interfaces';
import {
  CacheKind,
  type CacheStoreStats,
  type ICacheValueMap,
} from './cache-store.interfaces';
import { LruTtlCache } from './lru-ttl-cache';
import { AppConfigService } from '../../config/app-config.service';
import type {
  IAddressInfo,
  IContractInfo,
  ITokenInfo,
  ITransactionDetails,
} from '../../core/explorer/explorer-entities.interfaces';
import type { IBlockSummary } from '../../core/ports/chain/chain-data.interfaces';
import type {
  IAddressTransaction,
  IInternalTransaction,
  ITokenBalance,
  ITokenTransfer,
} from '../../core/ports/explorers/indexed-explorer.interfaces';

type CacheTable = { readonly [K in CacheKind]: LruTtlCache<ICacheValueMap[K]> };

@Injectable()
export class CacheStoreService implements OnModuleDestroy {
  private readonly logger: Logger = new Logger(CacheStoreService.name);
  private readonly enabled: boolean;
  private readonly caches: CacheTable;

  public constructor(appConfigService: AppConfigService) {
    const maxKeys: number = appConfigService.cacheMaxEntriesPerKind;

    this.enabled = appConfigService.cacheEnabled;
    this.caches = {
      [CacheKind.BLOCKS]: new LruTtlCache<IBlockSummary>({
        ttlSec: appConfigService.cacheTtlBlocksSec,
        maxKeys,
      }),
      [CacheKind.TRANSACTIONS]: new LruTtlCache<ITransactionDetails>({
        ttlSec: appConfigService.cacheTtlTransactionsSec,
        maxKeys,
      }),
      [CacheKind.ADDRESSES]: new LruTtlCache<IAddressInfo>({
        ttlSec: appConfigService.cacheTtlAddressesSec,
        maxKeys,
      }),
      [CacheKind.CONTRACTS]: new LruTtlCache<IContractInfo>({
        ttlSec: appConfigService.cacheTtlContractsSec,
        maxKeys,
      }),
      [CacheKind.TOKENS]: new LruTtlCache<ITokenInfo>({
        ttlSec: appConfigService.cacheTtlTokensSec,
        maxKeys,
      }),
      [CacheKind.ADDRESS_HISTORY]: new LruTtlCache<readonly IAddressTransaction[]>({
        ttlSec: appConfigService.cacheTtlAddressHistorySec,
        maxKeys,
      }),
      [CacheKind.TOKEN_TRANSFERS]: new LruTtlCache<readonly ITokenTransfer[]>({
        ttlSec: appConfigService.cacheTtlTokenTransfersSec,
        maxKeys,
      }),
      [CacheKind.INTERNAL_TRANSACTIONS]: new LruTtlCache<readonly IInternalTransaction[]>({
        ttlSec: appConfigService.cacheTtlInternalTxsSec,
        maxKeys,
      }),
      [CacheKind.TOKEN_BALANCES]: new LruTtlCache<readonly ITokenBalance[]>({
        ttlSec: appConfigService.cacheTtlTokenBalancesSec,
        maxKeys,
      }),
      [CacheKind.ENS_NAMES]: new LruTtlCache<string | null>({
        ttlSec: appConfigService.cacheTtlEnsSec,
        maxKeys,
      }),
    };

    this.logger.log(
      `Cache store ready enabled=${String(this.enabled)}, maxEntriesPerKind=${maxKeys}`,
    );
  }

  public isEnabled(): boolean {
    return this.enabled;
  }

  public get<K extends CacheKind>(kind: K, key: string): ICacheValueMap[K] | undefined {
    if (!this.enabled) {
      return undefined;
    }

    return this.table(kind).get(this.normalizeKey(key));
  }

  public put<K extends CacheKind>(kind: K, key: string, value: ICacheValueMap[K]): void {
    if (!this.enabled) {
      return;
    }

    this.table(kind).set(this.normalizeKey(key), value);
  }

  public clearAll(): void {
    for (const kind of Object.values(CacheKind)) {
      this.caches[kind].flush();
    }

    this.logger.log('Cache store cleared');
  }

  public stats(): CacheStoreStats {
    const counts: Record<CacheKind, number> = this.collect(
      (stats: ICacheStats): number => stats.keys,
    );
    const total: number = Object.values(counts).reduce(
      (sum: number, count: number): number => sum + count,
      0,
    );

    return { ...counts, total };
  }

  public onModuleDestroy(): void {
    const perKind: Record<CacheKind, ICacheStats> = this.collect(
      (stats: ICacheStats): ICacheStats => stats,
    );

    for (const kind of Object.values(CacheKind)) {
      const stats: ICacheStats = perKind[kind];

      if (stats.hits + stats.misses === 0) {
        continue;
      }

      this.logger.log(
        `Cache ${kind}: keys=${stats.keys} hits=${stats.hits} misses=${stats.misses} ` +
          `evictions=${stats.evictions}`,
      );
    }
  }

  private table<K extends CacheKind>(kind: K): LruTtlCache<ICacheValueMap[K]> {
    return this.caches[kind];
  }

  private collect<TValue>(pick: (stats: ICacheStats) => TValue): Record<CacheKind, TValue> {
    return {
      [CacheKind.BLOCKS]: pick(this.caches[CacheKind.BLOCKS].stats()),
      [CacheKind.TRANSACTIONS]: pick(this.caches[CacheKind.TRANSACTIONS].stats()),
      [CacheKind.ADDRESSES]: pick(this.caches[CacheKind.ADDRESSES].stats()),
      [CacheKind.CONTRACTS]: pick(this.caches[CacheKind.CONTRACTS].stats()),
      [CacheKind.TOKENS]: pick(this.caches[CacheKind.TOKENS].stats()),
      [CacheKind.ADDRESS_HISTORY]: pick(this.caches[CacheKind.ADDRESS_HISTORY].stats()),
      [CacheKind.TOKEN_TRANSFERS]: pick(this.caches[CacheKind.TOKEN_TRANSFERS].stats()),
      [CacheKind.INTERNAL_TRANSACTIONS]: pick(
        this.caches[CacheKind.INTERNAL_TRANSACTIONS].stats(),
      ),
      [CacheKind.TOKEN_BALANCES]: pick(this.caches[CacheKind.TOKEN_BALANCES].stats()),
      [CacheKind.ENS_NAMES]: pick(this.caches[CacheKind.ENS_NAMES].stats()),
    };
  }

  // Addresses and hashes are hex; case differences must not split entries.
  private normalizeKey(key: string): string {
    return key.trim().toLowerCase();
  }
}
