import NodeCache from 'node-cache';

import type { ICacheStats, ISimpleCache, LruTtlCacheOptions } from './cache.interfaces';

/**
 * Bounded TTL cache. node-cache owns expiry (checked lazily on read, an expired
 * read deletes the entry); the recency set tracks access order for LRU eviction.
 */
export class LruTtlCache<T> implements ISimpleCache<T> {
  private readonly cache: NodeCache;
  private readonly maxKeys: number;
  private readonly recency: Set<string> = new Set<string>();
  private evictions: number = 0;

  public constructor(options: LruTtlCacheOptions) {
    this.maxKeys = options.maxKeys;
    this.cache = new NodeCache({
      stdTTL: options.ttlSec,
      checkperiod: 0,
      useClones: false,
    });

    this.cache.on('del', (key: NodeCache.Key): void => {
      this.recency.delete(String(key));
    });
  }

  public get(key: string): T | undefined {
    const value: T | undefined = this.cache.get<T>(key);

    if (value === undefined) {
      return undefined;
    }

    this.touch(key);
    return value;
  }

  public set(key: string, value: T): void {
    if (!this.cache.has(key)) {
      this.evictIfNeeded();
    }

    this.cache.set(key, value);
    this.touch(key);
  }

  public flush(): void {
    this.cache.flushAll();
    this.recency.clear();
  }

  public stats(): ICacheStats {
    const nodeStats: NodeCache.Stats = this.cache.getStats();

    return {
      keys: nodeStats.keys,
      hits: nodeStats.hits,
      misses: nodeStats.misses,
      evictions: this.evictions,
    };
  }

  private touch(key: string): void {
    this.recency.delete(key);
    this.recency.add(key);
  }

  private evictIfNeeded(): void {
    while (this.recency.size >= this.maxKeys) {
      const oldest: IteratorResult<string> = this.recency.values().next();

      if (oldest.done === true) {
        return;
      }

      this.recency.delete(oldest.value);
      this.cache.del(oldest.value);
      this.evictions += 1;
    }
  }
}
