export interface ISimpleCache<T> {
  get(key: string): T | undefined;
  set(key: string, value: T): void;
  flush(): void;
  stats(): ICacheStats;
}

export interface ICacheStats {
  readonly keys: number;
  readonly hits: number;
  readonly misses: number;
  readonly evictions: number;
}

export type LruTtlCacheOptions = {
  readonly ttlSec: number;
  readonly maxKeys: number;
};
