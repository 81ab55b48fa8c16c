export enum LimiterKey {
  ETHERSCAN = 'etherscan',
  ETH_RPC = 'eth_rpc',
}

// Bottleneck runs lower numbers first.
export enum RequestPriority {
  LOOKUP = 5,
  LISTING = 8,
}

export interface ILimiterSnapshot {
  readonly key: LimiterKey;
  readonly minTimeMs: number;
  readonly maxConcurrent: number;
  readonly queued: number;
  readonly running: number;
}
