export type NodeEnv = 'development' | 'test' | 'production';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type AppConfig = {
  readonly nodeEnv: NodeEnv;
  readonly logLevel: LogLevel;
  readonly settingsPath: string | null;
  readonly rpcUrl: string;
  readonly rpcWsUrl: string | null;
  readonly chainId: number;
  readonly rpcTimeoutMs: number;
  readonly rpcNodeLocal: boolean;
  readonly etherscanApiBaseUrl: string;
  readonly etherscanApiKey: string | null;
  readonly etherscanTimeoutMs: number;
  readonly cacheEnabled: boolean;
  readonly cacheMaxEntriesPerKind: number;
  readonly cacheTtlBlocksSec: number;
  readonly cacheTtlTransactionsSec: number;
  readonly cacheTtlAddressesSec: number;
  readonly cacheTtlContractsSec: number;
  readonly cacheTtlTokensSec: number;
  readonly cacheTtlAddressHistorySec: number;
  readonly cacheTtlTokenTransfersSec: number;
  readonly cacheTtlInternalTxsSec: number;
  readonly cacheTtlTokenBalancesSec: number;
  readonly cacheTtlEnsSec: number;
  readonly blockPollIntervalMs: number;
  readonly addressPollIntervalMs: number;
  readonly rateLimitEtherscanMinTimeMs: number;
  readonly rateLimitEtherscanMaxConcurrent: number;
  readonly rateLimitEthRpcMinTimeMs: number;
  readonly rateLimitEthRpcMaxConcurrent: number;
};
