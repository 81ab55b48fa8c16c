import { CONFIG_FALLBACKS, type ParsedEnv, type PersistedSettings } from './app-config.schema';
import type { AppConfig } from './app-config.types';

const MS_PER_SECOND = 1000;

export const mapAppConfig = (parsedEnv: ParsedEnv, persisted: PersistedSettings): AppConfig =>
  Object.freeze({
    ...mapCoreConfig(parsedEnv),
    ...mapRpcConfig(parsedEnv, persisted),
    ...mapExplorerConfig(parsedEnv, persisted),
    ...mapCacheConfig(parsedEnv),
    ...mapSubscriptionConfig(parsedEnv),
    ...mapRateLimitConfig(parsedEnv),
  });

const mapCoreConfig = (
  parsedEnv: ParsedEnv,
): Pick<AppConfig, 'nodeEnv' | 'logLevel' | 'settingsPath'> => ({
  nodeEnv: parsedEnv.NODE_ENV,
  logLevel: parsedEnv.LOG_LEVEL,
  settingsPath: parsedEnv.EXPLORER_SETTINGS_PATH ?? null,
});

const mapRpcConfig = (
  parsedEnv: ParsedEnv,
  persisted: PersistedSettings,
): Pick<AppConfig, 'rpcUrl' | 'rpcWsUrl' | 'chainId' | 'rpcTimeoutMs' | 'rpcNodeLocal'> => ({
  rpcUrl: parsedEnv.RPC_URL ?? persisted.rpcUrl ?? CONFIG_FALLBACKS.rpcUrl,
  rpcWsUrl: parsedEnv.RPC_WS_URL ?? null,
  chainId: parsedEnv.CHAIN_ID ?? persisted.chainId ?? CONFIG_FALLBACKS.chainId,
  rpcTimeoutMs: parsedEnv.RPC_TIMEOUT_SEC * MS_PER_SECOND,
  rpcNodeLocal: parsedEnv.RPC_NODE_LOCAL,
});

const mapExplorerConfig = (
  parsedEnv: ParsedEnv,
  persisted: PersistedSettings,
): Pick<AppConfig, 'etherscanApiBaseUrl' | 'etherscanApiKey' | 'etherscanTimeoutMs'> => ({
  etherscanApiBaseUrl: parsedEnv.ETHERSCAN_API_BASE_URL,
  etherscanApiKey: parsedEnv.ETHERSCAN_API_KEY ?? persisted.etherscanApiKey ?? null,
  etherscanTimeoutMs: parsedEnv.ETHERSCAN_TIMEOUT_MS,
});

const mapCacheConfig = (
  parsedEnv: ParsedEnv,
): Pick<
  AppConfig,
  | 'cacheEnabled'
  | 'cacheMaxEntriesPerKind'
  | 'cacheTtlBlocksSec'
  | 'cacheTtlTransactionsSec'
  | 'cacheTtlAddressesSec'
  | 'cacheTtlContractsSec'
  | 'cacheTtlTokensSec'
  | 'cacheTtlAddressHistorySec'
  | 'cacheTtlTokenTransfersSec'
  | 'cacheTtlInternalTxsSec'
  | 'cacheTtlTokenBalancesSec'
  | 'cacheTtlEnsSec'
> => ({
  cacheEnabled: parsedEnv.CACHE_ENABLED,
  cacheMaxEntriesPerKind: parsedEnv.CACHE_MAX_ENTRIES_PER_KIND,
  cacheTtlBlocksSec: parsedEnv.CACHE_TTL_BLOCKS_SEC,
  cacheTtlTransactionsSec: parsedEnv.CACHE_TTL_TRANSACTIONS_SEC,
  cacheTtlAddressesSec: parsedEnv.CACHE_TTL_ADDRESSES_SEC,
  cacheTtlContractsSec: parsedEnv.CACHE_TTL_CONTRACTS_SEC,
  cacheTtlTokensSec: parsedEnv.CACHE_TTL_TOKENS_SEC,
  cacheTtlAddressHistorySec: parsedEnv.CACHE_TTL_ADDRESS_HISTORY_SEC,
  cacheTtlTokenTransfersSec: parsedEnv.CACHE_TTL_TOKEN_TRANSFERS_SEC,
  cacheTtlInternalTxsSec: parsedEnv.CACHE_TTL_INTERNAL_TXS_SEC,
  cacheTtlTokenBalancesSec: parsedEnv.CACHE_TTL_TOKEN_BALANCES_SEC,
  cacheTtlEnsSec: parsedEnv.CACHE_TTL_ENS_SEC,
});

const mapSubscriptionConfig = (
  parsedEnv: ParsedEnv,
): Pick<AppConfig, 'blockPollIntervalMs' | 'addressPollIntervalMs'> => ({
  blockPollIntervalMs: parsedEnv.SUBSCRIPTION_BLOCK_POLL_INTERVAL_MS,
  addressPollIntervalMs: parsedEnv.SUBSCRIPTION_ADDRESS_POLL_INTERVAL_MS,
});

const mapRateLimitConfig = (
  parsedEnv: ParsedEnv,
): Pick<
  AppConfig,
  | 'rateLimitEtherscanMinTimeMs'
  | 'rateLimitEtherscanMaxConcurrent'
  | 'rateLimitEthRpcMinTimeMs'
  | 'rateLimitEthRpcMaxConcurrent'
> => ({
  rateLimitEtherscanMinTimeMs: parsedEnv.RATE_LIMIT_ETHERSCAN_MIN_TIME_MS,
  rateLimitEtherscanMaxConcurrent: parsedEnv.RATE_LIMIT_ETHERSCAN_MAX_CONCURRENT,
  rateLimitEthRpcMinTimeMs: parsedEnv.RATE_LIMIT_ETH_RPC_MIN_TIME_MS,
  rateLimitEthRpcMaxConcurrent: parsedEnv.RATE_LIMIT_ETH_RPC_MAX_CONCURRENT,
});
