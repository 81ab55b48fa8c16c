import { z } from 'zod';

const booleanSchema = z
  .union([z.boolean(), z.string()])
  .transform((value: string | boolean): boolean => {
    if (typeof value === 'boolean') {
      return value;
    }

    const normalizedValue: string = value.trim().toLowerCase();

    return normalizedValue === 'true' || normalizedValue === '1' || normalizedValue === 'yes';
  });

const optionalNonEmptyStringSchema = z
  .string()
  .trim()
  .optional()
  .transform((value: string | undefined): string | undefined => {
    if (typeof value !== 'string') {
      return undefined;
    }

    return value.length > 0 ? value : undefined;
  });

const DEFAULT_RPC_URL = 'http://127.0.0.1:8545';
const DEFAULT_CHAIN_ID = 1;
const DEFAULT_RPC_TIMEOUT_SEC = 30;
const DEFAULT_ETHERSCAN_TIMEOUT_MS = 10_000;
const DEFAULT_CACHE_MAX_ENTRIES_PER_KIND = 1000;
const DEFAULT_CACHE_TTL_BLOCKS_SEC = 3600;
const DEFAULT_CACHE_TTL_TRANSACTIONS_SEC = 7200;
const DEFAULT_CACHE_TTL_ADDRESSES_SEC = 1800;
const DEFAULT_CACHE_TTL_CONTRACTS_SEC = 86_400;
const DEFAULT_CACHE_TTL_TOKENS_SEC = 3600;
const DEFAULT_CACHE_TTL_ADDRESS_HISTORY_SEC = 60;
const DEFAULT_CACHE_TTL_TOKEN_TRANSFERS_SEC = 60;
const DEFAULT_CACHE_TTL_INTERNAL_TXS_SEC = 60;
const DEFAULT_CACHE_TTL_TOKEN_BALANCES_SEC = 30;
const DEFAULT_CACHE_TTL_ENS_SEC = 3600;
const DEFAULT_BLOCK_POLL_INTERVAL_MS = 2000;
const DEFAULT_ADDRESS_POLL_INTERVAL_MS = 3000;
const DEFAULT_RATE_LIMIT_ETHERSCAN_MIN_TIME_MS = 200;
const DEFAULT_RATE_LIMIT_ETHERSCAN_MAX_CONCURRENT = 1;
const DEFAULT_RATE_LIMIT_ETH_RPC_MIN_TIME_MS = 0;
const DEFAULT_RATE_LIMIT_ETH_RPC_MAX_CONCURRENT = 4;

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  EXPLORER_SETTINGS_PATH: optionalNonEmptyStringSchema,
  RPC_URL: z.url().optional(),
  RPC_WS_URL: z.url().optional(),
  CHAIN_ID: z.coerce.number().int().positive().optional(),
  RPC_TIMEOUT_SEC: z.coerce.number().int().positive().default(DEFAULT_RPC_TIMEOUT_SEC),
  RPC_NODE_LOCAL: booleanSchema.default(false),
  ETHERSCAN_API_BASE_URL: z.url().default('https://api.etherscan.io/v2/api'),
  ETHERSCAN_API_KEY: optionalNonEmptyStringSchema,
  ETHERSCAN_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_ETHERSCAN_TIMEOUT_MS),
  CACHE_ENABLED: booleanSchema.default(true),
  CACHE_MAX_ENTRIES_PER_KIND: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_CACHE_MAX_ENTRIES_PER_KIND),
  CACHE_TTL_BLOCKS_SEC: z.coerce.number().int().positive().default(DEFAULT_CACHE_TTL_BLOCKS_SEC),
  CACHE_TTL_TRANSACTIONS_SEC: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_CACHE_TTL_TRANSACTIONS_SEC),
  CACHE_TTL_ADDRESSES_SEC: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_CACHE_TTL_ADDRESSES_SEC),
  CACHE_TTL_CONTRACTS_SEC: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_CACHE_TTL_CONTRACTS_SEC),
  CACHE_TTL_TOKENS_SEC: z.coerce.number().int().positive().default(DEFAULT_CACHE_TTL_TOKENS_SEC),
  CACHE_TTL_ADDRESS_HISTORY_SEC: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_CACHE_TTL_ADDRESS_HISTORY_SEC),
  CACHE_TTL_TOKEN_TRANSFERS_SEC: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_CACHE_TTL_TOKEN_TRANSFERS_SEC),
  CACHE_TTL_INTERNAL_TXS_SEC: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_CACHE_TTL_INTERNAL_TXS_SEC),
  CACHE_TTL_TOKEN_BALANCES_SEC: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_CACHE_TTL_TOKEN_BALANCES_SEC),
  CACHE_TTL_ENS_SEC: z.coerce.number().int().positive().default(DEFAULT_CACHE_TTL_ENS_SEC),
  SUBSCRIPTION_BLOCK_POLL_INTERVAL_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_BLOCK_POLL_INTERVAL_MS),
  SUBSCRIPTION_ADDRESS_POLL_INTERVAL_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_ADDRESS_POLL_INTERVAL_MS),
  RATE_LIMIT_ETHERSCAN_MIN_TIME_MS: z.coerce
    .number()
    .int()
    .min(0)
    .default(DEFAULT_RATE_LIMIT_ETHERSCAN_MIN_TIME_MS),
  RATE_LIMIT_ETHERSCAN_MAX_CONCURRENT: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_RATE_LIMIT_ETHERSCAN_MAX_CONCURRENT),
  RATE_LIMIT_ETH_RPC_MIN_TIME_MS: z.coerce
    .number()
    .int()
    .min(0)
    .default(DEFAULT_RATE_LIMIT_ETH_RPC_MIN_TIME_MS),
  RATE_LIMIT_ETH_RPC_MAX_CONCURRENT: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_RATE_LIMIT_ETH_RPC_MAX_CONCURRENT),
});

// Values an on-disk settings file may provide. Environment variables take precedence.
export const persistedSettingsSchema = z.object({
  rpcUrl: z.url().optional(),
  chainId: z.number().int().positive().optional(),
  etherscanApiKey: z.string().trim().min(1).optional(),
});

export type ParsedEnv = z.infer<typeof envSchema>;

export type PersistedSettings = z.infer<typeof persistedSettingsSchema>;

export const CONFIG_FALLBACKS = {
  rpcUrl: DEFAULT_RPC_URL,
  chainId: DEFAULT_CHAIN_ID,
} as const;
