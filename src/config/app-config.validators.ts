import type { ParsedEnv } from './app-config.schema';

const MIN_POLL_INTERVAL_MS = 100;
const WEBSOCKET_PROTOCOLS: readonly string[] = ['ws:', 'wss:'];

export function assertExplorerConfig(parsedEnv: ParsedEnv): void {
  assertCacheConfig(parsedEnv);
  assertSubscriptionConfig(parsedEnv);
  assertRpcConfig(parsedEnv);
}

function assertCacheConfig(parsedEnv: ParsedEnv): void {
  if (parsedEnv.CACHE_TTL_CONTRACTS_SEC < parsedEnv.CACHE_TTL_TOKEN_BALANCES_SEC) {
    throw new Error('CACHE_TTL_CONTRACTS_SEC must be >= CACHE_TTL_TOKEN_BALANCES_SEC');
  }
}

function assertSubscriptionConfig(parsedEnv: ParsedEnv): void {
  if (parsedEnv.SUBSCRIPTION_BLOCK_POLL_INTERVAL_MS < MIN_POLL_INTERVAL_MS) {
    throw new Error(`SUBSCRIPTION_BLOCK_POLL_INTERVAL_MS must be >= ${MIN_POLL_INTERVAL_MS}`);
  }

  if (parsedEnv.SUBSCRIPTION_ADDRESS_POLL_INTERVAL_MS < MIN_POLL_INTERVAL_MS) {
    throw new Error(`SUBSCRIPTION_ADDRESS_POLL_INTERVAL_MS must be >= ${MIN_POLL_INTERVAL_MS}`);
  }
}

function assertRpcConfig(parsedEnv: ParsedEnv): void {
  if (parsedEnv.RPC_WS_URL === undefined) {
    return;
  }

  const protocol: string = new URL(parsedEnv.RPC_WS_URL).protocol;

  if (!WEBSOCKET_PROTOCOLS.includes(protocol)) {
    throw new Error('RPC_WS_URL must use ws:// or wss://');
  }
}
