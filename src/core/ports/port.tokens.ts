export const RPC_ADAPTER: unique symbol = Symbol('RPC_ADAPTER');
export const INDEXED_EXPLORER_ADAPTER: unique symbol = Symbol('INDEXED_EXPLORER_ADAPTER');
