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

export enum CacheKind {
  BLOCKS = 'blocks',
  TRANSACTIONS = 'transactions',
  ADDRESSES = 'addresses',
  CONTRACTS = 'contracts',
  TOKENS = 'tokens',
  ADDRESS_HISTORY = 'address_history',
  TOKEN_TRANSFERS = 'token_transfers',
  INTERNAL_TRANSACTIONS = 'internal_transactions',
  TOKEN_BALANCES = 'token_balances',
  ENS_NAMES = 'ens_names',
}

export interface ICacheValueMap {
  readonly [CacheKind.BLOCKS]: IBlockSummary;
  readonly [CacheKind.TRANSACTIONS]: ITransactionDetails;
  readonly [CacheKind.ADDRESSES]: IAddressInfo;
  readonly [CacheKind.CONTRACTS]: IContractInfo;
  readonly [CacheKind.TOKENS]: ITokenInfo;
  readonly [CacheKind.ADDRESS_HISTORY]: readonly IAddressTransaction[];
  readonly [CacheKind.TOKEN_TRANSFERS]: readonly ITokenTransfer[];
  readonly [CacheKind.INTERNAL_TRANSACTIONS]: readonly IInternalTransaction[];
  readonly [CacheKind.TOKEN_BALANCES]: readonly ITokenBalance[];
  // null records a confirmed "no name bound"
  readonly [CacheKind.ENS_NAMES]: string | null;
}

export type CacheStoreStats = Readonly<Record<CacheKind, number>> & {
  readonly total: number;
};
