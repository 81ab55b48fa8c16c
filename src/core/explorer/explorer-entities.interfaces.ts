import type {
  IReceiptSummary,
  ITransactionSummary,
  TransactionStatus,
} from '../ports/chain/chain-data.interfaces';
import type {
  IAddressTransaction,
  IContractSource,
  IInternalTransaction,
  ITokenBalance,
  ITokenTransfer,
} from '../ports/explorers/indexed-explorer.interfaces';
import type { ITokenMetadata } from '../ports/rpc/rpc-adapter.interfaces';

export interface IAddressInfo {
  readonly address: string;
  readonly balanceWei: string;
  readonly transactionCount: number;
  readonly isContract: boolean;
  readonly lastUpdatedSec: number;
}

export interface IContractInfo extends IContractSource {
  readonly lastUpdatedSec: number;
}

export interface ITokenInfo extends ITokenMetadata {
  readonly lastUpdatedSec: number;
}

export enum TransferKind {
  NATIVE = 'native',
  TOKEN = 'token',
  INTERNAL = 'internal',
}

export interface ITransferTokenMeta {
  readonly contractAddress: string;
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
  readonly tokenId: string | null;
}

export interface ITransfer {
  readonly kind: TransferKind;
  readonly from: string;
  readonly to: string;
  readonly value: string;
  readonly token: ITransferTokenMeta | null;
}

export interface ITransactionDetails {
  readonly transaction: ITransactionSummary;
  readonly receipt: IReceiptSummary | null;
  readonly status: TransactionStatus;
  readonly blockNumber: number | null;
  readonly timestampSec: number | null;
  readonly confirmations: number;
  readonly gasUsed: string | null;
  readonly effectiveGasPriceWei: string | null;
  readonly feeWei: string | null;
  readonly transfers: readonly ITransfer[];
}

export interface IGasPrices {
  readonly slowWei: string;
  readonly standardWei: string;
  readonly fastWei: string;
  readonly timestampSec: number;
}

export interface IAddressOverview {
  readonly info: IAddressInfo;
  readonly ensName: string | null;
  readonly transactions: readonly IAddressTransaction[];
  readonly tokenTransfers: readonly ITokenTransfer[];
  readonly tokenBalances: readonly ITokenBalance[];
  readonly internalTransactions: readonly IInternalTransaction[];
}
