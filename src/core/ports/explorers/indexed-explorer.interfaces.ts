import type { IChainReader, TransactionStatus } from '../chain/chain-data.interfaces';

export interface IAddressTransaction {
  readonly hash: string;
  readonly blockNumber: number;
  readonly timestampSec: number;
  readonly from: string;
  readonly to: string;
  readonly valueWei: string;
  readonly gasPriceWei: string;
  readonly gasUsed: string;
  readonly feeWei: string;
  readonly methodName: string;
  readonly status: TransactionStatus;
}

export interface ITokenTransfer {
  readonly hash: string;
  readonly blockNumber: number;
  readonly timestampSec: number;
  readonly from: string;
  readonly to: string;
  readonly contractAddress: string;
  readonly valueRaw: string;
  readonly tokenName: string;
  readonly tokenSymbol: string;
  readonly tokenDecimals: number;
  readonly tokenId: string | null;
}

export interface IInternalTransaction {
  readonly parentHash: string;
  readonly blockNumber: number;
  readonly timestampSec: number;
  readonly from: string;
  readonly to: string;
  readonly valueWei: string;
  readonly gas: string;
  readonly gasUsed: string;
  readonly callType: string;
  readonly isError: boolean;
}

export interface ITokenBalance {
  readonly contractAddress: string;
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
  readonly balanceRaw: string;
}

export interface IContractSource {
  readonly address: string;
  readonly name: string | null;
  readonly compilerVersion: string | null;
  readonly abi: string | null;
  readonly sourceCode: string | null;
  readonly isVerified: boolean;
}

export interface IIndexedExplorerAdapter extends IChainReader {
  isConfigured(): boolean;
  getAddressTransactions(address: string): Promise<readonly IAddressTransaction[]>;
  getTokenTransfers(address: string): Promise<readonly ITokenTransfer[]>;
  getInternalTransactions(address: string): Promise<readonly IInternalTransaction[]>;
  getTokenBalances(address: string): Promise<readonly ITokenBalance[]>;
  getContractSource(address: string): Promise<IContractSource>;
}
