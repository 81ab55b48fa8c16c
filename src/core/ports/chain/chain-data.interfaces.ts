export enum TransactionStatus {
  SUCCESS = 'success',
  FAILED = 'failed',
  PENDING = 'pending',
  UNKNOWN = 'unknown',
}

export interface ITransactionSummary {
  readonly hash: string;
  readonly blockNumber: number | null;
  readonly from: string;
  readonly to: string | null;
  readonly valueWei: string;
  readonly gasLimit: string;
  readonly gasPriceWei: string | null;
  readonly nonce: number;
  readonly input: string;
}

export interface IBlockSummary {
  readonly number: number;
  readonly hash: string;
  readonly parentHash: string;
  readonly timestampSec: number;
  readonly miner: string;
  readonly gasUsed: string;
  readonly gasLimit: string;
  readonly baseFeePerGasWei: string | null;
  readonly transactions: readonly ITransactionSummary[];
}

export interface IReceiptSummary {
  readonly txHash: string;
  readonly blockNumber: number;
  readonly status: TransactionStatus;
  readonly gasUsed: string;
  readonly effectiveGasPriceWei: string | null;
  readonly contractAddress: string | null;
  readonly logCount: number;
}

// Reads both backends can answer. Quantities are decimal strings in wei.
export interface IChainReader {
  getName(): string;
  getBalance(address: string): Promise<string>;
  getNonce(address: string): Promise<number>;
  getCode(address: string): Promise<string>;
  getBlock(blockNumber: number): Promise<IBlockSummary | null>;
  getLatestBlockNumber(): Promise<number>;
  getTransaction(txHash: string): Promise<ITransactionSummary | null>;
  getReceipt(txHash: string): Promise<IReceiptSummary | null>;
  getGasPrice(): Promise<string>;
  getChainId(): Promise<number>;
}
