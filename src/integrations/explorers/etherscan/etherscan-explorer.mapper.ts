import type {
  ContractSourceRow,
  InternalTransactionRow,
  NormalTransactionRow,
  ProxyBlock,
  ProxyReceipt,
  ProxyTransaction,
  TokenBalanceRow,
  TokenTransferRow,
} from './etherscan-explorer.schemas';
import {
  type IBlockSummary,
  type IReceiptSummary,
  type ITransactionSummary,
  TransactionStatus,
} from '../../../core/ports/chain/chain-data.interfaces';
import type {
  IAddressTransaction,
  IContractSource,
  IInternalTransaction,
  ITokenBalance,
  ITokenTransfer,
} from '../../../core/ports/explorers/indexed-explorer.interfaces';

const DEFAULT_TOKEN_DECIMALS = 18;
const METHOD_SELECTOR_LENGTH = 10;
const UNVERIFIED_ABI_MESSAGE = 'Contract source code not verified';

export const hexToBigInt = (value: string): bigint => (value === '0x' ? 0n : BigInt(value));

export const hexToNumber = (value: string): number => Number(hexToBigInt(value));

export const hexToDecimalString = (value: string): string => hexToBigInt(value).toString();

const optionalHexToDecimal = (value: string | null | undefined): string | null =>
  value === null || value === undefined ? null : hexToDecimalString(value);

const parseDecimals = (value: string): number => {
  const parsed: number = Number.parseInt(value, 10);

  return Number.isNaN(parsed) ? DEFAULT_TOKEN_DECIMALS : parsed;
};

const nonEmpty = (value: string | undefined): string | null =>
  value !== undefined && value.trim().length > 0 ? value : null;

export const resolveMethodName = (row: NormalTransactionRow): string => {
  const explicit: string | null =
    nonEmpty(row.functionName) ?? nonEmpty(row.methodId) ?? nonEmpty(row.method);

  if (explicit !== null) {
    return explicit;
  }

  if (row.input !== undefined && row.input.length >= METHOD_SELECTOR_LENGTH) {
    return row.input.slice(0, METHOD_SELECTOR_LENGTH);
  }

  return '';
};

export const resolveRowStatus = (isError: string): TransactionStatus => {
  if (isError === '0') {
    return TransactionStatus.SUCCESS;
  }

  if (isError === '1') {
    return TransactionStatus.FAILED;
  }

  return TransactionStatus.UNKNOWN;
};

export const mapNormalTransaction = (row: NormalTransactionRow): IAddressTransaction => ({
  hash: row.hash,
  blockNumber: Number.parseInt(row.blockNumber, 10),
  timestampSec: Number.parseInt(row.timeStamp, 10),
  from: row.from,
  to: row.to,
  valueWei: row.value,
  gasPriceWei: row.gasPrice,
  gasUsed: row.gasUsed,
  feeWei: (BigInt(row.gasPrice) * BigInt(row.gasUsed)).toString(),
  methodName: resolveMethodName(row),
  status: resolveRowStatus(row.isError),
});

export const mapTokenTransfer = (row: TokenTransferRow): ITokenTransfer => ({
  hash: row.hash,
  blockNumber: row.blockNumber === undefined ? 0 : Number.parseInt(row.blockNumber, 10),
  timestampSec: Number.parseInt(row.timeStamp, 10),
  from: row.from,
  to: row.to,
  contractAddress: row.contractAddress,
  valueRaw: row.value,
  tokenName: row.tokenName,
  tokenSymbol: row.tokenSymbol,
  tokenDecimals: parseDecimals(row.tokenDecimal),
  tokenId: nonEmpty(row.tokenID),
});

export const mapInternalTransaction = (row: InternalTransactionRow): IInternalTransaction => ({
  parentHash: row.hash,
  blockNumber: Number.parseInt(row.blockNumber, 10),
  timestampSec: Number.parseInt(row.timeStamp, 10),
  from: row.from,
  to: row.to,
  valueWei: row.value,
  gas: row.gas,
  gasUsed: row.gasUsed,
  callType: row.type,
  isError: row.isError === '1',
});

export const mapTokenBalance = (row: TokenBalanceRow): ITokenBalance => ({
  contractAddress: row.contractAddress,
  name: row.name,
  symbol: row.symbol,
  decimals: parseDecimals(row.decimals),
  balanceRaw: row.balance,
});

export const mapContractSource = (
  address: string,
  row: ContractSourceRow | null,
): IContractSource => {
  if (row === null) {
    return {
      address,
      name: null,
      compilerVersion: null,
      abi: null,
      sourceCode: null,
      isVerified: false,
    };
  }

  const isVerified: boolean = row.SourceCode.length > 0 && row.ABI !== UNVERIFIED_ABI_MESSAGE;

  return {
    address,
    name: nonEmpty(row.ContractName),
    compilerVersion: nonEmpty(row.CompilerVersion),
    abi: isVerified ? row.ABI : null,
    sourceCode: isVerified ? row.SourceCode : null,
    isVerified,
  };
};

export const mapProxyTransaction = (tx: ProxyTransaction): ITransactionSummary => ({
  hash: tx.hash,
  blockNumber:
    tx.blockNumber === null || tx.blockNumber === undefined ? null : hexToNumber(tx.blockNumber),
  from: tx.from,
  to: tx.to ?? null,
  valueWei: hexToDecimalString(tx.value),
  gasLimit: hexToDecimalString(tx.gas),
  gasPriceWei: optionalHexToDecimal(tx.gasPrice),
  nonce: hexToNumber(tx.nonce),
  input: tx.input,
});

export const mapProxyBlock = (block: ProxyBlock): IBlockSummary => ({
  number: hexToNumber(block.number),
  hash: block.hash,
  parentHash: block.parentHash,
  timestampSec: hexToNumber(block.timestamp),
  miner: block.miner,
  gasUsed: hexToDecimalString(block.gasUsed),
  gasLimit: hexToDecimalString(block.gasLimit),
  baseFeePerGasWei: optionalHexToDecimal(block.baseFeePerGas),
  transactions: block.transactions.flatMap(
    (entry: string | ProxyTransaction): ITransactionSummary[] =>
      typeof entry === 'string' ? [] : [mapProxyTransaction(entry)],
  ),
});

const mapReceiptStatus = (status: string | null | undefined): TransactionStatus => {
  if (status === null || status === undefined) {
    return TransactionStatus.UNKNOWN;
  }

  return hexToBigInt(status) === 1n ? TransactionStatus.SUCCESS : TransactionStatus.FAILED;
};

export const mapProxyReceipt = (receipt: ProxyReceipt): IReceiptSummary => ({
  txHash: receipt.transactionHash,
  blockNumber: hexToNumber(receipt.blockNumber),
  status: mapReceiptStatus(receipt.status),
  gasUsed: hexToDecimalString(receipt.gasUsed),
  effectiveGasPriceWei: optionalHexToDecimal(receipt.effectiveGasPrice),
  contractAddress: receipt.contractAddress ?? null,
  logCount: receipt.logs.length,
});
