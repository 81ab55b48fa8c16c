import {
  type ITransactionDetails,
  type ITransfer,
  TransferKind,
} from '../core/explorer/explorer-entities.interfaces';
import {
  type IReceiptSummary,
  type ITransactionSummary,
  TransactionStatus,
} from '../core/ports/chain/chain-data.interfaces';
import type {
  IInternalTransaction,
  ITokenTransfer,
} from '../core/ports/explorers/indexed-explorer.interfaces';

export interface ITransactionDetailsInput {
  readonly transaction: ITransactionSummary;
  readonly receipt: IReceiptSummary | null;
  readonly headBlockNumber: number;
  readonly timestampSec: number | null;
  readonly tokenTransfers: readonly ITokenTransfer[];
  readonly internalTransactions: readonly IInternalTransaction[];
}

export const computeConfirmations = (
  headBlockNumber: number,
  txBlockNumber: number | null,
): number => (txBlockNumber === null ? 0 : Math.max(0, headBlockNumber - txBlockNumber));

export const computeFeeWei = (gasUsed: string, effectiveGasPriceWei: string): string =>
  (BigInt(gasUsed) * BigInt(effectiveGasPriceWei)).toString();

const sameHash = (left: string, right: string): boolean =>
  left.toLowerCase() === right.toLowerCase();

const tokenTransferKey = (transfer: ITokenTransfer): string =>
  [
    transfer.contractAddress,
    transfer.from,
    transfer.to,
    transfer.valueRaw,
    transfer.tokenId ?? '',
  ]
    .join('|')
    .toLowerCase();

const resolveStatus = (
  transaction: ITransactionSummary,
  receipt: IReceiptSummary | null,
): TransactionStatus => {
  if (receipt) {
    return receipt.status;
  }

  return transaction.blockNumber === null ? TransactionStatus.PENDING : TransactionStatus.UNKNOWN;
};

export const collectTransfers = (input: ITransactionDetailsInput): ITransfer[] => {
  const { transaction, receipt } = input;
  const transfers: ITransfer[] = [];

  if (BigInt(transaction.valueWei) > 0n) {
    transfers.push({
      kind: TransferKind.NATIVE,
      from: transaction.from,
      to: transaction.to ?? receipt?.contractAddress ?? '',
      value: transaction.valueWei,
      token: null,
    });
  }

  const seenTokenTransfers: Set<string> = new Set<string>();

  for (const tokenTransfer of input.tokenTransfers) {
    if (!sameHash(tokenTransfer.hash, transaction.hash)) {
      continue;
    }

    const key: string = tokenTransferKey(tokenTransfer);

    if (seenTokenTransfers.has(key)) {
      continue;
    }

    seenTokenTransfers.add(key);
    transfers.push({
      kind: TransferKind.TOKEN,
      from: tokenTransfer.from,
      to: tokenTransfer.to,
      value: tokenTransfer.valueRaw,
      token: {
        contractAddress: tokenTransfer.contractAddress,
        name: tokenTransfer.tokenName,
        symbol: tokenTransfer.tokenSymbol,
        decimals: tokenTransfer.tokenDecimals,
        tokenId: tokenTransfer.tokenId,
      },
    });
  }

  for (const internalTransaction of input.internalTransactions) {
    if (
      !sameHash(internalTransaction.parentHash, transaction.hash) ||
      BigInt(internalTransaction.valueWei) === 0n
    ) {
      continue;
    }

    transfers.push({
      kind: TransferKind.INTERNAL,
      from: internalTransaction.from,
      to: internalTransaction.to,
      value: internalTransaction.valueWei,
      token: null,
    });
  }

  return transfers;
};

export const buildTransactionDetails = (input: ITransactionDetailsInput): ITransactionDetails => {
  const { transaction, receipt } = input;
  const blockNumber: number | null = receipt?.blockNumber ?? transaction.blockNumber;
  const effectiveGasPriceWei: string | null =
    receipt?.effectiveGasPriceWei ?? transaction.gasPriceWei;
  const gasUsed: string | null = receipt ? receipt.gasUsed : null;

  return {
    transaction,
    receipt,
    status: resolveStatus(transaction, receipt),
    blockNumber,
    timestampSec: input.timestampSec,
    confirmations: computeConfirmations(input.headBlockNumber, blockNumber),
    gasUsed,
    effectiveGasPriceWei,
    feeWei:
      gasUsed !== null && effectiveGasPriceWei !== null
        ? computeFeeWei(gasUsed, effectiveGasPriceWei)
        : null,
    transfers: collectTransfers(input),
  };
};
