import { describe, expect, it } from 'vitest';

import {
  buildTransactionDetails,
  computeConfirmations,
  computeFeeWei,
  type ITransactionDetailsInput,
} from './transaction-details.builder';
import { type ITransfer, TransferKind } from '../core/explorer/explorer-entities.interfaces';
import {
  type IReceiptSummary,
  type ITransactionSummary,
  TransactionStatus,
} from '../core/ports/chain/chain-data.interfaces';
import type { ITokenTransfer } from '../core/ports/explorers/indexed-explorer.interfaces';

const TX_HASH = '0x5c504ed432cb51138bcf09aa5e8a410dd4a1e204ef84bfed1be16dfba1b22060';
const OTHER_HASH = '0x0000000000000000000000000000000000000000000000000000000000000001';
const SENDER = '0x1111111111111111111111111111111111111111';
const RECEIVER = '0x2222222222222222222222222222222222222222';
const TOKEN = '0x3333333333333333333333333333333333333333';

const transaction: ITransactionSummary = {
  hash: TX_HASH,
  blockNumber: 100,
  from: SENDER,
  to: RECEIVER,
  valueWei: '1000',
  gasLimit: '60000',
  gasPriceWei: '9',
  nonce: 4,
  input: '0x',
};

const receipt: IReceiptSummary = {
  txHash: TX_HASH,
  blockNumber: 100,
  status: TransactionStatus.SUCCESS,
  gasUsed: '21000',
  effectiveGasPriceWei: '7',
  contractAddress: null,
  logCount: 2,
};

const tokenTransfer = (hash: string, valueRaw: string): ITokenTransfer => ({
  hash,
  blockNumber: 100,
  timestampSec: 1_700_000_000,
  from: SENDER,
  to: RECEIVER,
  contractAddress: TOKEN,
  valueRaw,
  tokenName: 'Test Token',
  tokenSymbol: 'TT',
  tokenDecimals: 6,
  tokenId: null,
});

const createInput = (
  overrides: Partial<ITransactionDetailsInput> = {},
): ITransactionDetailsInput => ({
  transaction,
  receipt,
  headBlockNumber: 110,
  timestampSec: 1_700_000_000,
  tokenTransfers: [],
  internalTransactions: [],
  ...overrides,
});

describe('transaction details builder', (): void => {
  it('clamps confirmations at zero', (): void => {
    expect(computeConfirmations(110, 100)).toBe(10);
    expect(computeConfirmations(100, 100)).toBe(0);
    expect(computeConfirmations(95, 100)).toBe(0);
    expect(computeConfirmations(95, null)).toBe(0);
  });

  it('multiplies gas used by effective price', (): void => {
    expect(computeFeeWei('21000', '7')).toBe('147000');
  });

  it('places native transfer first ahead of token transfers', (): void => {
    const details = buildTransactionDetails(
      createInput({
        tokenTransfers: [tokenTransfer(TX_HASH, '5'), tokenTransfer(TX_HASH, '6')],
      }),
    );

    expect(details.transfers.map((transfer: ITransfer): TransferKind => transfer.kind)).toEqual([
      TransferKind.NATIVE,
      TransferKind.TOKEN,
      TransferKind.TOKEN,
    ]);
    expect(details.transfers[0]).toEqual({
      kind: TransferKind.NATIVE,
      from: SENDER,
      to: RECEIVER,
      value: '1000',
      token: null,
    });
    expect(details.confirmations).toBe(10);
    expect(details.feeWei).toBe('147000');
    expect(details.status).toBe(TransactionStatus.SUCCESS);
  });

  it('keeps only transfers of this hash and removes duplicates', (): void => {
    const details = buildTransactionDetails(
      createInput({
        transaction: { ...transaction, valueWei: '0' },
        tokenTransfers: [
          tokenTransfer(TX_HASH, '5'),
          tokenTransfer(TX_HASH.toUpperCase().replace('0X', '0x'), '5'),
          tokenTransfer(OTHER_HASH, '5'),
        ],
        internalTransactions: [
          {
            parentHash: TX_HASH,
            blockNumber: 100,
            timestampSec: 1_700_000_000,
            from: RECEIVER,
            to: SENDER,
            valueWei: '42',
            gas: '2300',
            gasUsed: '0',
            callType: 'call',
            isError: false,
          },
          {
            parentHash: OTHER_HASH,
            blockNumber: 100,
            timestampSec: 1_700_000_000,
            from: RECEIVER,
            to: SENDER,
            valueWei: '43',
            gas: '2300',
            gasUsed: '0',
            callType: 'call',
            isError: false,
          },
        ],
      }),
    );

    expect(details.transfers).toEqual([
      {
        kind: TransferKind.TOKEN,
        from: SENDER,
        to: RECEIVER,
        value: '5',
        token: {
          contractAddress: TOKEN,
          name: 'Test Token',
          symbol: 'TT',
          decimals: 6,
          tokenId: null,
        },
      },
      {
        kind: TransferKind.INTERNAL,
        from: RECEIVER,
        to: SENDER,
        value: '42',
        token: null,
      },
    ]);
  });

  it('reports pending transaction without receipt', (): void => {
    const details = buildTransactionDetails(
      createInput({
        transaction: { ...transaction, blockNumber: null },
        receipt: null,
        timestampSec: null,
      }),
    );

    expect(details.status).toBe(TransactionStatus.PENDING);
    expect(details.blockNumber).toBeNull();
    expect(details.confirmations).toBe(0);
    expect(details.gasUsed).toBeNull();
    expect(details.feeWei).toBeNull();
    expect(details.effectiveGasPriceWei).toBe('9');
  });
});
