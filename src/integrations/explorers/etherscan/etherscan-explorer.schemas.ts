import { z } from 'zod';

export enum EtherscanModule {
  ACCOUNT = 'account',
  CONTRACT = 'contract',
  PROXY = 'proxy',
}

export enum EtherscanAction {
  BALANCE = 'balance',
  TX_LIST = 'txlist',
  TOKEN_TX_LIST = 'tokentx',
  INTERNAL_TX_LIST = 'txlistinternal',
  TOKEN_LIST = 'tokenlist',
  GET_SOURCE_CODE = 'getsourcecode',
  ETH_BLOCK_NUMBER = 'eth_blockNumber',
  ETH_GET_BLOCK_BY_NUMBER = 'eth_getBlockByNumber',
  ETH_GET_TRANSACTION_BY_HASH = 'eth_getTransactionByHash',
  ETH_GET_TRANSACTION_RECEIPT = 'eth_getTransactionReceipt',
  ETH_GET_TRANSACTION_COUNT = 'eth_getTransactionCount',
  ETH_GET_CODE = 'eth_getCode',
  ETH_GAS_PRICE = 'eth_gasPrice',
}

const decimalStringSchema = z.string().regex(/^\d+$/);
export const hexQuantitySchema = z.string().regex(/^0x[0-9a-fA-F]*$/);
export const hexDataSchema = z.string().regex(/^0x(?:[0-9a-fA-F]{2})*$/);

export const accountEnvelopeSchema = z.object({
  status: z.string().optional(),
  message: z.string().optional(),
  result: z.unknown(),
});

export const proxyEnvelopeSchema = z.object({
  status: z.string().optional(),
  message: z.string().optional(),
  result: z.unknown(),
  error: z
    .object({
      code: z.number().optional(),
      message: z.string(),
    })
    .optional(),
});

export const balanceResultSchema = decimalStringSchema;

export const normalTransactionRowSchema = z.object({
  hash: z.string().min(1),
  blockNumber: decimalStringSchema,
  timeStamp: decimalStringSchema,
  from: z.string(),
  to: z.string(),
  value: decimalStringSchema,
  gasPrice: decimalStringSchema,
  gasUsed: decimalStringSchema,
  isError: z.string(),
  functionName: z.string().optional(),
  methodId: z.string().optional(),
  method: z.string().optional(),
  input: z.string().optional(),
});

export const tokenTransferRowSchema = z.object({
  hash: z.string().min(1),
  blockNumber: decimalStringSchema.optional(),
  timeStamp: decimalStringSchema,
  from: z.string(),
  to: z.string(),
  value: decimalStringSchema,
  contractAddress: z.string().default(''),
  tokenName: z.string().default('Unknown'),
  tokenSymbol: z.string().default(''),
  tokenDecimal: z.string().default('18'),
  tokenID: z.string().optional(),
});

export const internalTransactionRowSchema = z.object({
  hash: z.string().min(1),
  blockNumber: decimalStringSchema,
  timeStamp: decimalStringSchema,
  from: z.string(),
  to: z.string(),
  value: decimalStringSchema,
  gas: z.string().default('0'),
  gasUsed: z.string().default('0'),
  type: z.string().default('call'),
  isError: z.string().default('0'),
});

export const tokenBalanceRowSchema = z.object({
  contractAddress: z.string().min(1),
  name: z.string().default('Unknown'),
  symbol: z.string().default(''),
  decimals: z.string().default('18'),
  balance: decimalStringSchema,
});

export const contractSourceRowSchema = z.object({
  SourceCode: z.string().default(''),
  ABI: z.string().default(''),
  ContractName: z.string().default(''),
  CompilerVersion: z.string().default(''),
});

export const proxyTransactionSchema = z.object({
  hash: z.string().min(1),
  blockNumber: hexQuantitySchema.nullish(),
  from: z.string(),
  to: z.string().nullish(),
  value: hexQuantitySchema.default('0x0'),
  gas: hexQuantitySchema.default('0x0'),
  gasPrice: hexQuantitySchema.nullish(),
  nonce: hexQuantitySchema.default('0x0'),
  input: hexDataSchema.default('0x'),
});

export const proxyBlockSchema = z.object({
  number: hexQuantitySchema,
  hash: z.string(),
  parentHash: z.string(),
  timestamp: hexQuantitySchema,
  miner: z.string().default(''),
  gasUsed: hexQuantitySchema.default('0x0'),
  gasLimit: hexQuantitySchema.default('0x0'),
  baseFeePerGas: hexQuantitySchema.nullish(),
  transactions: z.array(z.union([z.string(), proxyTransactionSchema])).default([]),
});

export const proxyReceiptSchema = z.object({
  transactionHash: z.string().min(1),
  blockNumber: hexQuantitySchema,
  status: hexQuantitySchema.nullish(),
  gasUsed: hexQuantitySchema.default('0x0'),
  effectiveGasPrice: hexQuantitySchema.nullish(),
  contractAddress: z.string().nullish(),
  logs: z.array(z.unknown()).default([]),
});

export type NormalTransactionRow = z.infer<typeof normalTransactionRowSchema>;
export type TokenTransferRow = z.infer<typeof tokenTransferRowSchema>;
export type InternalTransactionRow = z.infer<typeof internalTransactionRowSchema>;
export type TokenBalanceRow = z.infer<typeof tokenBalanceRowSchema>;
export type ContractSourceRow = z.infer<typeof contractSourceRowSchema>;
export type ProxyTransaction = z.infer<typeof proxyTransactionSchema>;
export type ProxyBlock = z.infer<typeof proxyBlockSchema>;
export type ProxyReceipt = z.infer<typeof proxyReceiptSchema>;
