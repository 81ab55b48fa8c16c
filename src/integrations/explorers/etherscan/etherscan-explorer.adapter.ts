import { Injectable, Logger } from '@nestjs/common';
import type { z } from 'zod';

import {
  mapContractSource,
  mapInternalTransaction,
  mapNormalTransaction,
  mapProxyBlock,
  mapProxyReceipt,
  mapProxyTransaction,
  mapTokenBalance,
  mapTokenTransfer,
  hexToDecimalString,
  hexToNumber,
} from './etherscan-explorer.mapper';
import {
  accountEnvelopeSchema,
  balanceResultSchema,
  type ContractSourceRow,
  contractSourceRowSchema,
  EtherscanAction,
  EtherscanModule,
  hexDataSchema,
  hexQuantitySchema,
  internalTransactionRowSchema,
  normalTransactionRowSchema,
  proxyBlockSchema,
  proxyEnvelopeSchema,
  proxyReceiptSchema,
  proxyTransactionSchema,
  tokenBalanceRowSchema,
  tokenTransferRowSchema,
} from './etherscan-explorer.schemas';
import { BlockchainError, NetworkError, ParseError } from '../../../common/errors/explorer-errors';
import { AppConfigService } from '../../../config/app-config.service';
import {
  describeExplorerChain,
  type ExplorerChainRef,
  resolveExplorerChain,
  toExplorerChainId,
} from '../../../core/chains/explorer-chain';
import type {
  IBlockSummary,
  IReceiptSummary,
  ITransactionSummary,
} from '../../../core/ports/chain/chain-data.interfaces';
import type {
  IAddressTransaction,
  IContractSource,
  IIndexedExplorerAdapter,
  IInternalTransaction,
  ITokenBalance,
  ITokenTransfer,
} from '../../../core/ports/explorers/indexed-explorer.interfaces';
import {
  LimiterKey,
  RequestPriority,
} from '../../../rate-limiting/bottleneck-rate-limiter.interfaces';
import {
  BottleneckRateLimiterService,
} from '../../../rate-limiting/bottleneck-rate-limiter.service';

type QueryParams = Readonly<Record<string, string>>;

const ACCOUNT_LIST_RANGE: QueryParams = {
  startblock: '0',
  endblock: '99999999',
  sort: 'desc',
};

const EMPTY_RESULT_PATTERN: RegExp = /^no .*found/i;

@Injectable()
export class EtherscanExplorerAdapter implements IIndexedExplorerAdapter {
  private readonly logger: Logger = new Logger(EtherscanExplorerAdapter.name);
  private readonly chain: ExplorerChainRef;

  public constructor(
    private readonly appConfigService: AppConfigService,
    private readonly rateLimiterService: BottleneckRateLimiterService,
  ) {
    this.chain = resolveExplorerChain(appConfigService.chainId);
  }

  public getName(): string {
    return `etherscan:${describeExplorerChain(this.chain)}`;
  }

  public isConfigured(): boolean {
    return this.appConfigService.etherscanApiKey !== null;
  }

  public async getBalance(address: string): Promise<string> {
    const result: unknown = await this.requestAccountResult(EtherscanAction.BALANCE, {
      address,
      tag: 'latest',
    });
    const parsed = balanceResultSchema.safeParse(result);

    if (!parsed.success) {
      throw new ParseError(`Unexpected balance result from Etherscan: ${JSON.stringify(result)}`);
    }

    return parsed.data;
  }

  public async getNonce(address: string): Promise<number> {
    const result: unknown = await this.requestProxy(EtherscanAction.ETH_GET_TRANSACTION_COUNT, {
      address,
      tag: 'latest',
    });

    return hexToNumber(this.parseStrict(hexQuantitySchema, result, 'transaction count'));
  }

  public async getCode(address: string): Promise<string> {
    const result: unknown = await this.requestProxy(EtherscanAction.ETH_GET_CODE, {
      address,
      tag: 'latest',
    });

    return this.parseStrict(hexDataSchema, result, 'contract code');
  }

  public async getBlock(blockNumber: number): Promise<IBlockSummary | null> {
    const result: unknown = await this.requestProxy(EtherscanAction.ETH_GET_BLOCK_BY_NUMBER, {
      tag: `0x${blockNumber.toString(16)}`,
      boolean: 'true',
    });

    if (result === null) {
      return null;
    }

    return mapProxyBlock(this.parseStrict(proxyBlockSchema, result, 'block'));
  }

  public async getLatestBlockNumber(): Promise<number> {
    const result: unknown = await this.requestProxy(EtherscanAction.ETH_BLOCK_NUMBER, {});

    return hexToNumber(this.parseStrict(hexQuantitySchema, result, 'block number'));
  }

  public async getTransaction(txHash: string): Promise<ITransactionSummary | null> {
    const result: unknown = await this.requestProxy(EtherscanAction.ETH_GET_TRANSACTION_BY_HASH, {
      txhash: txHash,
    });

    if (result === null) {
      return null;
    }

    return mapProxyTransaction(this.parseStrict(proxyTransactionSchema, result, 'transaction'));
  }

  public async getReceipt(txHash: string): Promise<IReceiptSummary | null> {
    const result: unknown = await this.requestProxy(EtherscanAction.ETH_GET_TRANSACTION_RECEIPT, {
      txhash: txHash,
    });

    if (result === null) {
      return null;
    }

    return mapProxyReceipt(this.parseStrict(proxyReceiptSchema, result, 'receipt'));
  }

  public async getGasPrice(): Promise<string> {
    const result: unknown = await this.requestProxy(EtherscanAction.ETH_GAS_PRICE, {});

    return hexToDecimalString(this.parseStrict(hexQuantitySchema, result, 'gas price'));
  }

  public async getChainId(): Promise<number> {
    return toExplorerChainId(this.chain);
  }

  public async getAddressTransactions(address: string): Promise<readonly IAddressTransaction[]> {
    const rows: readonly unknown[] = await this.requestAccountList(EtherscanAction.TX_LIST, {
      address,
      ...ACCOUNT_LIST_RANGE,
    });

    return this.mapRows(EtherscanAction.TX_LIST, rows, normalTransactionRowSchema).map(
      mapNormalTransaction,
    );
  }

  public async getTokenTransfers(address: string): Promise<readonly ITokenTransfer[]> {
    const rows: readonly unknown[] = await this.requestAccountList(EtherscanAction.TOKEN_TX_LIST, {
      address,
      ...ACCOUNT_LIST_RANGE,
    });

    return this.mapRows(EtherscanAction.TOKEN_TX_LIST, rows, tokenTransferRowSchema).map(
      mapTokenTransfer,
    );
  }

  public async getInternalTransactions(address: string): Promise<readonly IInternalTransaction[]> {
    const rows: readonly unknown[] = await this.requestAccountList(
      EtherscanAction.INTERNAL_TX_LIST,
      {
        address,
        ...ACCOUNT_LIST_RANGE,
      },
    );

    return this.mapRows(EtherscanAction.INTERNAL_TX_LIST, rows, internalTransactionRowSchema).map(
      mapInternalTransaction,
    );
  }

  public async getTokenBalances(address: string): Promise<readonly ITokenBalance[]> {
    const rows: readonly unknown[] = await this.requestAccountList(EtherscanAction.TOKEN_LIST, {
      address,
    });

    return this.mapRows(EtherscanAction.TOKEN_LIST, rows, tokenBalanceRowSchema).map(
      mapTokenBalance,
    );
  }

  public async getContractSource(address: string): Promise<IContractSource> {
    const rows: readonly unknown[] = await this.requestAccountList(
      EtherscanAction.GET_SOURCE_CODE,
      { address },
      EtherscanModule.CONTRACT,
    );
    const parsedRows: readonly ContractSourceRow[] = this.mapRows(
      EtherscanAction.GET_SOURCE_CODE,
      rows,
      contractSourceRowSchema,
    );

    return mapContractSource(address, parsedRows[0] ?? null);
  }

  private async requestAccountList(
    action: EtherscanAction,
    params: QueryParams,
    module: EtherscanModule = EtherscanModule.ACCOUNT,
  ): Promise<readonly unknown[]> {
    const payload: unknown = await this.request(module, action, params, RequestPriority.LISTING);
    const envelope = this.parseEnvelope(payload);

    if (envelope.status !== undefined && envelope.status !== '1') {
      if (this.isEmptyResult(envelope.message, envelope.result)) {
        return [];
      }

      throw new BlockchainError(
        `Etherscan API error: ${this.extractApiError(envelope.message, envelope.result)}`,
      );
    }

    if (typeof envelope.result === 'string') {
      if (envelope.result.trim().length === 0 || EMPTY_RESULT_PATTERN.test(envelope.result)) {
        return [];
      }

      throw new BlockchainError(`Etherscan returned error message: ${envelope.result}`);
    }

    if (!Array.isArray(envelope.result)) {
      throw new ParseError(`Unexpected result type for ${action}: expected array`);
    }

    return envelope.result;
  }

  private async requestAccountResult(
    action: EtherscanAction,
    params: QueryParams,
  ): Promise<unknown> {
    const payload: unknown = await this.request(
      EtherscanModule.ACCOUNT,
      action,
      params,
      RequestPriority.LOOKUP,
    );
    const envelope = this.parseEnvelope(payload);

    if (envelope.status !== undefined && envelope.status !== '1') {
      throw new BlockchainError(
        `Etherscan API error: ${this.extractApiError(envelope.message, envelope.result)}`,
      );
    }

    return envelope.result;
  }

  private async requestProxy(action: EtherscanAction, params: QueryParams): Promise<unknown> {
    const payload: unknown = await this.request(
      EtherscanModule.PROXY,
      action,
      params,
      RequestPriority.LOOKUP,
    );
    const parsed = proxyEnvelopeSchema.safeParse(payload);

    if (!parsed.success) {
      throw new ParseError(`Etherscan ${action} response is not an object`);
    }

    const envelope = parsed.data;

    if (envelope.error !== undefined) {
      throw new BlockchainError(`Etherscan ${action} rejected: ${envelope.error.message}`);
    }

    // Rate-limit and key errors arrive in the account envelope shape.
    if (envelope.status === '0') {
      throw new BlockchainError(
        `Etherscan API error: ${this.extractApiError(envelope.message, envelope.result)}`,
      );
    }

    if (envelope.result === undefined) {
      throw new ParseError('Missing result field from Etherscan response');
    }

    return envelope.result;
  }

  private parseEnvelope(payload: unknown): z.infer<typeof accountEnvelopeSchema> {
    const parsed = accountEnvelopeSchema.safeParse(payload);

    if (!parsed.success) {
      throw new ParseError('Etherscan response is not an object');
    }

    if (parsed.data.result === undefined) {
      throw new ParseError('Missing result field from Etherscan response');
    }

    return parsed.data;
  }

  private async request(
    module: EtherscanModule,
    action: EtherscanAction,
    params: QueryParams,
    priority: RequestPriority,
  ): Promise<unknown> {
    const apiKey: string | null = this.appConfigService.etherscanApiKey;

    if (apiKey === null) {
      throw new NetworkError('Etherscan is unavailable: ETHERSCAN_API_KEY is not set');
    }

    const url: URL = new URL(this.appConfigService.etherscanApiBaseUrl);
    url.searchParams.set('chainid', String(toExplorerChainId(this.chain)));
    url.searchParams.set('module', module);
    url.searchParams.set('action', action);

    for (const [name, value] of Object.entries(params)) {
      url.searchParams.set(name, value);
    }

    url.searchParams.set('apikey', apiKey);

    this.logger.debug(`request module=${module} action=${action} chain=${this.getName()}`);

    let response: Response;

    try {
      response = await this.rateLimiterService.schedule(
        LimiterKey.ETHERSCAN,
        async (): Promise<Response> =>
          fetch(url, {
            method: 'GET',
            signal: AbortSignal.timeout(this.appConfigService.etherscanTimeoutMs),
          }),
        priority,
      );
    } catch (error: unknown) {
      const message: string = error instanceof Error ? error.message : String(error);
      throw new NetworkError(`Etherscan request failed: ${message}`, error);
    }

    if (!response.ok) {
      throw new NetworkError(`Etherscan HTTP ${response.status}`);
    }

    try {
      return await response.json();
    } catch (error: unknown) {
      const message: string = error instanceof Error ? error.message : String(error);
      throw new ParseError(`Failed to parse Etherscan JSON: ${message}`);
    }
  }

  private mapRows<TRow>(
    action: EtherscanAction,
    rows: readonly unknown[],
    schema: z.ZodType<TRow>,
  ): TRow[] {
    const parsedRows: TRow[] = [];

    for (const row of rows) {
      const parsed = schema.safeParse(row);

      if (parsed.success) {
        parsedRows.push(parsed.data);
      }
    }

    const droppedCount: number = rows.length - parsedRows.length;

    if (droppedCount > 0) {
      this.logger.warn(`Dropped ${droppedCount} malformed ${action} row(s) of ${rows.length}`);
    }

    return parsedRows;
  }

  private parseStrict<TValue>(schema: z.ZodType<TValue>, value: unknown, label: string): TValue {
    const parsed = schema.safeParse(value);

    if (!parsed.success) {
      throw new ParseError(`Malformed ${label} in Etherscan response`);
    }

    return parsed.data;
  }

  private isEmptyResult(message: string | undefined, result: unknown): boolean {
    if (Array.isArray(result)) {
      return result.length === 0;
    }

    if (typeof result === 'string') {
      const trimmed: string = result.trim();

      if (trimmed.length === 0 || EMPTY_RESULT_PATTERN.test(trimmed)) {
        return true;
      }
    }

    return message !== undefined && EMPTY_RESULT_PATTERN.test(message);
  }

  private extractApiError(message: string | undefined, result: unknown): string {
    if (typeof result === 'string' && result.trim().length > 0) {
      return result;
    }

    return message ?? 'Unknown error';
  }
}
