import { Inject, Injectable, Logger } from '@nestjs/common';

import { buildTransactionDetails, computeConfirmations } from './transaction-details.builder';
import { toErrorMessage } from '../common/errors/explorer-errors';
import { measureAsync } from '../common/utils/logging/perf-timer';
import {
  assertAddress,
  assertBlockNumber,
  assertHexData,
  assertTransactionHash,
  assertWeiAmount,
} from '../common/validation/hex-input.validators';
import { AppConfigService } from '../config/app-config.service';
import { ENS_REGISTRY_CHAIN_ID } from '../core/chains/explorer-chain';
import type {
  IAddressInfo,
  IAddressOverview,
  IContractInfo,
  IGasPrices,
  ITokenInfo,
  ITransactionDetails,
} from '../core/explorer/explorer-entities.interfaces';
import type {
  IBlockSummary,
  IChainReader,
  IReceiptSummary,
  ITransactionSummary,
} from '../core/ports/chain/chain-data.interfaces';
import type {
  IAddressTransaction,
  IContractSource,
  IIndexedExplorerAdapter,
  IInternalTransaction,
  ITokenBalance,
  ITokenTransfer,
} from '../core/ports/explorers/indexed-explorer.interfaces';
import { INDEXED_EXPLORER_ADAPTER, RPC_ADAPTER } from '../core/ports/port.tokens';
import type {
  IGasEstimateRequest,
  IProviderHealth,
  IRpcAdapter,
  ITokenMetadata,
} from '../core/ports/rpc/rpc-adapter.interfaces';
import {
  CacheKind,
  type CacheStoreStats,
  type ICacheValueMap,
} from '../infra/cache/cache-store.interfaces';
import { CacheStoreService } from '../infra/cache/cache-store.service';

type ListCacheKind =
  | CacheKind.ADDRESS_HISTORY
  | CacheKind.TOKEN_TRANSFERS
  | CacheKind.INTERNAL_TRANSACTIONS
  | CacheKind.TOKEN_BALANCES;

const SLOW_GAS_PERCENT = 80n;
const FAST_GAS_PERCENT = 120n;
const EMPTY_CODE = '0x';

const nowSec = (): number => Math.floor(Date.now() / 1000);

@Injectable()
export class ExplorerDataService {
  private readonly logger: Logger = new Logger(ExplorerDataService.name);

  public constructor(
    private readonly appConfigService: AppConfigService,
    private readonly cacheStoreService: CacheStoreService,
    @Inject(RPC_ADAPTER)
    private readonly rpcAdapter: IRpcAdapter,
    @Inject(INDEXED_EXPLORER_ADAPTER)
    private readonly indexedAdapter: IIndexedExplorerAdapter,
  ) {}

  public async getAddressInfo(address: string): Promise<IAddressInfo> {
    const normalizedAddress: string = assertAddress(address);
    const cached: IAddressInfo | undefined = this.cacheStoreService.get(
      CacheKind.ADDRESSES,
      normalizedAddress,
    );

    if (cached !== undefined) {
      return cached;
    }

    return measureAsync(
      this.logger,
      `getAddressInfo ${normalizedAddress}`,
      async (): Promise<IAddressInfo> => {
        const [balanceWei, transactionCount, code] = await Promise.all([
          this.readBalance(normalizedAddress),
          this.rpcAdapter.getNonce(normalizedAddress),
          this.rpcAdapter.getCode(normalizedAddress),
        ]);
        const info: IAddressInfo = {
          address: normalizedAddress,
          balanceWei,
          transactionCount,
          isContract: code !== EMPTY_CODE,
          lastUpdatedSec: nowSec(),
        };

        this.cacheStoreService.put(CacheKind.ADDRESSES, normalizedAddress, info);

        return info;
      },
    );
  }

  public async getAddressBalance(address: string): Promise<string> {
    return this.readBalance(assertAddress(address));
  }

  public async getAddressTransactions(address: string): Promise<readonly IAddressTransaction[]> {
    const rows: readonly IAddressTransaction[] | null = await this.readIndexedList(
      CacheKind.ADDRESS_HISTORY,
      assertAddress(address),
      (
        adapter: IIndexedExplorerAdapter,
        normalizedAddress: string,
      ): Promise<readonly IAddressTransaction[]> =>
        adapter.getAddressTransactions(normalizedAddress),
    );

    return rows ?? [];
  }

  public async getTokenTransfers(address: string): Promise<readonly ITokenTransfer[]> {
    return (await this.readTokenTransferRows(assertAddress(address))) ?? [];
  }

  public async getInternalTransactions(address: string): Promise<readonly IInternalTransaction[]> {
    return (await this.readInternalTransactionRows(assertAddress(address))) ?? [];
  }

  public async getTokenBalances(address: string): Promise<readonly ITokenBalance[]> {
    const rows: readonly ITokenBalance[] | null = await this.readIndexedList(
      CacheKind.TOKEN_BALANCES,
      assertAddress(address),
      (
        adapter: IIndexedExplorerAdapter,
        normalizedAddress: string,
      ): Promise<readonly ITokenBalance[]> => adapter.getTokenBalances(normalizedAddress),
    );

    return rows ?? [];
  }

  public async getTransactionDetails(txHash: string): Promise<ITransactionDetails | null> {
    const normalizedHash: string = assertTransactionHash(txHash);
    const cached: ITransactionDetails | undefined = this.cacheStoreService.get(
      CacheKind.TRANSACTIONS,
      normalizedHash,
    );

    if (cached !== undefined) {
      return this.refreshConfirmations(cached);
    }

    return measureAsync(
      this.logger,
      `getTransactionDetails ${normalizedHash}`,
      async (): Promise<ITransactionDetails | null> => {
        const [transaction, receipt] = await Promise.all([
          this.readWithFallback(
            'getTransaction',
            (reader: IChainReader): Promise<ITransactionSummary | null> =>
              reader.getTransaction(normalizedHash),
          ),
          this.readWithFallback(
            'getReceipt',
            (reader: IChainReader): Promise<IReceiptSummary | null> =>
              reader.getReceipt(normalizedHash),
          ),
        ]);

        if (!transaction) {
          return null;
        }

        const blockNumber: number | null = receipt?.blockNumber ?? transaction.blockNumber;
        const [headBlockNumber, senderTransfers, receiverTransfers, internals, timestampSec] =
          await Promise.all([
            this.rpcAdapter.getLatestBlockNumber(),
            this.readTokenTransferRows(assertAddress(transaction.from)),
            transaction.to === null
              ? []
              : this.readTokenTransferRows(assertAddress(transaction.to)),
            this.readInternalTransactionRows(assertAddress(transaction.to ?? transaction.from)),
            this.readBlockTimestamp(blockNumber),
          ]);

        // Without an indexed source the lists are empty by configuration, not by failure.
        const hasCompleteLists: boolean =
          !this.prefersIndexed() ||
          (senderTransfers !== null && receiverTransfers !== null && internals !== null);

        const details: ITransactionDetails = buildTransactionDetails({
          transaction,
          receipt,
          headBlockNumber,
          timestampSec,
          tokenTransfers: [...(senderTransfers ?? []), ...(receiverTransfers ?? [])],
          internalTransactions: internals ?? [],
        });

        // Pending transactions change on the next block.
        if (details.blockNumber !== null && hasCompleteLists) {
          this.cacheStoreService.put(CacheKind.TRANSACTIONS, normalizedHash, details);
        }

        return details;
      },
    );
  }

  public async getBlockByNumber(blockNumber: number): Promise<IBlockSummary | null> {
    const validBlockNumber: number = assertBlockNumber(blockNumber);
    const cacheKey: string = String(validBlockNumber);
    const cached: IBlockSummary | undefined = this.cacheStoreService.get(
      CacheKind.BLOCKS,
      cacheKey,
    );

    if (cached !== undefined) {
      return cached;
    }

    const block: IBlockSummary | null = await this.rpcAdapter.getBlock(validBlockNumber);

    if (block) {
      this.cacheStoreService.put(CacheKind.BLOCKS, cacheKey, block);
    }

    return block;
  }

  public async getLatestBlock(): Promise<IBlockSummary | null> {
    const headBlockNumber: number = await this.rpcAdapter.getLatestBlockNumber();

    return this.rpcAdapter.getBlock(headBlockNumber);
  }

  public async estimateGas(
    from: string,
    to: string,
    data: string | null = null,
    valueWei: string | null = null,
  ): Promise<string> {
    const request: IGasEstimateRequest = {
      from: assertAddress(from, 'sender address'),
      to: assertAddress(to, 'recipient address'),
      data: data === null ? null : assertHexData(data),
      valueWei: valueWei === null ? null : assertWeiAmount(valueWei),
    };

    return this.rpcAdapter.estimateGas(request);
  }

  public async getGasPrices(): Promise<IGasPrices> {
    const standard: bigint = BigInt(await this.rpcAdapter.getGasPrice());

    return {
      slowWei: ((standard * SLOW_GAS_PERCENT) / 100n).toString(),
      standardWei: standard.toString(),
      fastWei: ((standard * FAST_GAS_PERCENT) / 100n).toString(),
      timestampSec: nowSec(),
    };
  }

  public async resolveName(address: string): Promise<string | null> {
    const normalizedAddress: string = assertAddress(address);

    if (
      this.appConfigService.chainId !== ENS_REGISTRY_CHAIN_ID ||
      this.appConfigService.rpcNodeLocal
    ) {
      return null;
    }

    const cached: string | null | undefined = this.cacheStoreService.get(
      CacheKind.ENS_NAMES,
      normalizedAddress,
    );

    if (cached !== undefined) {
      return cached;
    }

    const name: string | null = await this.rpcAdapter.lookupName(normalizedAddress);
    this.cacheStoreService.put(CacheKind.ENS_NAMES, normalizedAddress, name);

    return name;
  }

  public async getContractInfo(address: string): Promise<IContractInfo> {
    const normalizedAddress: string = assertAddress(address);
    const cached: IContractInfo | undefined = this.cacheStoreService.get(
      CacheKind.CONTRACTS,
      normalizedAddress,
    );

    if (cached !== undefined) {
      return cached;
    }

    const unverified: IContractInfo = {
      address: normalizedAddress,
      name: null,
      compilerVersion: null,
      abi: null,
      sourceCode: null,
      isVerified: false,
      lastUpdatedSec: nowSec(),
    };

    if (!this.prefersIndexed()) {
      return unverified;
    }

    try {
      const source: IContractSource = await this.indexedAdapter.getContractSource(
        normalizedAddress,
      );
      const info: IContractInfo = { ...source, lastUpdatedSec: nowSec() };

      this.cacheStoreService.put(CacheKind.CONTRACTS, normalizedAddress, info);

      return info;
    } catch (error: unknown) {
      this.logger.warn(
        `Contract source unavailable address=${normalizedAddress}: ${toErrorMessage(error)}`,
      );

      return unverified;
    }
  }

  public async getTokenInfo(contractAddress: string): Promise<ITokenInfo> {
    const normalizedAddress: string = assertAddress(contractAddress, 'token contract address');
    const cached: ITokenInfo | undefined = this.cacheStoreService.get(
      CacheKind.TOKENS,
      normalizedAddress,
    );

    if (cached !== undefined) {
      return cached;
    }

    const metadata: ITokenMetadata = await this.rpcAdapter.getTokenMetadata(normalizedAddress);
    const info: ITokenInfo = { ...metadata, lastUpdatedSec: nowSec() };

    this.cacheStoreService.put(CacheKind.TOKENS, normalizedAddress, info);

    return info;
  }

  public async getAddressOverview(address: string): Promise<IAddressOverview> {
    const normalizedAddress: string = assertAddress(address);
    const [info, ensName, transactions, tokenTransfers, tokenBalances, internalTransactions] =
      await Promise.all([
        this.getAddressInfo(normalizedAddress),
        this.resolveName(normalizedAddress).catch((error: unknown): null => {
          this.logger.warn(
            `Name lookup failed address=${normalizedAddress}: ${toErrorMessage(error)}`,
          );

          return null;
        }),
        this.getAddressTransactions(normalizedAddress),
        this.getTokenTransfers(normalizedAddress),
        this.getTokenBalances(normalizedAddress),
        this.getInternalTransactions(normalizedAddress),
      ]);

    return { info, ensName, transactions, tokenTransfers, tokenBalances, internalTransactions };
  }

  public async testConnection(): Promise<IProviderHealth> {
    return this.rpcAdapter.healthCheck();
  }

  public getCacheStats(): CacheStoreStats {
    return this.cacheStoreService.stats();
  }

  public clearCache(): void {
    this.cacheStoreService.clearAll();
  }

  private prefersIndexed(): boolean {
    return this.indexedAdapter.isConfigured() && !this.appConfigService.rpcNodeLocal;
  }

  private async readBalance(address: string): Promise<string> {
    return this.readWithFallback(
      'getBalance',
      (reader: IChainReader): Promise<string> => reader.getBalance(address),
    );
  }

  private async readWithFallback<TResult>(
    operation: string,
    read: (reader: IChainReader) => Promise<TResult>,
  ): Promise<TResult> {
    if (!this.prefersIndexed()) {
      return read(this.rpcAdapter);
    }

    try {
      return await read(this.indexedAdapter);
    } catch (error: unknown) {
      this.logger.warn(
        `${operation} failed on ${this.indexedAdapter.getName()}, ` +
          `retrying on ${this.rpcAdapter.getName()}: ${toErrorMessage(error)}`,
      );

      return read(this.rpcAdapter);
    }
  }

  // null marks a degraded read that must not be cached
  private async readIndexedList<K extends ListCacheKind>(
    kind: K,
    address: string,
    fetchRows: (adapter: IIndexedExplorerAdapter, address: string) => Promise<ICacheValueMap[K]>,
  ): Promise<ICacheValueMap[K] | null> {
    const cached: ICacheValueMap[K] | undefined = this.cacheStoreService.get(kind, address);

    if (cached !== undefined) {
      return cached;
    }

    if (!this.prefersIndexed()) {
      this.logger.warn(`${kind} unavailable without indexed explorer address=${address}`);
      return null;
    }

    try {
      const rows: ICacheValueMap[K] = await fetchRows(this.indexedAdapter, address);
      this.cacheStoreService.put(kind, address, rows);

      return rows;
    } catch (error: unknown) {
      this.logger.warn(`${kind} degraded to empty address=${address}: ${toErrorMessage(error)}`);
      return null;
    }
  }

  private async readTokenTransferRows(address: string): Promise<readonly ITokenTransfer[] | null> {
    return this.readIndexedList(
      CacheKind.TOKEN_TRANSFERS,
      address,
      (adapter: IIndexedExplorerAdapter, key: string): Promise<readonly ITokenTransfer[]> =>
        adapter.getTokenTransfers(key),
    );
  }

  private async readInternalTransactionRows(
    address: string,
  ): Promise<readonly IInternalTransaction[] | null> {
    return this.readIndexedList(
      CacheKind.INTERNAL_TRANSACTIONS,
      address,
      (adapter: IIndexedExplorerAdapter, key: string): Promise<readonly IInternalTransaction[]> =>
        adapter.getInternalTransactions(key),
    );
  }

  private async refreshConfirmations(details: ITransactionDetails): Promise<ITransactionDetails> {
    try {
      const headBlockNumber: number = await this.rpcAdapter.getLatestBlockNumber();

      return {
        ...details,
        confirmations: computeConfirmations(headBlockNumber, details.blockNumber),
      };
    } catch (error: unknown) {
      this.logger.warn(
        `Confirmations left as cached tx=${details.transaction.hash}: ${toErrorMessage(error)}`,
      );
      return details;
    }
  }

  private async readBlockTimestamp(blockNumber: number | null): Promise<number | null> {
    if (blockNumber === null) {
      return null;
    }

    try {
      const block: IBlockSummary | null = await this.getBlockByNumber(blockNumber);

      return block ? block.timestampSec : null;
    } catch (error: unknown) {
      this.logger.warn(
        `Block timestamp unavailable block=${blockNumber}: ${toErrorMessage(error)}`,
      );
      return null;
    }
  }
}
