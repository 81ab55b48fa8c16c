import { Injectable, Logger, type OnModuleDestroy } from '@nestjs/common';
import {
  Interface,
  isError,
  JsonRpcProvider,
  Network,
  WebSocketProvider,
  type Block,
  type TransactionReceipt,
  type TransactionResponse,
} from 'ethers';

import {
  BlockchainError,
  type ExplorerError,
  isExplorerError,
  NetworkError,
  ParseError,
  toErrorMessage,
} from '../../../common/errors/explorer-errors';
import { withTimeout } from '../../../common/utils/network/timeout.util';
import { AppConfigService } from '../../../config/app-config.service';
import {
  type IBlockSummary,
  type IReceiptSummary,
  type ITransactionSummary,
  TransactionStatus,
} from '../../../core/ports/chain/chain-data.interfaces';
import type {
  BlockHandler,
  IGasEstimateRequest,
  IProviderHealth,
  IRpcAdapter,
  ISubscriptionHandle,
  ITokenMetadata,
} from '../../../core/ports/rpc/rpc-adapter.interfaces';
import { LimiterKey } from '../../../rate-limiting/bottleneck-rate-limiter.interfaces';
import {
  BottleneckRateLimiterService,
} from '../../../rate-limiting/bottleneck-rate-limiter.service';

const PROVIDER_NAME = 'ethereum-rpc';

const ERC20_METADATA_INTERFACE: Interface = new Interface([
  'function name() view returns (string)',
  'function symbol() view returns (string)',
  'function decimals() view returns (uint8)',
  'function totalSupply() view returns (uint256)',
]);

type Erc20MetadataField = 'name' | 'symbol' | 'decimals' | 'totalSupply';

const FALLBACK_TOKEN_NAME = 'Unknown';
const FALLBACK_TOKEN_DECIMALS = 18;

@Injectable()
export class EthereumRpcAdapter implements IRpcAdapter, OnModuleDestroy {
  private readonly logger: Logger = new Logger(EthereumRpcAdapter.name);
  private readonly network: Network;
  private readonly httpProvider: JsonRpcProvider;
  private wsProvider: WebSocketProvider | null = null;

  public constructor(
    private readonly appConfigService: AppConfigService,
    private readonly rateLimiterService: BottleneckRateLimiterService,
  ) {
    this.network = Network.from(appConfigService.chainId);
    this.httpProvider = new JsonRpcProvider(appConfigService.rpcUrl, this.network, {
      staticNetwork: this.network,
    });
  }

  public getName(): string {
    return PROVIDER_NAME;
  }

  public hasPushSupport(): boolean {
    return this.appConfigService.rpcWsUrl !== null;
  }

  public async getBalance(address: string): Promise<string> {
    const balance: bigint = await this.call(
      'getBalance',
      (provider: JsonRpcProvider): Promise<bigint> => provider.getBalance(address),
    );

    return balance.toString();
  }

  public async getNonce(address: string): Promise<number> {
    return this.call(
      'getTransactionCount',
      (provider: JsonRpcProvider): Promise<number> => provider.getTransactionCount(address),
    );
  }

  public async getCode(address: string): Promise<string> {
    return this.call(
      'getCode',
      (provider: JsonRpcProvider): Promise<string> => provider.getCode(address),
    );
  }

  public async getBlock(blockNumber: number): Promise<IBlockSummary | null> {
    const block: Block | null = await this.call(
      'getBlock',
      (provider: JsonRpcProvider): Promise<Block | null> => provider.getBlock(blockNumber, true),
    );

    if (!block) {
      return null;
    }

    return {
      number: block.number,
      hash: block.hash ?? '',
      parentHash: block.parentHash,
      timestampSec: block.timestamp,
      miner: block.miner,
      gasUsed: block.gasUsed.toString(),
      gasLimit: block.gasLimit.toString(),
      baseFeePerGasWei: block.baseFeePerGas === null ? null : block.baseFeePerGas.toString(),
      transactions: block.prefetchedTransactions.map(
        (transaction: TransactionResponse): ITransactionSummary =>
          this.mapTransaction(transaction),
      ),
    };
  }

  public async getLatestBlockNumber(): Promise<number> {
    return this.call(
      'getBlockNumber',
      (provider: JsonRpcProvider): Promise<number> => provider.getBlockNumber(),
    );
  }

  public async getTransaction(txHash: string): Promise<ITransactionSummary | null> {
    const transaction: TransactionResponse | null = await this.call(
      'getTransaction',
      (provider: JsonRpcProvider): Promise<TransactionResponse | null> =>
        provider.getTransaction(txHash),
    );

    return transaction ? this.mapTransaction(transaction) : null;
  }

  public async getReceipt(txHash: string): Promise<IReceiptSummary | null> {
    const receipt: TransactionReceipt | null = await this.call(
      'getTransactionReceipt',
      (provider: JsonRpcProvider): Promise<TransactionReceipt | null> =>
        provider.getTransactionReceipt(txHash),
    );

    if (!receipt) {
      return null;
    }

    return {
      txHash: receipt.hash,
      blockNumber: receipt.blockNumber,
      status: this.mapReceiptStatus(receipt.status),
      gasUsed: receipt.gasUsed.toString(),
      effectiveGasPriceWei: receipt.gasPrice.toString(),
      contractAddress: receipt.contractAddress,
      logCount: receipt.logs.length,
    };
  }

  public async getGasPrice(): Promise<string> {
    const rawGasPrice: unknown = await this.call(
      'eth_gasPrice',
      (provider: JsonRpcProvider): Promise<unknown> => provider.send('eth_gasPrice', []),
    );

    return this.parseQuantity('eth_gasPrice', rawGasPrice).toString();
  }

  public async getChainId(): Promise<number> {
    const rawChainId: unknown = await this.call(
      'eth_chainId',
      (provider: JsonRpcProvider): Promise<unknown> => provider.send('eth_chainId', []),
    );

    return Number(this.parseQuantity('eth_chainId', rawChainId));
  }

  public async estimateGas(request: IGasEstimateRequest): Promise<string> {
    const gas: bigint = await this.call(
      'estimateGas',
      (provider: JsonRpcProvider): Promise<bigint> =>
        provider.estimateGas({
          from: request.from,
          to: request.to,
          data: request.data,
          value: request.valueWei,
        }),
    );

    return gas.toString();
  }

  public async lookupName(address: string): Promise<string | null> {
    return this.call(
      'lookupAddress',
      (provider: JsonRpcProvider): Promise<string | null> => provider.lookupAddress(address),
    );
  }

  public async getTokenMetadata(contractAddress: string): Promise<ITokenMetadata> {
    const [name, symbol, decimals, totalSupply] = await Promise.allSettled([
      this.readErc20Field(contractAddress, 'name'),
      this.readErc20Field(contractAddress, 'symbol'),
      this.readErc20Field(contractAddress, 'decimals'),
      this.readErc20Field(contractAddress, 'totalSupply'),
    ]);

    if (
      name.status === 'rejected' &&
      symbol.status === 'rejected' &&
      decimals.status === 'rejected' &&
      totalSupply.status === 'rejected'
    ) {
      throw name.reason;
    }

    const nameValue: unknown = name.status === 'fulfilled' ? name.value : null;
    const symbolValue: unknown = symbol.status === 'fulfilled' ? symbol.value : null;
    const decimalsValue: unknown = decimals.status === 'fulfilled' ? decimals.value : null;
    const supplyValue: unknown = totalSupply.status === 'fulfilled' ? totalSupply.value : null;

    return {
      contractAddress,
      name: typeof nameValue === 'string' ? nameValue : FALLBACK_TOKEN_NAME,
      symbol: typeof symbolValue === 'string' ? symbolValue : '',
      decimals: typeof decimalsValue === 'bigint' ? Number(decimalsValue) : FALLBACK_TOKEN_DECIMALS,
      totalSupply: typeof supplyValue === 'bigint' ? supplyValue.toString() : null,
    };
  }

  public async subscribeBlocks(handler: BlockHandler): Promise<ISubscriptionHandle> {
    const wsProvider: WebSocketProvider = this.getOrCreateWsProvider();

    const listener = (blockNumber: number): void => {
      void handler(blockNumber).catch((error: unknown): void => {
        this.logger.error(`Block handler failed: ${toErrorMessage(error)}`);
      });
    };

    await wsProvider.on('block', listener);

    return {
      stop: async (): Promise<void> => {
        await wsProvider.off('block', listener);
      },
    };
  }

  public async healthCheck(): Promise<IProviderHealth> {
    try {
      const chainId: number = await this.getChainId();

      return {
        provider: PROVIDER_NAME,
        ok: true,
        details: `reachable chainId=${chainId}`,
      };
    } catch (error: unknown) {
      return {
        provider: PROVIDER_NAME,
        ok: false,
        details: toErrorMessage(error),
      };
    }
  }

  public async disconnect(): Promise<void> {
    if (this.wsProvider) {
      await this.wsProvider.destroy();
      this.wsProvider = null;
    }

    this.httpProvider.destroy();
  }

  public async onModuleDestroy(): Promise<void> {
    await this.disconnect();
  }

  private async call<T>(
    method: string,
    operation: (provider: JsonRpcProvider) => Promise<T>,
  ): Promise<T> {
    try {
      return await withTimeout(
        this.rateLimiterService.schedule(
          LimiterKey.ETH_RPC,
          (): Promise<T> => operation(this.httpProvider),
        ),
        this.appConfigService.rpcTimeoutMs,
        `RPC ${method}`,
      );
    } catch (error: unknown) {
      throw this.classifyError(method, error);
    }
  }

  private async readErc20Field(
    contractAddress: string,
    field: Erc20MetadataField,
  ): Promise<unknown> {
    const rawResult: string = await this.call(
      `eth_call ${field}`,
      (provider: JsonRpcProvider): Promise<string> =>
        provider.call({
          to: contractAddress,
          data: ERC20_METADATA_INTERFACE.encodeFunctionData(field),
        }),
    );

    try {
      const decoded: unknown = ERC20_METADATA_INTERFACE.decodeFunctionResult(field, rawResult)[0];

      return decoded;
    } catch (error: unknown) {
      throw new ParseError(`ERC-20 ${field} of ${contractAddress}: ${toErrorMessage(error)}`);
    }
  }

  private classifyError(method: string, error: unknown): ExplorerError {
    if (isExplorerError(error)) {
      return error;
    }

    const message: string = toErrorMessage(error);

    if (
      isError(error, 'NETWORK_ERROR') ||
      isError(error, 'TIMEOUT') ||
      isError(error, 'SERVER_ERROR') ||
      error instanceof TypeError
    ) {
      return new NetworkError(`RPC ${method} failed: ${message}`, error);
    }

    if (isError(error, 'BAD_DATA')) {
      return new ParseError(`RPC ${method} returned malformed data: ${message}`);
    }

    return new BlockchainError(`RPC ${method} rejected: ${message}`, error);
  }

  private parseQuantity(method: string, value: unknown): bigint {
    if (typeof value !== 'string' || !/^0x[0-9a-fA-F]+$/.test(value)) {
      throw new ParseError(`RPC ${method} returned non-quantity: ${String(value)}`);
    }

    return BigInt(value);
  }

  private mapTransaction(transaction: TransactionResponse): ITransactionSummary {
    return {
      hash: transaction.hash,
      blockNumber: transaction.blockNumber,
      from: transaction.from,
      to: transaction.to,
      valueWei: transaction.value.toString(),
      gasLimit: transaction.gasLimit.toString(),
      gasPriceWei: transaction.gasPrice.toString(),
      nonce: transaction.nonce,
      input: transaction.data,
    };
  }

  private mapReceiptStatus(status: number | null): TransactionStatus {
    if (status === null) {
      return TransactionStatus.UNKNOWN;
    }

    return status === 1 ? TransactionStatus.SUCCESS : TransactionStatus.FAILED;
  }

  private getOrCreateWsProvider(): WebSocketProvider {
    const wsUrl: string | null = this.appConfigService.rpcWsUrl;

    if (wsUrl === null) {
      throw new NetworkError('Block push requires RPC_WS_URL');
    }

    if (this.wsProvider === null) {
      const wsProvider: WebSocketProvider = new WebSocketProvider(wsUrl, this.network, {
        staticNetwork: this.network,
      });

      void wsProvider.on('error', (error: unknown): void => {
        this.logger.warn(`WebSocket error: ${toErrorMessage(error)}`);
      });

      this.wsProvider = wsProvider;
      this.logger.log(`WebSocket provider created for chainId=${this.network.chainId}`);
    }

    return this.wsProvider;
  }
}
