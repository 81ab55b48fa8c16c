import {
  Interface,
  JsonRpcProvider,
  makeError,
  type Block,
  type TransactionReceipt,
  type TransactionRequest,
  type TransactionResponse,
} from 'ethers';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { EthereumRpcAdapter } from './ethereum-rpc.adapter';
import {
  BlockchainError,
  NetworkError,
  ParseError,
} from '../../../common/errors/explorer-errors';
import type { AppConfigService } from '../../../config/app-config.service';
import { TransactionStatus } from '../../../core/ports/chain/chain-data.interfaces';
import type { LimiterKey } from '../../../rate-limiting/bottleneck-rate-limiter.interfaces';
import type {
  BottleneckRateLimiterService,
} from '../../../rate-limiting/bottleneck-rate-limiter.service';

const WALLET = '0xd8dA6BF26964aF9D7eEd9e03E53415D37aA96045';
const TOKEN = '0xA0b86991c6218b36c1d19D4a2e9Eb0cE3606eB48';
const TX_HASH = '0x5c504ed432cb51138bcf09aa5e8a410dd4a1e204ef84bfed1be16dfba1b22060';

class RpcConfigStub {
  public readonly rpcUrl: string = 'http://127.0.0.1:8545';
  public readonly rpcWsUrl: string | null = null;
  public readonly chainId: number = 1;
  public rpcTimeoutMs: number = 1000;
}

const rateLimiterStub = {
  schedule: vi.fn(
    async <T>(_key: LimiterKey, operation: () => Promise<T>): Promise<T> => operation(),
  ),
};

const erc20: Interface = new Interface([
  'function name() view returns (string)',
  'function symbol() view returns (string)',
  'function decimals() view returns (uint8)',
  'function totalSupply() view returns (uint256)',
]);

const createAdapter = (config: RpcConfigStub = new RpcConfigStub()): EthereumRpcAdapter =>
  new EthereumRpcAdapter(
    config as unknown as AppConfigService,
    rateLimiterStub as unknown as BottleneckRateLimiterService,
  );

describe('EthereumRpcAdapter', (): void => {
  afterEach((): void => {
    vi.restoreAllMocks();
    rateLimiterStub.schedule.mockClear();
  });

  it('returns balance as decimal wei string', async (): Promise<void> => {
    const balanceSpy = vi
      .spyOn(JsonRpcProvider.prototype, 'getBalance')
      .mockResolvedValueOnce(1_500_000_000_000_000_000n);

    await expect(createAdapter().getBalance(WALLET)).resolves.toBe('1500000000000000000');
    expect(balanceSpy).toHaveBeenCalledWith(WALLET);
    expect(rateLimiterStub.schedule).toHaveBeenCalledTimes(1);
  });

  it('raises network error when call exceeds rpc timeout', async (): Promise<void> => {
    vi.spyOn(JsonRpcProvider.prototype, 'getBalance').mockReturnValueOnce(
      new Promise<bigint>((resolve: (value: bigint) => void): void => {
        setTimeout((): void => resolve(1n), 1000);
      }),
    );
    const config: RpcConfigStub = new RpcConfigStub();
    config.rpcTimeoutMs = 20;

    const request: Promise<string> = createAdapter(config).getBalance(WALLET);

    await expect(request).rejects.toBeInstanceOf(NetworkError);
    await expect(request).rejects.toThrow('RPC getBalance timed out after 20ms');
  });

  it('classifies ethers error codes', async (): Promise<void> => {
    vi.spyOn(JsonRpcProvider.prototype, 'getTransactionCount')
      .mockRejectedValueOnce(makeError('connection refused', 'NETWORK_ERROR'))
      .mockRejectedValueOnce(makeError('invalid hex', 'BAD_DATA'))
      .mockRejectedValueOnce(makeError('unknown account', 'UNKNOWN_ERROR'));
    const adapter: EthereumRpcAdapter = createAdapter();

    await expect(adapter.getNonce(WALLET)).rejects.toBeInstanceOf(NetworkError);
    await expect(adapter.getNonce(WALLET)).rejects.toBeInstanceOf(ParseError);
    await expect(adapter.getNonce(WALLET)).rejects.toBeInstanceOf(BlockchainError);
  });

  it('maps block with prefetched transactions', async (): Promise<void> => {
    const transaction = {
      hash: TX_HASH,
      blockNumber: 42,
      from: WALLET,
      to: null,
      value: 5n,
      gasLimit: 21_000n,
      gasPrice: 7n,
      nonce: 3,
      data: '0x',
    } as unknown as TransactionResponse;
    const getBlockSpy = vi.spyOn(JsonRpcProvider.prototype, 'getBlock').mockResolvedValueOnce({
      number: 42,
      hash: '0xblock',
      parentHash: '0xparent',
      timestamp: 1_700_000_000,
      miner: WALLET,
      gasUsed: 21_000n,
      gasLimit: 30_000_000n,
      baseFeePerGas: null,
      prefetchedTransactions: [transaction],
    } as unknown as Block);

    const block = await createAdapter().getBlock(42);

    expect(getBlockSpy).toHaveBeenCalledWith(42, true);
    expect(block).toEqual({
      number: 42,
      hash: '0xblock',
      parentHash: '0xparent',
      timestampSec: 1_700_000_000,
      miner: WALLET,
      gasUsed: '21000',
      gasLimit: '30000000',
      baseFeePerGasWei: null,
      transactions: [
        {
          hash: TX_HASH,
          blockNumber: 42,
          from: WALLET,
          to: null,
          valueWei: '5',
          gasLimit: '21000',
          gasPriceWei: '7',
          nonce: 3,
          input: '0x',
        },
      ],
    });
  });

  it('maps receipt status and effective gas price', async (): Promise<void> => {
    vi.spyOn(JsonRpcProvider.prototype, 'getTransactionReceipt').mockResolvedValueOnce({
      hash: TX_HASH,
      blockNumber: 42,
      status: 0,
      gasUsed: 50_000n,
      gasPrice: 2_000_000_000n,
      contractAddress: null,
      logs: [],
    } as unknown as TransactionReceipt);

    await expect(createAdapter().getReceipt(TX_HASH)).resolves.toEqual({
      txHash: TX_HASH,
      blockNumber: 42,
      status: TransactionStatus.FAILED,
      gasUsed: '50000',
      effectiveGasPriceWei: '2000000000',
      contractAddress: null,
      logCount: 0,
    });
  });

  it('reads gas price through eth_gasPrice', async (): Promise<void> => {
    const sendSpy = vi
      .spyOn(JsonRpcProvider.prototype, 'send')
      .mockResolvedValueOnce('0x3b9aca00')
      .mockResolvedValueOnce('not-hex');
    const adapter: EthereumRpcAdapter = createAdapter();

    await expect(adapter.getGasPrice()).resolves.toBe('1000000000');
    expect(sendSpy).toHaveBeenCalledWith('eth_gasPrice', []);
    await expect(adapter.getGasPrice()).rejects.toBeInstanceOf(ParseError);
  });

  it('falls back per erc20 field that fails', async (): Promise<void> => {
    vi.spyOn(JsonRpcProvider.prototype, 'call').mockImplementation(
      async (request: TransactionRequest): Promise<string> => {
        if (request.data === erc20.encodeFunctionData('name')) {
          return erc20.encodeFunctionResult('name', ['Test Token']);
        }

        if (request.data === erc20.encodeFunctionData('symbol')) {
          return erc20.encodeFunctionResult('symbol', ['TT']);
        }

        if (request.data === erc20.encodeFunctionData('totalSupply')) {
          return erc20.encodeFunctionResult('totalSupply', [1000n]);
        }

        throw makeError('execution reverted', 'CALL_EXCEPTION');
      },
    );

    await expect(createAdapter().getTokenMetadata(TOKEN)).resolves.toEqual({
      contractAddress: TOKEN,
      name: 'Test Token',
      symbol: 'TT',
      decimals: 18,
      totalSupply: '1000',
    });
  });

  it('raises when no erc20 field can be read', async (): Promise<void> => {
    vi.spyOn(JsonRpcProvider.prototype, 'call').mockRejectedValue(
      makeError('execution reverted', 'CALL_EXCEPTION'),
    );

    await expect(createAdapter().getTokenMetadata(TOKEN)).rejects.toBeInstanceOf(BlockchainError);
  });

  it('refuses block push without websocket url', async (): Promise<void> => {
    const adapter: EthereumRpcAdapter = createAdapter();
    const handler = vi.fn(async (): Promise<void> => undefined);

    expect(adapter.hasPushSupport()).toBe(false);
    await expect(adapter.subscribeBlocks(handler)).rejects.toThrow(
      'Block push requires RPC_WS_URL',
    );
  });

  it('reports health from eth_chainId', async (): Promise<void> => {
    vi.spyOn(JsonRpcProvider.prototype, 'send')
      .mockResolvedValueOnce('0x1')
      .mockRejectedValueOnce(makeError('connection refused', 'NETWORK_ERROR'));
    const adapter: EthereumRpcAdapter = createAdapter();

    await expect(adapter.healthCheck()).resolves.toEqual({
      provider: 'ethereum-rpc',
      ok: true,
      details: 'reachable chainId=1',
    });

    const unhealthy = await adapter.healthCheck();

    expect(unhealthy.ok).toBe(false);
    expect(unhealthy.details).toContain('RPC eth_chainId failed');
  });

  it('passes optional estimate fields through', async (): Promise<void> => {
    const estimateSpy = vi
      .spyOn(JsonRpcProvider.prototype, 'estimateGas')
      .mockResolvedValueOnce(21_000n);

    await expect(
      createAdapter().estimateGas({ from: WALLET, to: TOKEN, data: null, valueWei: 1n }),
    ).resolves.toBe('21000');
    expect(estimateSpy).toHaveBeenCalledWith({
      from: WALLET,
      to: TOKEN,
      data: null,
      value: 1n,
    });
  });
});
