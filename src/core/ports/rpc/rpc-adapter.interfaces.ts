import type { IChainReader } from '../chain/chain-data.interfaces';

export interface IProviderHealth {
  readonly provider: string;
  readonly ok: boolean;
  readonly details: string;
}

export type BlockHandler = (blockNumber: number) => Promise<void>;

export interface ISubscriptionHandle {
  stop(): Promise<void>;
}

export interface IGasEstimateRequest {
  readonly from: string;
  readonly to: string;
  readonly data: string | null;
  readonly valueWei: bigint | null;
}

export interface ITokenMetadata {
  readonly contractAddress: string;
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
  readonly totalSupply: string | null;
}

export interface IRpcAdapter extends IChainReader {
  hasPushSupport(): boolean;
  subscribeBlocks(handler: BlockHandler): Promise<ISubscriptionHandle>;
  estimateGas(request: IGasEstimateRequest): Promise<string>;
  lookupName(address: string): Promise<string | null>;
  getTokenMetadata(contractAddress: string): Promise<ITokenMetadata>;
  healthCheck(): Promise<IProviderHealth>;
  disconnect(): Promise<void>;
}
