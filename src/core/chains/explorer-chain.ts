export enum ExplorerChain {
  ETHEREUM = 'ethereum',
  GOERLI = 'goerli',
  SEPOLIA = 'sepolia',
  POLYGON = 'polygon',
  ARBITRUM = 'arbitrum',
  OPTIMISM = 'optimism',
  BASE = 'base',
}

// Numeric ids not listed here pass through unchanged.
export type ExplorerChainRef = ExplorerChain | number;

export const ENS_REGISTRY_CHAIN_ID = 1;

const EXPLORER_CHAIN_IDS: Readonly<Record<ExplorerChain, number>> = {
  [ExplorerChain.ETHEREUM]: 1,
  [ExplorerChain.GOERLI]: 5,
  [ExplorerChain.SEPOLIA]: 11_155_111,
  [ExplorerChain.POLYGON]: 137,
  [ExplorerChain.ARBITRUM]: 42_161,
  [ExplorerChain.OPTIMISM]: 10,
  [ExplorerChain.BASE]: 8453,
};

export const toExplorerChainId = (chain: ExplorerChainRef): number =>
  typeof chain === 'number' ? chain : EXPLORER_CHAIN_IDS[chain];

export const resolveExplorerChain = (chainId: number): ExplorerChainRef => {
  for (const chain of Object.values(ExplorerChain)) {
    if (EXPLORER_CHAIN_IDS[chain] === chainId) {
      return chain;
    }
  }

  return chainId;
};

export const describeExplorerChain = (chain: ExplorerChainRef): string =>
  typeof chain === 'number' ? `custom(${chain})` : chain;
