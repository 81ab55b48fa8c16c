import { describe, expect, it } from 'vitest';

import {
  describeExplorerChain,
  ExplorerChain,
  resolveExplorerChain,
  toExplorerChainId,
} from './explorer-chain';

describe('explorer chain mapping', (): void => {
  it('maps known chains to their numeric ids', (): void => {
    expect(toExplorerChainId(ExplorerChain.ETHEREUM)).toBe(1);
    expect(toExplorerChainId(ExplorerChain.SEPOLIA)).toBe(11_155_111);
    expect(toExplorerChainId(ExplorerChain.BASE)).toBe(8453);
  });

  it('passes unknown chain ids through numerically', (): void => {
    expect(resolveExplorerChain(31_337)).toBe(31_337);
    expect(toExplorerChainId(31_337)).toBe(31_337);
    expect(describeExplorerChain(31_337)).toBe('custom(31337)');
  });

  it('resolves known ids back to the enum', (): void => {
    expect(resolveExplorerChain(137)).toBe(ExplorerChain.POLYGON);
    expect(describeExplorerChain(resolveExplorerChain(10))).toBe('optimism');
  });
});
