import { afterEach, describe, expect, it, vi } from 'vitest';

import { abortableDelay } from './abortable-delay.util';
import { withTimeout } from './timeout.util';
import { NetworkError } from '../../errors/explorer-errors';

describe('withTimeout', (): void => {
  afterEach((): void => {
    vi.useRealTimers();
  });

  it('returns the operation result when it settles in time', async (): Promise<void> => {
    await expect(withTimeout(Promise.resolve(42), 1000, 'eth_chainId')).resolves.toBe(42);
  });

  it('rejects with a network error once the deadline passes', async (): Promise<void> => {
    vi.useFakeTimers();
    const pending: Promise<number> = withTimeout(
      new Promise<number>((): void => undefined),
      500,
      'RPC eth_blockNumber',
    );
    const assertion: Promise<void> = expect(pending).rejects.toThrow(
      'RPC eth_blockNumber timed out after 500ms',
    );

    await vi.advanceTimersByTimeAsync(501);
    await assertion;
    await expect(pending).rejects.toBeInstanceOf(NetworkError);
  });

  it('passes operation errors through unchanged', async (): Promise<void> => {
    await expect(
      withTimeout(Promise.reject(new Error('boom')), 1000, 'eth_getBalance'),
    ).rejects.toThrow('boom');
  });
});

describe('abortableDelay', (): void => {
  afterEach((): void => {
    vi.useRealTimers();
  });

  it('resolves early when the signal aborts', async (): Promise<void> => {
    vi.useFakeTimers();
    const controller: AbortController = new AbortController();
    let resolved: boolean = false;
    const delay: Promise<void> = abortableDelay(10_000, controller.signal).then((): void => {
      resolved = true;
    });

    await vi.advanceTimersByTimeAsync(100);
    expect(resolved).toBe(false);

    controller.abort();
    await delay;
    expect(resolved).toBe(true);
  });

  it('returns immediately for an already aborted signal', async (): Promise<void> => {
    const controller: AbortController = new AbortController();
    controller.abort();

    await expect(abortableDelay(10_000, controller.signal)).resolves.toBeUndefined();
  });
});
