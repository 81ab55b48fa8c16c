import type { Logger } from '@nestjs/common';
import { describe, expect, it, vi } from 'vitest';

import { measureAsync } from './perf-timer';

describe('measureAsync', (): void => {
  it('logs the elapsed time at debug level once the call settles', async (): Promise<void> => {
    const debugMock = vi.fn();
    const loggerStub: Logger = { debug: debugMock } as unknown as Logger;

    const result: string = await measureAsync(
      loggerStub,
      'getAddressInfo',
      async (): Promise<string> => 'done',
    );

    expect(result).toBe('done');
    expect(debugMock).toHaveBeenCalledTimes(1);
    expect(debugMock.mock.calls[0]?.[0]).toMatch(/^getAddressInfo took \d+ms$/);
  });

  it('still logs when the operation fails', async (): Promise<void> => {
    const debugMock = vi.fn();
    const loggerStub: Logger = { debug: debugMock } as unknown as Logger;

    await expect(
      measureAsync(loggerStub, 'getBlock', async (): Promise<never> => {
        throw new Error('rpc down');
      }),
    ).rejects.toThrow('rpc down');
    expect(debugMock).toHaveBeenCalledTimes(1);
  });
});
