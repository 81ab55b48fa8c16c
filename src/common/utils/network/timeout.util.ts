import { NetworkError } from '../../errors/explorer-errors';

export const withTimeout = async <TResult>(
  operation: Promise<TResult>,
  timeoutMs: number,
  label: string,
): Promise<TResult> => {
  let timeoutHandle: NodeJS.Timeout | undefined;

  const timeoutPromise: Promise<never> = new Promise<never>(
    (_resolve: (value: never) => void, reject: (reason: unknown) => void): void => {
      timeoutHandle = setTimeout((): void => {
        reject(new NetworkError(`${label} timed out after ${timeoutMs}ms`));
      }, timeoutMs);
    },
  );

  try {
    return await Promise.race([operation, timeoutPromise]);
  } finally {
    clearTimeout(timeoutHandle);
  }
};
