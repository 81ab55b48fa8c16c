// Resolves after delayMs or as soon as the signal aborts, whichever comes first.
export const abortableDelay = async (delayMs: number, signal: AbortSignal): Promise<void> => {
  if (signal.aborted || delayMs <= 0) {
    return;
  }

  await new Promise<void>((resolve: () => void): void => {
    const onAbort = (): void => {
      clearTimeout(timeoutHandle);
      resolve();
    };
    const timeoutHandle: NodeJS.Timeout = setTimeout((): void => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, delayMs);

    signal.addEventListener('abort', onAbort, { once: true });
  });
};
