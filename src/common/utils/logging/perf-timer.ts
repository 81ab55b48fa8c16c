import type { Logger } from '@nestjs/common';

export class PerfTimer {
  private readonly startedAtMs: number = performance.now();

  public constructor(
    private readonly logger: Logger,
    private readonly label: string,
  ) {}

  public elapsedMs(): number {
    return Math.round(performance.now() - this.startedAtMs);
  }

  public finish(): number {
    const elapsedMs: number = this.elapsedMs();
    this.logger.debug(`${this.label} took ${elapsedMs}ms`);
    return elapsedMs;
  }
}

export const measureAsync = async <TResult>(
  logger: Logger,
  label: string,
  operation: () => Promise<TResult>,
): Promise<TResult> => {
  const timer: PerfTimer = new PerfTimer(logger, label);

  try {
    return await operation();
  } finally {
    timer.finish();
  }
};
