export enum ExplorerErrorKind {
  VALIDATION = 'validation',
  NETWORK = 'network',
  BLOCKCHAIN = 'blockchain',
  PARSE = 'parse',
}

export abstract class ExplorerError extends Error {
  protected constructor(
    public readonly kind: ExplorerErrorKind,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
  }
}

// Malformed address, hash or hex input. Raised before any I/O.
export class ValidationError extends ExplorerError {
  public constructor(message: string) {
    super(ExplorerErrorKind.VALIDATION, message);
    this.name = 'ValidationError';
  }
}

export class NetworkError extends ExplorerError {
  public constructor(message: string, cause?: unknown) {
    super(ExplorerErrorKind.NETWORK, message, cause);
    this.name = 'NetworkError';
  }
}

// Well-formed request rejected by the backend.
export class BlockchainError extends ExplorerError {
  public constructor(message: string, cause?: unknown) {
    super(ExplorerErrorKind.BLOCKCHAIN, message, cause);
    this.name = 'BlockchainError';
  }
}

export class ParseError extends ExplorerError {
  public constructor(message: string) {
    super(ExplorerErrorKind.PARSE, message);
    this.name = 'ParseError';
  }
}

export const isExplorerError = (error: unknown): error is ExplorerError =>
  error instanceof ExplorerError;

export const toErrorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
