import { ValidationError } from '../errors/explorer-errors';

const ADDRESS_PATTERN: RegExp = /^0x[0-9a-fA-F]{40}$/;
const TX_HASH_PATTERN: RegExp = /^0x[0-9a-fA-F]{64}$/;
const HEX_DATA_PATTERN: RegExp = /^0x(?:[0-9a-fA-F]{2})*$/;
const DECIMAL_PATTERN: RegExp = /^\d+$/;

export function assertAddress(value: string, label: string = 'address'): string {
  const normalizedValue: string = value.trim();

  if (!ADDRESS_PATTERN.test(normalizedValue)) {
    throw new ValidationError(`Invalid ${label}: ${value}`);
  }

  return normalizedValue;
}

export function assertTransactionHash(value: string): string {
  const normalizedValue: string = value.trim();

  if (!TX_HASH_PATTERN.test(normalizedValue)) {
    throw new ValidationError(`Invalid transaction hash: ${value}`);
  }

  return normalizedValue;
}

export function assertHexData(value: string): string {
  const normalizedValue: string = value.trim();

  if (!HEX_DATA_PATTERN.test(normalizedValue)) {
    throw new ValidationError(`Invalid hex data: ${value}`);
  }

  return normalizedValue;
}

export function assertWeiAmount(value: string): bigint {
  const normalizedValue: string = value.trim();

  if (!DECIMAL_PATTERN.test(normalizedValue)) {
    throw new ValidationError(`Invalid wei amount: ${value}`);
  }

  return BigInt(normalizedValue);
}

export function assertBlockNumber(value: number): number {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ValidationError(`Invalid block number: ${String(value)}`);
  }

  return value;
}
