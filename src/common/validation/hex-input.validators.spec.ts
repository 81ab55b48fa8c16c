import { describe, expect, it } from 'vitest';

import {
  assertAddress,
  assertBlockNumber,
  assertHexData,
  assertTransactionHash,
  assertWeiAmount,
} from './hex-input.validators';
import { ValidationError } from '../errors/explorer-errors';

const ADDRESS: string = '0x1111111111111111111111111111111111111111';
const TX_HASH: string = `0x${'ab'.repeat(32)}`;

describe('hex input validators', (): void => {
  it('accepts a 20-byte address and trims whitespace', (): void => {
    expect(assertAddress(`  ${ADDRESS} `)).toBe(ADDRESS);
  });

  it('rejects short addresses with a validation error', (): void => {
    expect((): string => assertAddress('0xabc')).toThrow(ValidationError);
    expect((): string => assertAddress('0xabc', 'sender')).toThrow('Invalid sender: 0xabc');
  });

  it('accepts only 32-byte transaction hashes', (): void => {
    expect(assertTransactionHash(TX_HASH)).toBe(TX_HASH);
    expect((): string => assertTransactionHash(ADDRESS)).toThrow(
      `Invalid transaction hash: ${ADDRESS}`,
    );
  });

  it('requires an even number of hex digits in call data', (): void => {
    expect(assertHexData('0x')).toBe('0x');
    expect(assertHexData('0xa9059cbb')).toBe('0xa9059cbb');
    expect((): string => assertHexData('0xabc')).toThrow('Invalid hex data: 0xabc');
    expect((): string => assertHexData('a9059cbb')).toThrow(ValidationError);
  });

  it('parses decimal wei amounts', (): void => {
    expect(assertWeiAmount('1000000000000000000')).toBe(1_000_000_000_000_000_000n);
    expect((): bigint => assertWeiAmount('-1')).toThrow('Invalid wei amount: -1');
  });

  it('checks block numbers', (): void => {
    expect(assertBlockNumber(0)).toBe(0);
    expect((): number => assertBlockNumber(-1)).toThrow('Invalid block number: -1');
  });
});
