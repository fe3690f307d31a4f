/**
 * BitInteger assertion helpers for tests
 */

import { expect } from 'vitest';
import { BitIntegerError, type ErrorCode } from '../errors.js';
import type { BitInteger } from '../integer/bit-integer.js';

/**
 * Assert that a BitInteger is normalized and has the given value
 */
export function expectBitIntegerValue(actual: BitInteger, expected: bigint): void {
  expect(actual.toBigInt()).toBe(expected);
  expectNormalized(actual);
}

/**
 * Assert that the stored bits carry no most significant zero
 */
export function expectNormalized(actual: BitInteger): void {
  const bits = actual.bits;
  if (bits.length > 0) {
    expect(bits[bits.length - 1]).toBe(true);
  }
  expect(bits.length).toBe(actual.toBigInt().toString(2).replace(/^0$/, '').length);
}

/**
 * Whether a BitInteger is normalized and has the given value
 */
export function hasValue(actual: BitInteger, expected: bigint): boolean {
  const bits = actual.bits;
  const normalized = bits.length === 0 || bits[bits.length - 1] === true;
  return normalized && actual.toBigInt() === expected;
}

/**
 * Run `fn`, assert it throws a BitIntegerError with `code`, and return the error
 */
export function expectBitIntegerError(fn: () => unknown, code: ErrorCode): BitIntegerError {
  try {
    fn();
  } catch (error) {
    expect(error).toBeInstanceOf(BitIntegerError);
    if (error instanceof BitIntegerError) {
      expect(error.code).toBe(code);
      return error;
    }
    throw error;
  }
  throw new Error(`Expected a BitIntegerError with code ${code}`);
}
