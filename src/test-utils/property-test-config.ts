/**
 * Property-based testing configuration and utilities
 *
 * Shared fast-check parameters and arbitraries. Property tests use native
 * bigint as the reference value for every BitInteger they generate.
 */

import * as fc from 'fast-check';
import { BitInteger } from '../integer/bit-integer.js';

/**
 * Standard configuration for property-based tests
 * - 100 iterations per property
 * - Seed logging for reproducibility
 * - Shrinking enabled for minimal failing examples
 */
export const PROPERTY_TEST_CONFIG: fc.Parameters<unknown> = {
  numRuns: 100,
  verbose: true,
  seed: Date.now(), // Can be overridden for reproducibility
  endOnFailure: false,
};

/**
 * Configuration for slower properties (large multiplications)
 */
export const FAST_PROPERTY_TEST_CONFIG: fc.Parameters<unknown> = {
  numRuns: 25,
  verbose: false,
  seed: Date.now(),
};

/**
 * Largest operand width generated by default, in bits
 */
export const DEFAULT_MAX_BITS = 160;

/**
 * Arbitrary unsigned bigint below 2^maxBits
 */
export function arbitraryUnsigned(maxBits: number = DEFAULT_MAX_BITS): fc.Arbitrary<bigint> {
  return fc.bigUintN(maxBits);
}

/**
 * Arbitrary unsigned bigint in [1, 2^maxBits)
 */
export function arbitraryNonZeroUnsigned(maxBits: number = DEFAULT_MAX_BITS): fc.Arbitrary<bigint> {
  return fc.bigInt({ min: 1n, max: (1n << BigInt(maxBits)) - 1n });
}

/**
 * Arbitrary BitInteger paired with its bigint value
 */
export function arbitraryBitInteger(
  maxBits: number = DEFAULT_MAX_BITS
): fc.Arbitrary<{ value: bigint; int: BitInteger }> {
  return arbitraryUnsigned(maxBits).map((value) => ({ value, int: BitInteger.fromBigInt(value) }));
}

/**
 * Arbitrary non-zero BitInteger paired with its bigint value
 */
export function arbitraryNonZeroBitInteger(
  maxBits: number = DEFAULT_MAX_BITS
): fc.Arbitrary<{ value: bigint; int: BitInteger }> {
  return arbitraryNonZeroUnsigned(maxBits).map((value) => ({
    value,
    int: BitInteger.fromBigInt(value),
  }));
}

/**
 * Arbitrary binary literal, possibly empty and possibly with leading zeros
 */
export function arbitraryBinaryString(maxLength: number = 64): fc.Arbitrary<string> {
  return fc
    .array(fc.constantFrom('0', '1'), { minLength: 0, maxLength })
    .map((chars) => chars.join(''));
}

/**
 * Arbitrary little-endian bit array, possibly with high zero bits
 */
export function arbitraryBits(maxLength: number = 64): fc.Arbitrary<boolean[]> {
  return fc.array(fc.boolean(), { minLength: 0, maxLength });
}

/**
 * Canonical binary rendering of a bigint ('0' for zero)
 */
export function toBinary(value: bigint): string {
  return value.toString(2);
}

/**
 * Strip leading zeros from a binary literal, keeping at least one digit
 */
export function canonicalBinary(s: string): string {
  const stripped = s.replace(/^0+/, '');
  return stripped === '' ? '0' : stripped;
}
