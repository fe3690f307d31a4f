/**
 * Core type definitions for bit-integer
 */

import type { BitInteger } from './integer/bit-integer.js';

/**
 * A single binary digit. `true` is 1, `false` is 0.
 */
export type Bit = boolean;

/**
 * Little-endian bit sequence: index 0 is the ones place
 */
export type BitSequence = readonly Bit[];

/**
 * Result of a three-way comparison
 */
export type Ordering = -1 | 0 | 1;

/**
 * Quotient and remainder of a binary long division
 */
export interface DivModResult {
  /** floor(dividend / divisor) */
  readonly quotient: BitInteger;
  /** dividend - quotient * divisor, always below the divisor */
  readonly remainder: BitInteger;
}

/**
 * Inputs accepted by the createBitInteger factory
 *
 * Strings are big-endian binary literals, arrays are little-endian bits.
 */
export type BitIntegerInput = BitInteger | string | number | bigint | BitSequence;
