/**
 * Subtraction by two's complement over the minuend's width
 *
 * With k = a.length, NOT(b) zero-extended to k bits equals 2^k - 1 - b, so
 * a + NOT(b) + 1 = a - b + 2^k. Since 0 <= a - b < 2^k the sum has exactly
 * k + 1 bits, and dropping bit k leaves a - b.
 */

import type { Bit } from '../types.js';
import { negativeResultError } from '../errors.js';
import { add, increment } from './addition.js';
import { BitInteger } from './bit-integer.js';
import { lessThan } from './compare.js';

/**
 * Bitwise NOT of `value` zero-extended to exactly `width` bits
 */
export function complement(value: BitInteger, width: number): BitInteger {
  const bits = value.bits;
  const inverted: Bit[] = [];
  for (let i = 0; i < width; i++) {
    inverted.push(bits[i] !== true);
  }
  return BitInteger.fromBits(inverted);
}

/**
 * a - b
 *
 * @throws BitIntegerError with NEGATIVE_RESULT when b > a
 */
export function sub(a: BitInteger, b: BitInteger): BitInteger {
  if (lessThan(a, b)) {
    throw negativeResultError(a.toString(), b.toString());
  }

  const width = a.length;
  const sum = increment(add(a, complement(b, width)));

  // drop the overflow bit at position `width`; fromBits strips the leading zeros
  return BitInteger.fromBits(sum.bits.slice(0, width));
}

/**
 * a - 1
 *
 * @throws BitIntegerError with NEGATIVE_RESULT for zero
 */
export function decrement(a: BitInteger): BitInteger {
  return sub(a, BitInteger.one());
}
