/**
 * Equality and ordering of BitIntegers
 *
 * Both operands are normalized, so a longer value is always the larger one
 * and equal values have identical bit sequences.
 */

import type { Ordering } from '../types.js';
import type { BitInteger } from './bit-integer.js';

/**
 * Three-way comparison: -1 if a < b, 0 if a == b, 1 if a > b
 */
export function compare(a: BitInteger, b: BitInteger): Ordering {
  if (a.length !== b.length) {
    return a.length < b.length ? -1 : 1;
  }
  const aBits = a.bits;
  const bBits = b.bits;
  for (let i = aBits.length - 1; i >= 0; i--) {
    const x = aBits[i] === true;
    const y = bBits[i] === true;
    if (x !== y) {
      return y ? -1 : 1;
    }
  }
  return 0;
}

export function equals(a: BitInteger, b: BitInteger): boolean {
  if (a.length !== b.length) {
    return false;
  }
  const aBits = a.bits;
  const bBits = b.bits;
  for (let i = 0; i < aBits.length; i++) {
    if (aBits[i] !== bBits[i]) {
      return false;
    }
  }
  return true;
}

export function lessThan(a: BitInteger, b: BitInteger): boolean {
  return compare(a, b) < 0;
}

export function lessThanOrEqual(a: BitInteger, b: BitInteger): boolean {
  return compare(a, b) <= 0;
}

export function greaterThan(a: BitInteger, b: BitInteger): boolean {
  return compare(a, b) > 0;
}

export function greaterThanOrEqual(a: BitInteger, b: BitInteger): boolean {
  return compare(a, b) >= 0;
}

export function max(a: BitInteger, b: BitInteger): BitInteger {
  return compare(a, b) >= 0 ? a : b;
}

export function min(a: BitInteger, b: BitInteger): BitInteger {
  return compare(a, b) <= 0 ? a : b;
}
