/**
 * Multiplication
 *
 * Karatsuba divide-and-conquer over addition and subtraction, with a
 * shift-and-add routine for operands at or below the configured threshold.
 *
 * Both operands are split by the same rule: with n the longer bit length and
 * m = floor(n / 2), `low` is the least significant m bits and `high` is
 * everything from bit m upward. Then
 *
 *   a * b = p1 * 2^(2m) + (p3 - p1 - p2) * 2^m + p2
 *
 * where p1 = aHigh * bHigh, p2 = aLow * bLow and
 * p3 = (aHigh + aLow) * (bHigh + bLow). Recursion depth grows with log2(n).
 */

import { getConfig } from '../config.js';
import { createDebugLogger } from '../debug.js';
import { add } from './addition.js';
import { BitInteger } from './bit-integer.js';
import { sub } from './subtraction.js';

const debugLog = createDebugLogger('multiply');

/**
 * a * b by binary shift-and-add
 *
 * Walks `b` from its most significant bit down: the partial product is
 * doubled at every step and `a` is added wherever `b` has a one bit. This is
 * the unrolled form of "halve b, multiply, double, add a if b is odd".
 */
export function shiftAndAddMultiply(a: BitInteger, b: BitInteger): BitInteger {
  if (a.isZero() || b.isZero()) {
    return BitInteger.zero();
  }
  const bBits = b.bits;
  let product = BitInteger.zero();
  for (let i = bBits.length - 1; i >= 0; i--) {
    product = product.double();
    if (bBits[i] === true) {
      product = add(product, a);
    }
  }
  return product;
}

/**
 * Karatsuba step; `threshold` is fixed for the whole call tree
 */
function karatsuba(a: BitInteger, b: BitInteger, threshold: number): BitInteger {
  const n = Math.max(a.length, b.length);
  if (n <= threshold) {
    return shiftAndAddMultiply(a, b);
  }

  const m = Math.floor(n / 2);
  const aLow = a.lowBits(m);
  const aHigh = a.highBits(m);
  const bLow = b.lowBits(m);
  const bHigh = b.highBits(m);

  const p1 = karatsuba(aHigh, bHigh, threshold);
  const p2 = karatsuba(aLow, bLow, threshold);
  const p3 = karatsuba(add(aHigh, aLow), add(bHigh, bLow), threshold);

  // p3 - p1 - p2 = aHigh * bLow + aLow * bHigh, never negative
  const middle = sub(sub(p3, p1), p2);

  return add(add(p1.shiftLeft(2 * m), middle.shiftLeft(m)), p2);
}

/**
 * a * b
 *
 * @example
 * ```typescript
 * mul(BitInteger.fromBinaryString('11000'), BitInteger.fromBinaryString('1001')).toString();
 * // '11011000'
 * ```
 */
export function mul(a: BitInteger, b: BitInteger): BitInteger {
  const { multiplyThreshold } = getConfig();
  debugLog('Multiplying', {
    aBits: a.length,
    bBits: b.length,
    threshold: multiplyThreshold,
  });
  return karatsuba(a, b, multiplyThreshold);
}

/**
 * a * a
 */
export function square(a: BitInteger): BitInteger {
  return mul(a, a);
}
