/**
 * Division and Modulo
 *
 * Binary long division. The prefixes of the dividend (a, a/2, a/4, ...) are
 * visited from the shortest up; prefix i ends in bit i of the dividend. Each
 * step doubles the running quotient and remainder, brings down that bit, and
 * subtracts the divisor once when the remainder reaches it. Before that
 * correction 0 <= r < 2 * divisor; after it 0 <= r < divisor.
 *
 * The walk is a loop over bit positions, so the call depth stays constant
 * whatever the dividend's bit length.
 */

import type { DivModResult } from '../types.js';
import { createDebugLogger } from '../debug.js';
import { validateNonZeroDivisor } from '../validation.js';
import { increment } from './addition.js';
import { BitInteger } from './bit-integer.js';
import { greaterThanOrEqual } from './compare.js';
import { sub } from './subtraction.js';

const debugLog = createDebugLogger('divide');

/**
 * Quotient and remainder of a / b
 *
 * @throws BitIntegerError with DIVISION_BY_ZERO when b is zero
 *
 * @example
 * ```typescript
 * const { quotient, remainder } = divmod(
 *   BitInteger.fromBinaryString('11000'),
 *   BitInteger.fromBinaryString('1001')
 * );
 * // quotient '10', remainder '110'
 * ```
 */
export function divmod(a: BitInteger, b: BitInteger): DivModResult {
  validateNonZeroDivisor(b, a);
  debugLog('Dividing', { dividendBits: a.length, divisorBits: b.length });

  const bits = a.bits;
  let quotient = BitInteger.zero();
  let remainder = BitInteger.zero();

  for (let i = bits.length - 1; i >= 0; i--) {
    quotient = quotient.double();
    remainder = remainder.double();
    if (bits[i] === true) {
      remainder = increment(remainder);
    }
    if (greaterThanOrEqual(remainder, b)) {
      remainder = sub(remainder, b);
      quotient = increment(quotient);
    }
  }

  return { quotient, remainder };
}

/**
 * floor(a / b)
 *
 * @throws BitIntegerError with DIVISION_BY_ZERO when b is zero
 */
export function floorDiv(a: BitInteger, b: BitInteger): BitInteger {
  return divmod(a, b).quotient;
}

/**
 * a mod b
 *
 * @throws BitIntegerError with DIVISION_BY_ZERO when b is zero
 */
export function mod(a: BitInteger, b: BitInteger): BitInteger {
  return divmod(a, b).remainder;
}
