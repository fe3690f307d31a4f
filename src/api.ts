/**
 * Public API for bit-integer
 *
 * A factory that accepts any supported input form, plus the library
 * configuration entry points.
 *
 * @module api
 */

import type { BitIntegerInput } from './types.js';
import { BitInteger } from './integer/bit-integer.js';

export { configure, getConfig, resetConfig, DEFAULT_CONFIG, type BitIntegerConfig } from './config.js';

/**
 * Create a BitInteger from any supported input
 *
 * - `BitInteger`: returned as is
 * - `string`: big-endian binary literal ('' is zero)
 * - `number`: non-negative safe integer
 * - `bigint`: non-negative bigint
 * - bit array: little-endian bits
 *
 * @throws BitIntegerError with INVALID_FORMAT for input outside these forms
 *
 * @example
 * ```typescript
 * createBitInteger('11000').toInteger(); // 24
 * createBitInteger(24n).toString();      // '11000'
 * createBitInteger([false, true]).toString(); // '10'
 * ```
 */
export function createBitInteger(input: BitIntegerInput): BitInteger {
  if (input instanceof BitInteger) {
    return input;
  }
  switch (typeof input) {
    case 'string':
      return BitInteger.fromBinaryString(input);
    case 'number':
      return BitInteger.fromInteger(input);
    case 'bigint':
      return BitInteger.fromBigInt(input);
    default:
      return BitInteger.fromBits(input);
  }
}
