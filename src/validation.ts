/**
 * Input Validation
 *
 * Centralized checks for the public entry points. Each function returns
 * normally for valid input and throws the matching BitIntegerError otherwise.
 */

import type { BitIntegerConfig } from './config.js';
import type { BitInteger } from './integer/bit-integer.js';
import { divisionByZeroError, invalidConfigError, invalidFormatError } from './errors.js';

/**
 * Validate a big-endian binary literal
 *
 * The empty string is valid and denotes zero.
 *
 * @throws BitIntegerError with INVALID_FORMAT naming the first bad character
 */
export function validateBinaryString(value: string): void {
  for (let i = 0; i < value.length; i++) {
    const ch = value[i];
    if (ch !== '0' && ch !== '1') {
      throw invalidFormatError(value, `unexpected character '${ch ?? ''}'`, i);
    }
  }
}

/**
 * Validate a native unsigned integer
 *
 * @throws BitIntegerError with INVALID_FORMAT for negative, fractional or unsafe values
 */
export function validateUnsignedInteger(value: number): void {
  if (!Number.isSafeInteger(value)) {
    throw invalidFormatError(String(value), 'not a safe integer');
  }
  if (value < 0) {
    throw invalidFormatError(String(value), 'negative value');
  }
}

/**
 * Validate an unsigned bigint
 *
 * @throws BitIntegerError with INVALID_FORMAT for negative values
 */
export function validateUnsignedBigInt(value: bigint): void {
  if (value < 0n) {
    throw invalidFormatError(value.toString(), 'negative value');
  }
}

/**
 * Validate a divisor
 *
 * @param divisor - Value to divide by
 * @param dividend - Value being divided, reported in the error
 * @throws BitIntegerError with DIVISION_BY_ZERO for a zero divisor
 */
export function validateNonZeroDivisor(divisor: BitInteger, dividend: BitInteger): void {
  if (divisor.isZero()) {
    throw divisionByZeroError(dividend.toString());
  }
}

/**
 * Validate a complete configuration object
 *
 * @throws BitIntegerError with INVALID_CONFIG
 */
export function validateConfig(config: BitIntegerConfig): void {
  if (!Number.isSafeInteger(config.multiplyThreshold) || config.multiplyThreshold < 1) {
    throw invalidConfigError('multiplyThreshold', config.multiplyThreshold, ['positive integer']);
  }
  if (typeof config.debug !== 'boolean') {
    throw invalidConfigError('debug', config.debug, [true, false]);
  }
}
