/**
 * BitInteger Representation
 *
 * An immutable unsigned magnitude stored as little-endian bits. The stored
 * sequence is always normalized: it never ends in a zero bit, and zero is
 * the empty sequence. Every method that produces a value returns a new
 * BitInteger.
 */

import type { Bit, BitSequence, Ordering } from '../types.js';
import { invalidFormatError, overflowError } from '../errors.js';
import {
  validateBinaryString,
  validateUnsignedBigInt,
  validateUnsignedInteger,
} from '../validation.js';
import { BitBuffer, normalizeBits } from './bit-buffer.js';
import { compare, equals } from './compare.js';

/**
 * Widest value toInteger() can return exactly (Number.MAX_SAFE_INTEGER = 2^53 - 1)
 */
export const MAX_SAFE_INTEGER_BITS = 53;

function validateBitPosition(position: number, what: string): void {
  if (!Number.isSafeInteger(position) || position < 0) {
    throw invalidFormatError(String(position), `${what} must be a non-negative integer`);
  }
}

export class BitInteger {
  private static readonly ZERO = new BitInteger([]);
  private static readonly ONE = new BitInteger([true]);

  private readonly digits: readonly Bit[];

  private constructor(normalizedBits: Bit[]) {
    this.digits = Object.freeze(normalizedBits);
  }

  /** The value 0 */
  static zero(): BitInteger {
    return BitInteger.ZERO;
  }

  /** The value 1 */
  static one(): BitInteger {
    return BitInteger.ONE;
  }

  /**
   * Parse a big-endian binary literal
   *
   * Leading zeros are accepted and dropped. The empty string is zero.
   *
   * @throws BitIntegerError with INVALID_FORMAT on any character other than '0' or '1'
   */
  static fromBinaryString(s: string): BitInteger {
    validateBinaryString(s);
    const buffer = new BitBuffer();
    for (let i = s.length - 1; i >= 0; i--) {
      buffer.append(s[i] === '1');
    }
    return BitInteger.fromBuffer(buffer);
  }

  /**
   * Build from little-endian bits (index 0 is the ones place)
   */
  static fromBits(bits: Iterable<Bit>): BitInteger {
    return BitInteger.fromBuffer(new BitBuffer().appendAll(bits));
  }

  private static fromBuffer(buffer: BitBuffer): BitInteger {
    if (buffer.length === 0) {
      return BitInteger.ZERO;
    }
    return new BitInteger(buffer.toBits());
  }

  /**
   * Convert a native unsigned integer
   *
   * @throws BitIntegerError with INVALID_FORMAT unless `n` is a non-negative safe integer
   */
  static fromInteger(n: number): BitInteger {
    validateUnsignedInteger(n);
    const buffer = new BitBuffer();
    let rest = n;
    while (rest > 0) {
      buffer.append(rest % 2 === 1);
      rest = Math.floor(rest / 2);
    }
    return BitInteger.fromBuffer(buffer);
  }

  /**
   * Convert a non-negative bigint
   *
   * @throws BitIntegerError with INVALID_FORMAT for negative values
   */
  static fromBigInt(n: bigint): BitInteger {
    validateUnsignedBigInt(n);
    const buffer = new BitBuffer();
    let rest = n;
    while (rest > 0n) {
      buffer.append((rest & 1n) === 1n);
      rest >>= 1n;
    }
    return BitInteger.fromBuffer(buffer);
  }

  /**
   * Normalized little-endian bits (read-only view)
   */
  get bits(): BitSequence {
    return this.digits;
  }

  /**
   * Number of bits in normalized form, 0 for zero
   */
  get length(): number {
    return this.digits.length;
  }

  isZero(): boolean {
    return this.digits.length === 0;
  }

  isOdd(): boolean {
    return this.digits[0] === true;
  }

  /**
   * Bit at position `index`; positions past the top are zero
   */
  bitAt(index: number): Bit {
    return this.digits[index] === true;
  }

  /**
   * floor(this / 2)
   *
   * Dropping the ones place cannot expose a leading zero.
   */
  halve(): BitInteger {
    if (this.digits.length <= 1) {
      return BitInteger.ZERO;
    }
    return new BitInteger(this.digits.slice(1));
  }

  /**
   * this * 2
   */
  double(): BitInteger {
    return this.shiftLeft(1);
  }

  /**
   * this * 2^k, by prepending `k` zero bits
   *
   * @throws BitIntegerError with INVALID_FORMAT unless `k` is a non-negative safe integer
   */
  shiftLeft(k: number): BitInteger {
    validateBitPosition(k, 'shift amount');
    if (k === 0 || this.isZero()) {
      return this;
    }
    return BitInteger.fromBuffer(new BitBuffer().appendZeros(k).appendAll(this.digits));
  }

  /**
   * The least significant `m` bits, i.e. this mod 2^m
   *
   * @throws BitIntegerError with INVALID_FORMAT unless `m` is a non-negative safe integer
   */
  lowBits(m: number): BitInteger {
    validateBitPosition(m, 'split position');
    if (m >= this.digits.length) {
      return this;
    }
    return BitInteger.fromNormalized(normalizeBits(this.digits.slice(0, m)));
  }

  /**
   * The bits from position `m` upward, i.e. floor(this / 2^m)
   *
   * @throws BitIntegerError with INVALID_FORMAT unless `m` is a non-negative safe integer
   */
  highBits(m: number): BitInteger {
    validateBitPosition(m, 'split position');
    if (m === 0) {
      return this;
    }
    return BitInteger.fromNormalized(this.digits.slice(m));
  }

  /**
   * Values are stored normalized; this returns an equal value with no
   * most significant zero bits.
   */
  normalize(): BitInteger {
    return this;
  }

  equals(other: BitInteger): boolean {
    return equals(this, other);
  }

  compareTo(other: BitInteger): Ordering {
    return compare(this, other);
  }

  /**
   * Big-endian binary rendering; zero renders as "0"
   */
  toString(): string {
    if (this.digits.length === 0) {
      return '0';
    }
    let out = '';
    for (let i = this.digits.length - 1; i >= 0; i--) {
      out += this.digits[i] === true ? '1' : '0';
    }
    return out;
  }

  /**
   * Native number value
   *
   * @throws BitIntegerError with OVERFLOW above Number.MAX_SAFE_INTEGER
   */
  toInteger(): number {
    if (this.digits.length > MAX_SAFE_INTEGER_BITS) {
      throw overflowError(this.digits.length, MAX_SAFE_INTEGER_BITS);
    }
    let value = 0;
    for (let i = this.digits.length - 1; i >= 0; i--) {
      value = value * 2 + (this.digits[i] === true ? 1 : 0);
    }
    return value;
  }

  toBigInt(): bigint {
    let value = 0n;
    for (let i = this.digits.length - 1; i >= 0; i--) {
      value = (value << 1n) | (this.digits[i] === true ? 1n : 0n);
    }
    return value;
  }

  /**
   * Wrap bits already known to be normalized
   */
  private static fromNormalized(bits: Bit[]): BitInteger {
    return bits.length === 0 ? BitInteger.ZERO : new BitInteger(bits);
  }
}

/**
 * Wrap the committed bits of a buffer; pending zeros are dropped
 *
 * @internal
 */
export function fromBitBuffer(buffer: BitBuffer): BitInteger {
  return BitInteger.fromBits(buffer.toBits());
}
