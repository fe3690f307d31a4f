/**
 * Ripple-carry addition
 *
 * The only operation that combines bits directly; subtraction,
 * multiplication and division are all built on top of add().
 */

import type { Bit } from '../types.js';
import { BitBuffer } from './bit-buffer.js';
import { BitInteger, fromBitBuffer } from './bit-integer.js';

/**
 * Sum bit of a full adder: odd parity of the three inputs
 */
export function sumBit(a: Bit, b: Bit, carry: Bit): Bit {
  return (a !== b) !== carry;
}

/**
 * Carry-out of a full adder: set when at least two inputs are set
 */
export function carryBit(a: Bit, b: Bit, carry: Bit): Bit {
  return (a && b) || (b && carry) || (a && carry);
}

/**
 * a + b
 *
 * Walks both operands from the ones place upward, treating missing high
 * bits of the shorter operand as zero, then appends the final carry.
 */
export function add(a: BitInteger, b: BitInteger): BitInteger {
  const aBits = a.bits;
  const bBits = b.bits;
  const width = Math.max(aBits.length, bBits.length);
  const out = new BitBuffer();
  let carry = false;

  for (let i = 0; i < width; i++) {
    const x = aBits[i] === true;
    const y = bBits[i] === true;
    out.append(sumBit(x, y, carry));
    carry = carryBit(x, y, carry);
  }
  // a zero carry stays pending and never reaches the result
  out.append(carry);

  return fromBitBuffer(out);
}

/**
 * a + 1
 */
export function increment(a: BitInteger): BitInteger {
  return add(a, BitInteger.one());
}
