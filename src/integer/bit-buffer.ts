/**
 * Incremental bit accumulation with deferred normalization
 *
 * Bits arrive from least to most significant. A run of zero bits is held
 * back as a pending count and only written once a later one bit arrives, so
 * the committed bits never end in a zero.
 */

import type { Bit, BitSequence } from '../types.js';

export class BitBuffer {
  private readonly committed: Bit[] = [];
  private pendingZeros = 0;

  /**
   * Append `bit` as the new most significant bit
   */
  append(bit: Bit): this {
    if (!bit) {
      this.pendingZeros++;
      return this;
    }
    for (; this.pendingZeros > 0; this.pendingZeros--) {
      this.committed.push(false);
    }
    this.committed.push(true);
    return this;
  }

  /**
   * Append `count` zero bits
   */
  appendZeros(count: number): this {
    this.pendingZeros += count;
    return this;
  }

  /**
   * Append a little-endian run of bits
   */
  appendAll(bits: Iterable<Bit>): this {
    for (const bit of bits) {
      this.append(bit);
    }
    return this;
  }

  /** Number of committed bits */
  get length(): number {
    return this.committed.length;
  }

  /**
   * Snapshot of the committed bits. Pending zeros are dropped.
   */
  toBits(): Bit[] {
    return this.committed.slice();
  }
}

/**
 * Strip most significant zero bits from a little-endian sequence
 */
export function normalizeBits(bits: BitSequence): Bit[] {
  let end = bits.length;
  while (end > 0 && bits[end - 1] !== true) {
    end--;
  }
  return bits.slice(0, end);
}
