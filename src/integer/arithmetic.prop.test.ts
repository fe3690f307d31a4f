/**
 * Property-Based Tests for BitInteger Arithmetic
 *
 * Every operation is checked against native bigint arithmetic, plus the
 * algebraic laws the operations must satisfy:
 * - add: commutativity, associativity, identity
 * - sub: inverse of add, rejection of negative results
 * - mul: commutativity, identity, zero, independence from the base-case threshold
 * - divmod: a = q * b + r with 0 <= r < b
 */

import { describe, it } from 'vitest';
import * as fc from 'fast-check';
import { configure, resetConfig } from '../config.js';
import { BitIntegerError, ErrorCode } from '../errors.js';
import {
  hasValue,
  FAST_PROPERTY_TEST_CONFIG,
  PROPERTY_TEST_CONFIG,
  arbitraryBitInteger,
  arbitraryNonZeroBitInteger,
} from '../test-utils/index.js';
import { add } from './addition.js';
import { BitInteger } from './bit-integer.js';
import { compare, equals, lessThan } from './compare.js';
import { divmod } from './division.js';
import { mul, shiftAndAddMultiply } from './multiplication.js';
import { sub } from './subtraction.js';

const MUL_BITS = 128;

describe('Property: Addition', () => {
  it('should agree with bigint addition', () => {
    fc.assert(
      fc.property(arbitraryBitInteger(), arbitraryBitInteger(), (a, b) => {
        return hasValue(add(a.int, b.int), a.value + b.value);
      }),
      PROPERTY_TEST_CONFIG
    );
  });

  it('should satisfy add(a, b) = add(b, a) (commutativity)', () => {
    fc.assert(
      fc.property(arbitraryBitInteger(), arbitraryBitInteger(), (a, b) => {
        return equals(add(a.int, b.int), add(b.int, a.int));
      }),
      PROPERTY_TEST_CONFIG
    );
  });

  it('should satisfy add(add(a, b), c) = add(a, add(b, c)) (associativity)', () => {
    fc.assert(
      fc.property(arbitraryBitInteger(), arbitraryBitInteger(), arbitraryBitInteger(), (a, b, c) => {
        return equals(add(add(a.int, b.int), c.int), add(a.int, add(b.int, c.int)));
      }),
      PROPERTY_TEST_CONFIG
    );
  });

  it('should satisfy double(a) = add(a, a) = mul(a, 2)', () => {
    const two = BitInteger.fromBinaryString('10');
    fc.assert(
      fc.property(arbitraryBitInteger(), (a) => {
        const doubled = a.int.double();
        return equals(doubled, add(a.int, a.int)) && equals(doubled, mul(a.int, two));
      }),
      PROPERTY_TEST_CONFIG
    );
  });
});

describe('Property: Subtraction', () => {
  it('should agree with bigint subtraction when b <= a', () => {
    fc.assert(
      fc.property(arbitraryBitInteger(), arbitraryBitInteger(), (x, y) => {
        const [big, small] = x.value >= y.value ? [x, y] : [y, x];
        return hasValue(sub(big.int, small.int), big.value - small.value);
      }),
      PROPERTY_TEST_CONFIG
    );
  });

  it('should satisfy sub(a, a) = 0', () => {
    fc.assert(
      fc.property(arbitraryBitInteger(), (a) => {
        return hasValue(sub(a.int, a.int), 0n);
      }),
      PROPERTY_TEST_CONFIG
    );
  });

  it('should satisfy sub(add(a, b), b) = a', () => {
    fc.assert(
      fc.property(arbitraryBitInteger(), arbitraryBitInteger(), (a, b) => {
        return equals(sub(add(a.int, b.int), b.int), a.int);
      }),
      PROPERTY_TEST_CONFIG
    );
  });

  it('should throw NEGATIVE_RESULT whenever a < b', () => {
    fc.assert(
      fc.property(arbitraryBitInteger(), arbitraryBitInteger(), (x, y) => {
        fc.pre(x.value !== y.value);
        const [small, big] = x.value < y.value ? [x, y] : [y, x];
        try {
          sub(small.int, big.int);
          return false; // Should have thrown
        } catch (error) {
          if (error instanceof BitIntegerError) {
            return error.code === ErrorCode.NEGATIVE_RESULT;
          }
          return false;
        }
      }),
      PROPERTY_TEST_CONFIG
    );
  });
});

describe('Property: Comparison', () => {
  it('should agree with bigint ordering', () => {
    fc.assert(
      fc.property(arbitraryBitInteger(), arbitraryBitInteger(), (a, b) => {
        const expected = a.value < b.value ? -1 : a.value > b.value ? 1 : 0;
        return compare(a.int, b.int) === expected && lessThan(a.int, b.int) === a.value < b.value;
      }),
      PROPERTY_TEST_CONFIG
    );
  });
});

describe('Property: Multiplication', () => {
  it('should agree with bigint multiplication', () => {
    fc.assert(
      fc.property(arbitraryBitInteger(MUL_BITS), arbitraryBitInteger(MUL_BITS), (a, b) => {
        return hasValue(mul(a.int, b.int), a.value * b.value);
      }),
      PROPERTY_TEST_CONFIG
    );
  });

  it('should satisfy mul(a, b) = mul(b, a) (commutativity)', () => {
    fc.assert(
      fc.property(arbitraryBitInteger(MUL_BITS), arbitraryBitInteger(MUL_BITS), (a, b) => {
        return equals(mul(a.int, b.int), mul(b.int, a.int));
      }),
      PROPERTY_TEST_CONFIG
    );
  });

  it('should satisfy mul(a, 1) = a and mul(a, 0) = 0', () => {
    fc.assert(
      fc.property(arbitraryBitInteger(MUL_BITS), (a) => {
        return (
          equals(mul(a.int, BitInteger.one()), a.int) &&
          mul(a.int, BitInteger.zero()).isZero() &&
          mul(BitInteger.zero(), a.int).isZero()
        );
      }),
      PROPERTY_TEST_CONFIG
    );
  });

  it('should agree with shift-and-add multiplication', () => {
    fc.assert(
      fc.property(arbitraryBitInteger(MUL_BITS), arbitraryBitInteger(MUL_BITS), (a, b) => {
        return equals(shiftAndAddMultiply(a.int, b.int), mul(a.int, b.int));
      }),
      PROPERTY_TEST_CONFIG
    );
  });

  it('should not depend on the base-case threshold', () => {
    fc.assert(
      fc.property(
        arbitraryBitInteger(MUL_BITS),
        arbitraryBitInteger(MUL_BITS),
        fc.integer({ min: 1, max: 48 }),
        (a, b, threshold) => {
          configure({ multiplyThreshold: threshold });
          try {
            return hasValue(mul(a.int, b.int), a.value * b.value);
          } finally {
            resetConfig();
          }
        }
      ),
      FAST_PROPERTY_TEST_CONFIG
    );
  });
});

describe('Property: Division', () => {
  it('should satisfy a = q * b + r with 0 <= r < b', () => {
    fc.assert(
      fc.property(arbitraryBitInteger(), arbitraryNonZeroBitInteger(96), (a, b) => {
        const { quotient, remainder } = divmod(a.int, b.int);
        return equals(add(mul(quotient, b.int), remainder), a.int) && lessThan(remainder, b.int);
      }),
      PROPERTY_TEST_CONFIG
    );
  });

  it('should agree with bigint division', () => {
    fc.assert(
      fc.property(arbitraryBitInteger(), arbitraryNonZeroBitInteger(96), (a, b) => {
        const { quotient, remainder } = divmod(a.int, b.int);
        return hasValue(quotient, a.value / b.value) && hasValue(remainder, a.value % b.value);
      }),
      PROPERTY_TEST_CONFIG
    );
  });
});
