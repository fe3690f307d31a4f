/**
 * bit-integer
 *
 * Arbitrary-precision unsigned integers computed bit by bit.
 *
 * @example
 * ```typescript
 * import { createBitInteger, add, mul, divmod } from 'bit-integer';
 *
 * const a = createBitInteger('11000'); // 24
 * const b = createBitInteger('1001');  // 9
 *
 * add(a, b).toString(); // '100001'
 * mul(a, b).toString(); // '11011000'
 * const { quotient, remainder } = divmod(a, b); // '10', '110'
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Public API - Factory and configuration
// ============================================================================
export {
  createBitInteger,
  configure,
  getConfig,
  resetConfig,
  DEFAULT_CONFIG,
  type BitIntegerConfig,
} from './api.js';

// ============================================================================
// Types
// ============================================================================
export type { Bit, BitSequence, Ordering, DivModResult, BitIntegerInput } from './types.js';

// ============================================================================
// Representation and arithmetic
// ============================================================================
export {
  BitInteger,
  MAX_SAFE_INTEGER_BITS,
  compare,
  equals,
  lessThan,
  lessThanOrEqual,
  greaterThan,
  greaterThanOrEqual,
  max,
  min,
  add,
  increment,
  sub,
  decrement,
  mul,
  square,
  shiftAndAddMultiply,
  divmod,
  floorDiv,
  mod,
} from './integer/index.js';

// ============================================================================
// Errors
// ============================================================================
export {
  ErrorCode,
  BitIntegerError,
  isBitIntegerError,
  hasErrorCode,
  invalidFormatError,
  negativeResultError,
  divisionByZeroError,
  overflowError,
  invalidConfigError,
} from './errors.js';

// ============================================================================
// Debugging
// ============================================================================
export { isDebugEnabled } from './debug.js';
