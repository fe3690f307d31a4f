/**
 * Error handling for bit-integer
 *
 * Every failure raised by this library is a BitIntegerError carrying an
 * ErrorCode and, where useful, a details object describing the offending
 * input. Failures are synchronous and never leave a partial result behind.
 */

/**
 * Error codes for bit-integer operations
 *
 * These codes allow programmatic handling of specific error conditions.
 */
export enum ErrorCode {
  // Input validation errors
  /** Construction input is not a binary literal or an unsigned integer */
  INVALID_FORMAT = 'INVALID_FORMAT',
  /** Invalid configuration option provided */
  INVALID_CONFIG = 'INVALID_CONFIG',

  // Arithmetic errors
  /** Subtraction where the subtrahend exceeds the minuend */
  NEGATIVE_RESULT = 'NEGATIVE_RESULT',
  /** Division or modulo by zero */
  DIVISION_BY_ZERO = 'DIVISION_BY_ZERO',
  /** Value does not fit in a native number */
  OVERFLOW = 'OVERFLOW',
}

/**
 * Base error class for bit-integer errors
 *
 * @example
 * ```typescript
 * try {
 *   sub(BitInteger.fromBinaryString('1'), BitInteger.fromBinaryString('10'));
 * } catch (error) {
 *   if (error instanceof BitIntegerError && error.code === ErrorCode.NEGATIVE_RESULT) {
 *     console.error('Subtrahend too large:', error.details);
 *   }
 * }
 * ```
 */
export class BitIntegerError extends Error {
  /**
   * @param message - Human-readable error message
   * @param code - Error code for programmatic handling
   * @param details - Optional details object with relevant context
   */
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'BitIntegerError';
    Object.setPrototypeOf(this, BitIntegerError.prototype);
  }

  /**
   * Create a string representation of the error including details
   */
  override toString(): string {
    let str = `${this.name} [${this.code}]: ${this.message}`;
    if (this.details) {
      str += ` (${JSON.stringify(this.details)})`;
    }
    return str;
  }

  /**
   * Convert error to a plain object for serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Type guard to check if an error is a BitIntegerError
 */
export function isBitIntegerError(error: unknown): error is BitIntegerError {
  return error instanceof BitIntegerError;
}

/**
 * Check if an error carries a specific error code
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
  return isBitIntegerError(error) && error.code === code;
}

// ============================================================================
// Error Factory Functions
// ============================================================================

/**
 * Create an error for malformed construction input
 *
 * @param input - The rejected input, rendered as a string
 * @param reason - What is wrong with it
 * @param index - Optional position of the offending character
 */
export function invalidFormatError(
  input: string,
  reason: string,
  index?: number
): BitIntegerError {
  const details: Record<string, unknown> = { input, reason };
  if (index !== undefined) {
    details['index'] = index;
  }
  return new BitIntegerError(`Invalid unsigned integer: ${reason}`, ErrorCode.INVALID_FORMAT, details);
}

/**
 * Create an error for a subtraction whose result would be negative
 *
 * @param minuend - Binary rendering of the minuend
 * @param subtrahend - Binary rendering of the subtrahend
 */
export function negativeResultError(minuend: string, subtrahend: string): BitIntegerError {
  return new BitIntegerError(
    'Subtrahend is greater than minuend',
    ErrorCode.NEGATIVE_RESULT,
    { minuend, subtrahend }
  );
}

/**
 * Create an error for division by zero
 *
 * @param dividend - Optional binary rendering of the dividend
 */
export function divisionByZeroError(dividend?: string): BitIntegerError {
  return new BitIntegerError(
    'Cannot divide by zero',
    ErrorCode.DIVISION_BY_ZERO,
    dividend !== undefined ? { dividend } : undefined
  );
}

/**
 * Create an error for a value too wide for a native number
 *
 * @param bitLength - Bit length of the value
 * @param maxBits - Widest value the target can hold exactly
 */
export function overflowError(bitLength: number, maxBits: number): BitIntegerError {
  return new BitIntegerError(
    `Value of ${bitLength} bits does not fit in ${maxBits} bits`,
    ErrorCode.OVERFLOW,
    { bitLength, maxBits }
  );
}

/**
 * Create an error for invalid configuration
 *
 * @param option - Name of the invalid option
 * @param value - The invalid value
 * @param validValues - Optional description of accepted values
 */
export function invalidConfigError(
  option: string,
  value: unknown,
  validValues?: unknown[]
): BitIntegerError {
  const details: Record<string, unknown> = { option, value };
  if (validValues) {
    details['validValues'] = validValues;
  }
  return new BitIntegerError(
    `Invalid configuration option '${option}': ${String(value)}`,
    ErrorCode.INVALID_CONFIG,
    details
  );
}
