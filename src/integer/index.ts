/**
 * Unsigned Integer Arithmetic Module
 *
 * The BitInteger representation and its bit-level arithmetic: ripple-carry
 * addition, complement subtraction, Karatsuba multiplication and binary long
 * division.
 */

export * from './bit-buffer.js';
export * from './bit-integer.js';
export * from './compare.js';
export * from './addition.js';
export * from './subtraction.js';
export * from './multiplication.js';
export * from './division.js';
