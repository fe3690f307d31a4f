/**
 * Test utilities for bit-integer
 *
 * - Property-based testing configuration and arbitraries
 * - BitInteger assertion helpers
 */

// Property-based testing utilities
export * from './property-test-config.js';

// BitInteger assertion helpers
export * from './bit-comparison.js';
