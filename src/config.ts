/**
 * Library configuration
 *
 * Global settings read by the arithmetic modules at call time.
 */

import { validateConfig } from './validation.js';

/**
 * Global library configuration options
 *
 * @example
 * ```typescript
 * import { configure } from 'bit-integer';
 *
 * configure({ multiplyThreshold: 8, debug: true });
 * ```
 */
export interface BitIntegerConfig {
  /**
   * Operand bit length at or below which multiplication stops splitting and
   * falls back to shift-and-add (default: 1)
   */
  multiplyThreshold: number;
  /** Enable debug logging (default: false) */
  debug: boolean;
}

/**
 * Default library configuration
 */
export const DEFAULT_CONFIG: Readonly<BitIntegerConfig> = Object.freeze({
  multiplyThreshold: 1,
  debug: false,
});

// Global configuration state
let globalConfig: BitIntegerConfig = { ...DEFAULT_CONFIG };

/**
 * Configure global library settings
 *
 * @param config - Configuration options to set
 * @throws BitIntegerError with INVALID_CONFIG if an option is out of range
 */
export function configure(config: Partial<BitIntegerConfig>): void {
  const merged = { ...globalConfig, ...config };
  validateConfig(merged);
  globalConfig = merged;
}

/**
 * Get the current library configuration
 */
export function getConfig(): Readonly<BitIntegerConfig> {
  return { ...globalConfig };
}

/**
 * Reset configuration to defaults
 */
export function resetConfig(): void {
  globalConfig = { ...DEFAULT_CONFIG };
}
