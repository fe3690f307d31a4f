/**
 * Debug logging
 *
 * Logs only when debug is enabled through configure(), when DEBUG contains
 * "bit-integer", or when BIT_INTEGER_DEBUG is "1" or "true".
 */

import { getConfig } from './config.js';

export type DebugLogger = (message: string, data?: Record<string, unknown>) => void;

/**
 * Whether debug output is currently enabled
 */
export function isDebugEnabled(): boolean {
  if (getConfig().debug) {
    return true;
  }
  const debugEnv = process.env['DEBUG'];
  const bitDebugEnv = process.env['BIT_INTEGER_DEBUG'];
  return (
    debugEnv?.includes('bit-integer') === true || bitDebugEnv === '1' || bitDebugEnv === 'true'
  );
}

/**
 * Create a debug logger tagged with a scope
 *
 * @param scope - Short module name shown in the log prefix
 */
export function createDebugLogger(scope: string): DebugLogger {
  return (message, data) => {
    if (!isDebugEnabled()) {
      return;
    }
    const timestamp = new Date().toISOString();
    const prefix = `[${timestamp}] [bit-integer:${scope}]`;
    if (data) {
      console.debug(`${prefix} ${message}`, data);
    } else {
      console.debug(`${prefix} ${message}`);
    }
  };
}
