/**
 * Tests for debug logging
 */

import { describe, it, expect, afterEach, beforeEach, vi } from 'vitest';
import { configure, resetConfig } from './config.js';
import { createDebugLogger, isDebugEnabled } from './debug.js';
import { BitInteger } from './integer/bit-integer.js';
import { divmod } from './integer/division.js';
import { mul } from './integer/multiplication.js';

describe('Debug logging', () => {
  beforeEach(() => {
    vi.stubEnv('DEBUG', '');
    vi.stubEnv('BIT_INTEGER_DEBUG', '');
  });

  afterEach(() => {
    resetConfig();
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  describe('isDebugEnabled', () => {
    it('should be off by default', () => {
      expect(isDebugEnabled()).toBe(false);
    });

    it('should follow the debug option', () => {
      configure({ debug: true });
      expect(isDebugEnabled()).toBe(true);
    });

    it('should follow the DEBUG namespace list', () => {
      vi.stubEnv('DEBUG', 'express,bit-integer');
      expect(isDebugEnabled()).toBe(true);
    });

    it('should follow BIT_INTEGER_DEBUG', () => {
      vi.stubEnv('BIT_INTEGER_DEBUG', 'true');
      expect(isDebugEnabled()).toBe(true);
      vi.stubEnv('BIT_INTEGER_DEBUG', '1');
      expect(isDebugEnabled()).toBe(true);
      vi.stubEnv('BIT_INTEGER_DEBUG', 'no');
      expect(isDebugEnabled()).toBe(false);
    });
  });

  describe('createDebugLogger', () => {
    it('should stay silent when disabled', () => {
      const spy = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
      createDebugLogger('test')('hidden');
      expect(spy).not.toHaveBeenCalled();
    });

    it('should prefix messages with a timestamp and scope', () => {
      const spy = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
      configure({ debug: true });

      createDebugLogger('test')('hello');

      expect(spy).toHaveBeenCalledTimes(1);
      expect(spy).toHaveBeenCalledWith(expect.stringMatching(/^\[\S+\] \[bit-integer:test\] hello$/));
    });

    it('should pass structured data through', () => {
      const spy = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
      configure({ debug: true });

      createDebugLogger('test')('with data', { bits: 3 });

      expect(spy).toHaveBeenCalledWith(expect.stringMatching(/\[bit-integer:test\] with data$/), {
        bits: 3,
      });
    });
  });

  describe('arithmetic logging', () => {
    it('should log the operand sizes of a multiplication once per call', () => {
      const spy = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
      configure({ debug: true });

      mul(BitInteger.fromBinaryString('11000'), BitInteger.fromBinaryString('1001'));

      expect(spy).toHaveBeenCalledTimes(1);
      expect(spy).toHaveBeenCalledWith(expect.stringMatching(/\[bit-integer:multiply\] Multiplying$/), {
        aBits: 5,
        bBits: 4,
        threshold: 1,
      });
    });

    it('should log the operand sizes of a division', () => {
      const spy = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
      configure({ debug: true });

      divmod(BitInteger.fromBinaryString('11000'), BitInteger.fromBinaryString('1001'));

      expect(spy).toHaveBeenCalledWith(expect.stringMatching(/\[bit-integer:divide\] Dividing$/), {
        dividendBits: 5,
        divisorBits: 4,
      });
    });
  });
});
