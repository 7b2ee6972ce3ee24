/**
 * Tests for logger utility.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Logger, logger } from '../../../src/utils/logger.js';

vi.mock('chalk', () => ({
  default: {
    gray: (s: string) => s,
    blue: (s: string) => s,
    yellow: (s: string) => s,
    red: (s: string) => s,
    green: (s: string) => s,
  },
}));

describe('Logger', () => {
  const writeSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    logger.setLevel('warn');
    logger.setPrefix('');
  });

  describe('log levels', () => {
    it('should log debug when level is debug', () => {
      const log = new Logger();
      log.setLevel('debug');

      log.debug('test message');

      expect(writeSpy).toHaveBeenCalledWith('[DEBUG] test message\n');
    });

    it('should not log info when level is warn', () => {
      const log = new Logger();
      log.setLevel('warn');

      log.info('test message');

      expect(writeSpy).not.toHaveBeenCalled();
    });

    it('should default to warn', () => {
      const log = new Logger();

      log.warn('careful');
      log.info('hidden');

      expect(log.getLevel()).toBe('warn');
      expect(writeSpy).toHaveBeenCalledTimes(1);
      expect(writeSpy).toHaveBeenCalledWith('[WARN] careful\n');
    });

    it('should log nothing when silent', () => {
      const log = new Logger();
      log.setLevel('silent');

      log.error('boom');

      expect(writeSpy).not.toHaveBeenCalled();
    });
  });

  describe('data', () => {
    it('should print attached data as JSON', () => {
      const log = new Logger();
      log.setLevel('info');

      log.info('compiled', { fields: ['a'] });

      expect(writeSpy).toHaveBeenNthCalledWith(2, `${JSON.stringify({ fields: ['a'] }, null, 2)}\n`);
    });

    it('should print the stack of an attached error', () => {
      const log = new Logger();
      const error = new Error('inner');
      error.stack = 'Error: inner\n    at somewhere';

      log.error('failed', error);

      expect(writeSpy).toHaveBeenNthCalledWith(2, 'Error: inner\n    at somewhere\n');
    });
  });

  describe('success and fail', () => {
    it('should mark outcomes at info level', () => {
      const log = new Logger();
      log.setLevel('info');

      log.success('done');
      log.fail('broken');

      expect(writeSpy).toHaveBeenNthCalledWith(1, '✓ done\n');
      expect(writeSpy).toHaveBeenNthCalledWith(2, '✗ broken\n');
    });
  });

  describe('prefixes', () => {
    it('should prefix messages', () => {
      const log = new Logger();
      log.setPrefix('compiler');

      log.warn('slow');

      expect(writeSpy).toHaveBeenCalledWith('[WARN] [compiler] slow\n');
    });

    it('should join child prefixes', () => {
      const log = new Logger();
      log.setPrefix('core');

      log.child('docs').warn('odd entry');

      expect(writeSpy).toHaveBeenCalledWith('[WARN] [core:docs] odd entry\n');
    });

    it('should let children follow the parent level', () => {
      const child = logger.child('deduction');
      logger.setLevel('debug');

      child.debug('fallback');

      expect(writeSpy).toHaveBeenCalledWith('[DEBUG] [deduction] fallback\n');
    });
  });
});
