/**
 * Unit tests for the Logging Module
 */

import { describe, test, expect, afterEach, jest } from '@jest/globals';
import { createConsoleLogger, silentLogger } from '../../src/logging/index.js';

describe('Logging Module', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('createConsoleLogger()', () => {
    test('should write one JSON line with module and context', () => {
      const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

      createConsoleLogger('crawl').info('Collected URL', { url: 'https://dontstarve.fandom.com/wiki/Klaus' });

      expect(log).toHaveBeenCalledTimes(1);
      const line = JSON.parse(String(log.mock.calls[0]?.[0]));
      expect(line).toMatchObject({
        level: 'info',
        module: 'crawl',
        message: 'Collected URL',
        url: 'https://dontstarve.fandom.com/wiki/Klaus',
      });
      expect(typeof line.timestamp).toBe('string');
    });

    test('should not let context keys replace record fields', () => {
      const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

      createConsoleLogger('images').warn('Image tier failed', {
        level: 'debug',
        module: 'other',
        message: 'overwritten',
        timestamp: 'yesterday',
        tier: 'html',
      });

      const line = JSON.parse(String(warn.mock.calls[0]?.[0]));
      expect(line.level).toBe('warn');
      expect(line.module).toBe('images');
      expect(line.message).toBe('Image tier failed');
      expect(line.timestamp).not.toBe('yesterday');
      expect(line.tier).toBe('html');
    });

    test('should only write debug lines when verbose', () => {
      const debug = jest.spyOn(console, 'debug').mockImplementation(() => undefined);

      createConsoleLogger('crawl').debug('Listing page processed');
      expect(debug).not.toHaveBeenCalled();

      createConsoleLogger('crawl', true).debug('Listing page processed');
      expect(debug).toHaveBeenCalledTimes(1);
    });
  });

  describe('silentLogger', () => {
    test('should write nothing', () => {
      const spies = [
        jest.spyOn(console, 'log').mockImplementation(() => undefined),
        jest.spyOn(console, 'warn').mockImplementation(() => undefined),
        jest.spyOn(console, 'error').mockImplementation(() => undefined),
        jest.spyOn(console, 'debug').mockImplementation(() => undefined),
      ];

      silentLogger.info('a');
      silentLogger.warn('b');
      silentLogger.error('c');
      silentLogger.debug('d');

      for (const spy of spies) {
        expect(spy).not.toHaveBeenCalled();
      }
    });
  });
});
