/**
 * Unit tests for the CLI argument handling
 */

import { describe, test, expect } from '@jest/globals';
import { EXIT_CODES, exitCodeFor, parseArgs } from '../../src/cli/index.js';
import type { ModuleErrorCode, ModuleResult } from '../../src/types/index.js';

function failure(code: ModuleErrorCode): ModuleResult {
  return {
    success: false,
    error: { code, message: code },
    metadata: { module: 'test', timestamp: '2026-01-01T00:00:00.000Z' },
  };
}

describe('CLI', () => {
  describe('parseArgs()', () => {
    test('should parse a bare command', () => {
      expect(parseArgs(['crawl'], '/data')).toEqual({ command: 'crawl', rootDir: '/data', verbose: false });
    });

    test('should parse flags in any order', () => {
      expect(parseArgs(['images', '--verbose', '--root', '/srv/wiki'], '/data')).toEqual({
        command: 'images',
        rootDir: '/srv/wiki',
        verbose: true,
      });
      expect(parseArgs(['reconcile', '--root', 'out', '--verbose'], '/data')).toEqual({
        command: 'reconcile',
        rootDir: 'out',
        verbose: true,
      });
    });

    test('should reject unknown commands and flags', () => {
      expect(parseArgs([], '/data')).toBeNull();
      expect(parseArgs(['download'], '/data')).toBeNull();
      expect(parseArgs(['toString'], '/data')).toBeNull();
      expect(parseArgs(['crawl', '--fast'], '/data')).toBeNull();
      expect(parseArgs(['crawl', '--root'], '/data')).toBeNull();
    });
  });

  describe('exitCodeFor()', () => {
    test('should map results to exit codes', () => {
      const success: ModuleResult = {
        success: true,
        metadata: { module: 'test', timestamp: '2026-01-01T00:00:00.000Z' },
      };

      expect(exitCodeFor(success)).toBe(EXIT_CODES.success);
      expect(exitCodeFor(failure('MISSING_INPUT'))).toBe(2);
      expect(exitCodeFor(failure('CRAWL_FAILED'))).toBe(2);
      expect(exitCodeFor(failure('ABORTED'))).toBe(130);
      expect(exitCodeFor(failure('UNEXPECTED_ERROR'))).toBe(1);
    });
  });
});
