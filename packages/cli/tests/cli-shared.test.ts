/**
 * CLI Shared Utilities Tests
 */

import { describe, expect, it } from 'vitest';
import {
  ConversionError,
  IOError,
  LoadError,
  RuntimeError,
} from '@scopeconf/core';
import { detectHelpVersionFlag, formatError } from '../src/cli-shared.js';

describe('cli-shared', () => {
  describe('formatError', () => {
    it('prefixes compiler errors with their kind and ID', () => {
      expect(
        formatError(new IOError('CONF-I001', { file: 'a.conf', detail: 'gone' }))
      ).toBe('I/O error [CONF-I001]: Failed to read a.conf: gone');
      expect(
        formatError(new LoadError('CONF-L001', { file: 'a.conf', detail: 'x' }))
      ).toBe('Load error [CONF-L001]: Failed to load a.conf: x');
      expect(
        formatError(new RuntimeError('CONF-R001', { file: 'a.conf', detail: 'y' }))
      ).toBe('Runtime error [CONF-R001]: Failed to run a.conf: y');
      expect(
        formatError(
          new ConversionError('CONF-C002', { path: 'web.prod.F', type: 'function' })
        )
      ).toBe(
        'Conversion error [CONF-C002]: Failed to extract web.prod.F: not a supported type'
      );
    });

    it('returns the bare message for other errors', () => {
      expect(formatError(new Error('Generic error'))).toBe('Generic error');
    });
  });

  describe('detectHelpVersionFlag', () => {
    it('detects flags in any position', () => {
      expect(detectHelpVersionFlag(['in', '-h'])).toEqual({ mode: 'help' });
      expect(detectHelpVersionFlag(['-v', 'in'])).toEqual({ mode: 'version' });
    });

    it('prefers help over version', () => {
      expect(detectHelpVersionFlag(['--version', '--help'])).toEqual({
        mode: 'help',
      });
    });

    it('returns null without flags', () => {
      expect(detectHelpVersionFlag(['in', 'out'])).toBeNull();
    });
  });
});
