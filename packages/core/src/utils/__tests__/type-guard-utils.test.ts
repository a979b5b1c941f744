import { describe, expect, it } from 'vitest';

import { getErrorMessage, isErrorWithMessage } from '../type-guard-utils.js';

describe('Type Guard Utilities', () => {
  describe('isErrorWithMessage', () => {
    it('should return true for Error instances and subclasses', () => {
      expect(isErrorWithMessage(new Error('Test error'))).toBe(true);
      expect(isErrorWithMessage(new RangeError('Range error'))).toBe(true);
      expect(isErrorWithMessage(new Error(''))).toBe(true);
    });

    it('should return false for non-Error values', () => {
      expect(isErrorWithMessage('error string')).toBe(false);
      expect(isErrorWithMessage({ message: 'looks like an error' })).toBe(false);
      expect(isErrorWithMessage(null)).toBe(false);
    });
  });

  describe('getErrorMessage', () => {
    it('should return the message of an Error', () => {
      expect(getErrorMessage(new Error('socket hang up'))).toBe('socket hang up');
    });

    it('should stringify other values', () => {
      expect(getErrorMessage('plain failure')).toBe('plain failure');
      expect(getErrorMessage(42)).toBe('42');
    });

    it('should prefer the default message for non-Error values', () => {
      expect(getErrorMessage(undefined, 'Unknown error')).toBe('Unknown error');
    });
  });
});
