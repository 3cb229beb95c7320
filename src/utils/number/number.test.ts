/**
 * Tests for number utilities
 */

import { clampPercent, isFiniteNumber, isInteger } from './index';

describe('Number Utilities', () => {
  describe('isFiniteNumber', () => {
    it('should accept finite numbers', () => {
      expect(isFiniteNumber(0)).toBe(true);
      expect(isFiniteNumber(-4.5)).toBe(true);
    });

    it('should reject non-finite and non-number values', () => {
      expect(isFiniteNumber(NaN)).toBe(false);
      expect(isFiniteNumber(Infinity)).toBe(false);
      expect(isFiniteNumber('5')).toBe(false);
      expect(isFiniteNumber(null)).toBe(false);
    });
  });

  describe('isInteger', () => {
    it('should accept integers only', () => {
      expect(isInteger(40)).toBe(true);
      expect(isInteger(40.5)).toBe(false);
      expect(isInteger('40')).toBe(false);
    });
  });

  describe('clampPercent', () => {
    it('should clamp into 0-100', () => {
      expect(clampPercent(-3)).toBe(0);
      expect(clampPercent(57.5)).toBe(57.5);
      expect(clampPercent(104)).toBe(100);
    });
  });
});
