import { describe, it, expect } from 'vitest';
import {
  coefficientOfVariation,
  extent,
  median,
  relativeError,
  summarize,
} from '../../core/statistics';

describe('statistics', () => {
  describe('summarize', () => {
    it('should give zero spread for a constant sequence', () => {
      expect(summarize([5, 5, 5])).toEqual({ mean: 5, variance: 0, stdDev: 0 });
    });

    it('should use the sample variance', () => {
      const stats = summarize([2, 4, 4, 4, 5, 5, 7, 9]);
      expect(stats.mean).toBe(5);
      expect(stats.variance).toBeCloseTo(32 / 7, 12);
      expect(stats.stdDev).toBeCloseTo(Math.sqrt(32 / 7), 12);
    });

    it('should handle exactly two values', () => {
      expect(summarize([1, 2])).toEqual({ mean: 1.5, variance: 0.5, stdDev: Math.sqrt(0.5) });
    });

    it('should require at least two values', () => {
      expect(() => summarize([])).toThrow('Sample statistics need at least 2 values, got 0');
      expect(() => summarize([3])).toThrow('Sample statistics need at least 2 values, got 1');
    });

    it('should reject non-finite values', () => {
      expect(() => summarize([1, NaN])).toThrow('Sample contains a non-finite value: NaN');
      expect(() => summarize([1, Infinity])).toThrow('Sample contains a non-finite value: Infinity');
    });
  });

  describe('relativeError', () => {
    it('should be symmetric around the reference', () => {
      expect(relativeError(90, 100)).toBeCloseTo(0.1, 12);
      expect(relativeError(110, 100)).toBeCloseTo(0.1, 12);
      expect(relativeError(17, 17)).toBe(0);
    });

    it('should reject a zero reference', () => {
      expect(() => relativeError(5, 0)).toThrow('Relative error is undefined for a reference of 0');
    });
  });

  describe('coefficientOfVariation', () => {
    it('should divide the standard deviation by the mean', () => {
      expect(coefficientOfVariation({ mean: 10, variance: 4, stdDev: 2 })).toBe(0.2);
    });

    it('should reject a zero mean', () => {
      expect(() => coefficientOfVariation({ mean: 0, variance: 1, stdDev: 1 })).toThrow(
        'Coefficient of variation is undefined for a mean of 0'
      );
    });
  });

  describe('median', () => {
    it('should pick the middle value of an odd sample', () => {
      expect(median([9, 1, 5])).toBe(5);
    });

    it('should average the middle pair of an even sample', () => {
      expect(median([4, 1, 3, 2])).toBe(2.5);
    });

    it('should not reorder its input', () => {
      const values = [3, 1, 2];
      median(values);
      expect(values).toEqual([3, 1, 2]);
    });
  });

  describe('extent', () => {
    it('should find the smallest and largest values', () => {
      expect(extent([13, 21, 4, 17])).toEqual({ min: 4, max: 21 });
    });

    it('should throw on an empty sample', () => {
      expect(() => extent([])).toThrow('extent expects at least one value');
    });
  });
});
