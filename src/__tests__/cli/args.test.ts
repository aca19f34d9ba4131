import { describe, it, expect } from 'vitest';
import { DEFAULT_ESTIMATE_ARGS, parseEstimateArgs, parseFlags, parseSweepArgs, readBoolean } from '../../cli/args';

describe('args', () => {
  describe('parseFlags', () => {
    it('should read --key=value and bare flags', () => {
      expect(parseFlags(['--n=8', '--yes', 'stray', '--output='])).toEqual({
        n: '8',
        yes: true,
        output: '',
      });
    });
  });

  describe('readBoolean', () => {
    it('should accept a bare flag, an empty value or true', () => {
      expect(readBoolean({ a: true }, 'a')).toBe(true);
      expect(readBoolean({ a: '' }, 'a')).toBe(true);
      expect(readBoolean({ a: 'true' }, 'a')).toBe(true);
      expect(readBoolean({ a: 'false' }, 'a')).toBe(false);
      expect(readBoolean({}, 'a')).toBe(false);
    });
  });

  describe('parseEstimateArgs', () => {
    it('should fall back to the defaults', () => {
      expect(parseEstimateArgs([])).toEqual(DEFAULT_ESTIMATE_ARGS);
    });

    it('should read every option', () => {
      expect(parseEstimateArgs(['--n=8', '--trials=50', '--runs=3', '--additionalRuns=0', '--seed=7', '--yes'])).toEqual({
        boardSize: 8,
        numTrials: 50,
        numRuns: 3,
        additionalRuns: 0,
        seed: 7,
        yes: true,
      });
    });

    it('should drop the seed for --random', () => {
      expect(parseEstimateArgs(['--random', '--seed=7']).seed).toBeUndefined();
    });

    it('should reject values that are not integers', () => {
      expect(() => parseEstimateArgs(['--n=abc'])).toThrow('--n expects an integer value');
      expect(() => parseEstimateArgs(['--trials'])).toThrow('--trials expects an integer value');
      expect(() => parseEstimateArgs(['--seed=1.5'])).toThrow('--seed expects an integer value');
    });

    it('should pass negative integers through for validation later', () => {
      expect(parseEstimateArgs(['--n=-1']).boardSize).toBe(-1);
    });
  });

  describe('parseSweepArgs', () => {
    it('should fall back to the defaults', () => {
      expect(parseSweepArgs([])).toEqual({ from: 4, to: 16, numTrials: 1000, exactLimit: 10, seed: 42 });
    });

    it('should read the range', () => {
      const args = parseSweepArgs(['--from=6', '--to=20', '--trials=200', '--exactLimit=8', '--random']);
      expect(args).toEqual({ from: 6, to: 20, numTrials: 200, exactLimit: 8, seed: undefined });
    });
  });
});
