import { describe, it, expect, vi } from 'vitest';
import { estimate, MonteCarloEstimator } from '../../core/monteCarloEstimator';
import { RandomSource, SeededRandom } from '../../core/random';

class FixedRandom implements RandomSource {
  draws = 0;

  constructor(private value: number) {}

  next(): number {
    this.draws++;
    return this.value;
  }
}

describe('MonteCarloEstimator', () => {
  describe('runTrial', () => {
    it('should stop at a dead end and keep the partial sum', () => {
      // Always the leftmost safe column: 0, then 2, then nothing is safe
      const random = new FixedRandom(0);
      const sample = new MonteCarloEstimator(4, random).runTrial();
      expect(sample).toEqual({ nodes: 13, checks: 52, solutions: 0 });
      expect(random.draws).toBe(2);
    });

    it('should reach a full placement along 1, 3, 0, 2', () => {
      const random = new FixedRandom(0.3);
      const sample = new MonteCarloEstimator(4, random).runTrial();
      expect(sample).toEqual({ nodes: 17, checks: 52, solutions: 4 });
      expect(random.draws).toBe(4);
    });

    it('should return only the root for an empty board', () => {
      const random = new FixedRandom(0.5);
      const sample = new MonteCarloEstimator(0, random).runTrial();
      expect(sample).toEqual({ nodes: 1, checks: 0, solutions: 1 });
      expect(random.draws).toBe(0);
    });

    it('should only produce the two possible samples for n=3', () => {
      const estimator = new MonteCarloEstimator(3, new SeededRandom(5));
      for (let i = 0; i < 50; i++) {
        const sample = estimator.runTrial();
        if (sample.nodes === 7) {
          expect(sample.checks).toBe(21);
        } else {
          expect(sample.nodes).toBe(4);
          expect(sample.checks).toBe(12);
        }
        expect(sample.solutions).toBe(0);
      }
    });
  });

  describe('estimate', () => {
    it('should reproduce the per-trial sequence for the same seed', () => {
      const first = estimate(8, 200, 7);
      const second = estimate(8, 200, 7);
      expect(second.perTrial).toEqual(first.perTrial);
      expect(second.average).toBe(first.average);
    });

    it('should land near the exact count for n=4', () => {
      const result = estimate(4, 1000, 42);
      expect(result.perTrial).toHaveLength(1000);
      // Exact node count is 17
      expect(result.average).toBeGreaterThan(17 / 2);
      expect(result.average).toBeLessThan(17 * 2);
    });

    it('should produce positive finite integer samples', () => {
      const result = estimate(10, 300, 3);
      for (const value of result.perTrial) {
        expect(Number.isFinite(value)).toBe(true);
        expect(Number.isInteger(value)).toBe(true);
        expect(value).toBeGreaterThanOrEqual(1);
      }
    });

    it('should average the per-trial samples', () => {
      const result = estimate(6, 100, 11);
      const total = result.perTrial.reduce((sum, value) => sum + value, 0);
      expect(result.average).toBe(total / 100);
      expect(result.avgTrialTime).toBeGreaterThanOrEqual(0);
    });

    it('should give exact answers where every path looks the same', () => {
      expect(estimate(0, 5, 1).perTrial).toEqual([1, 1, 1, 1, 1]);
      const single = estimate(1, 5, 1);
      expect(single.perTrial).toEqual([2, 2, 2, 2, 2]);
      expect(single.average).toBe(2);
      expect(single.averageSolutions).toBe(1);
      expect(single.averageChecks).toBe(1);
      expect(estimate(2, 5, 1).perTrial).toEqual([3, 3, 3, 3, 3]);
    });

    it('should work without a seed', () => {
      const result = estimate(5, 20);
      expect(result.perTrial).toHaveLength(20);
    });

    it('should reject invalid trial counts and board sizes', () => {
      expect(() => estimate(4, 0, 1)).toThrow('Number of trials must be a positive integer, got 0');
      expect(() => estimate(4, 2.5, 1)).toThrow('Number of trials must be a positive integer');
      expect(() => estimate(-2, 10, 1)).toThrow('Board size must be a non-negative integer');
    });

    it('should report progress once all trials finish', () => {
      const progress = vi.fn();
      new MonteCarloEstimator(5, new SeededRandom(1), progress).estimate(10);
      expect(progress).toHaveBeenLastCalledWith(10, 10);
    });

    it('should keep advancing one generator across calls', () => {
      const shared = new MonteCarloEstimator(8, new SeededRandom(42));
      const firstRun = shared.estimate(50);
      const secondRun = shared.estimate(50);

      const replay = new MonteCarloEstimator(8, new SeededRandom(42));
      expect(replay.estimate(100).perTrial).toEqual([...firstRun.perTrial, ...secondRun.perTrial]);
    });
  });
});
