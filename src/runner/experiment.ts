import { BacktrackingCounter, countNodes } from '../core/enumeration';
import { MonteCarloEstimator } from '../core/monteCarloEstimator';
import { assertBoardSize } from '../core/placement';
import { assertSeed, createRandom } from '../core/random';
import { coefficientOfVariation, extent, median, relativeError, summarize } from '../core/statistics';
import { ExactResult, ExperimentConfig, ExperimentReport, RunSummary, SweepRow } from '../types';

export interface ExperimentHooks {
  onExactProgress?: (nodesExplored: number, solutionsFound: number) => void;
  onExactComplete?: (exact: ExactResult) => void;
  /** Throttled to once per second, plus once when a run's last trial finishes */
  onTrialProgress?: (trialsCompleted: number, totalTrials: number) => void;
  onRunComplete?: (run: RunSummary) => void;
  onAdditionalRunComplete?: (run: number, average: number) => void;
}

export function validateExperimentConfig(config: ExperimentConfig): void {
  assertBoardSize(config.boardSize);
  if (!Number.isInteger(config.numTrials) || config.numTrials <= 0) {
    throw new Error(`Number of trials must be a positive integer, got ${config.numTrials}`);
  }
  if (!Number.isInteger(config.numRuns) || config.numRuns < 2) {
    throw new Error(`Number of runs must be an integer of at least 2, got ${config.numRuns}`);
  }
  if (!Number.isInteger(config.additionalRuns) || config.additionalRuns < 0) {
    throw new Error(`Number of additional runs must be a non-negative integer, got ${config.additionalRuns}`);
  }
  if (config.seed !== undefined) {
    assertSeed(config.seed);
  }
}

/**
 * Compare repeated Monte Carlo runs against the exhaustive count.
 *
 * One generator is created for the whole experiment and consumed run after
 * run, so a seeded config reproduces every run average.
 */
export function runExperiment(config: ExperimentConfig, hooks: ExperimentHooks = {}): ExperimentReport {
  validateExperimentConfig(config);

  const exact = new BacktrackingCounter(config.boardSize, hooks.onExactProgress).count();
  hooks.onExactComplete?.(exact);

  const estimator = new MonteCarloEstimator(config.boardSize, createRandom(config.seed), hooks.onTrialProgress);

  const runs: RunSummary[] = [];
  for (let run = 1; run <= config.numRuns; run++) {
    const result = estimator.estimate(config.numTrials);
    const summary: RunSummary = {
      run,
      average: result.average,
      ...extent(result.perTrial),
      median: median(result.perTrial),
      avgTrialTime: result.avgTrialTime,
    };
    runs.push(summary);
    hooks.onRunComplete?.(summary);
  }

  const runAverages = runs.map(r => r.average);
  const summary = summarize(runAverages);

  const additionalAverages: number[] = [];
  for (let run = 1; run <= config.additionalRuns; run++) {
    const average = estimator.estimate(config.numTrials).average;
    additionalAverages.push(average);
    hooks.onAdditionalRunComplete?.(run, average);
  }

  const final = summarize([...runAverages, ...additionalAverages]);

  return {
    config,
    exact,
    runs,
    summary,
    relativeError: relativeError(summary.mean, exact.nodeCount),
    averageTrialTime: runs.reduce((sum, r) => sum + r.avgTrialTime, 0) / runs.length,
    additionalAverages,
    final,
    finalRelativeError: relativeError(final.mean, exact.nodeCount),
    coefficientOfVariation: coefficientOfVariation(final),
  };
}

// A trial sample can approach e * n!; past about n = 97 its squared deviation
// no longer fits in a double and the standard deviation becomes Infinity
export const MAX_SWEEP_BOARD_SIZE = 90;

export interface SweepConfig {
  from: number;
  to: number;
  numTrials: number;
  /** Largest board that is also searched exhaustively */
  exactLimit: number;
  seed?: number;
}

/**
 * Estimate tree sizes across a range of board sizes, checking against the
 * exhaustive count where it is affordable
 */
export function runSweep(config: SweepConfig, onRow?: (row: SweepRow) => void): SweepRow[] {
  assertBoardSize(config.from);
  assertBoardSize(config.to);
  if (config.from > config.to) {
    throw new Error(`Sweep range is empty: ${config.from}..${config.to}`);
  }
  if (config.to > MAX_SWEEP_BOARD_SIZE) {
    throw new Error(`Sweep board sizes are limited to ${MAX_SWEEP_BOARD_SIZE}, got ${config.to}`);
  }
  if (!Number.isInteger(config.numTrials) || config.numTrials < 2) {
    throw new Error(`Sweep needs at least 2 trials per board size, got ${config.numTrials}`);
  }
  if (config.seed !== undefined) {
    assertSeed(config.seed);
  }

  const random = createRandom(config.seed);
  const rows: SweepRow[] = [];

  for (let n = config.from; n <= config.to; n++) {
    const result = new MonteCarloEstimator(n, random).estimate(config.numTrials);
    const row: SweepRow = {
      boardSize: n,
      estimate: result.average,
      stdDev: summarize(result.perTrial).stdDev,
      solutionEstimate: result.averageSolutions,
      avgTrialTime: result.avgTrialTime,
    };
    if (n <= config.exactLimit) {
      row.exact = countNodes(n);
      row.relativeError = relativeError(result.average, row.exact.nodeCount);
    }
    rows.push(row);
    onRow?.(row);
  }

  return rows;
}
