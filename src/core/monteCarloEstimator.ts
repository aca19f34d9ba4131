import { performance } from 'perf_hooks';
import { EstimateResult, TrialSample } from '../types';
import { assertBoardSize, createBoard, getValidPositions } from './placement';
import { choice, createRandom, RandomSource } from './random';

/**
 * Estimates the size of the backtracking tree by random single-path descents.
 *
 * Along one path the search tree has 1 + m1 + m1*m2 + ... + m1*...*mn nodes
 * when every node at depth i has mi children. Each trial measures the true
 * branching factor at each row of a random path, so the sum is an unbiased
 * sample of the full tree size.
 *
 * All draws come from the one RandomSource handed to the constructor, trial by
 * trial and row by row, so a seeded source reproduces the whole sequence.
 */
export class MonteCarloEstimator {
  private boardSize: number;
  private random: RandomSource;
  private progressCallback?: (trialsCompleted: number, totalTrials: number) => void;
  private lastReportTime: number = 0;
  private reportInterval: number = 1000; // Report every second

  constructor(
    boardSize: number,
    random: RandomSource,
    progressCallback?: (trialsCompleted: number, totalTrials: number) => void
  ) {
    assertBoardSize(boardSize);
    this.boardSize = boardSize;
    this.random = random;
    this.progressCallback = progressCallback;
  }

  /**
   * One random descent from the root. A row with no safe column ends the
   * trial; the partial sum is still a valid sample.
   */
  runTrial(): TrialSample {
    const n = this.boardSize;
    const board = createBoard(n);
    let nodes = 1; // Root
    let checks = 0;
    let product = 1;

    for (let row = 0; row < n; row++) {
      // Each node at this depth scans all n columns
      checks += product * n;

      const valid = getValidPositions(board, row, n);
      if (valid.length === 0) {
        return { nodes, checks, solutions: 0 };
      }

      product *= valid.length;
      nodes += product;
      board[row] = choice(this.random, valid);
    }

    return { nodes, checks, solutions: product };
  }

  /**
   * Run numTrials independent descents and average them
   */
  estimate(numTrials: number): EstimateResult {
    if (!Number.isInteger(numTrials) || numTrials <= 0) {
      throw new Error(`Number of trials must be a positive integer, got ${numTrials}`);
    }

    const perTrial: number[] = [];
    let totalChecks = 0;
    let totalSolutions = 0;
    this.lastReportTime = Date.now();

    const startTime = performance.now();
    for (let trial = 0; trial < numTrials; trial++) {
      const sample = this.runTrial();
      perTrial.push(sample.nodes);
      totalChecks += sample.checks;
      totalSolutions += sample.solutions;

      if (this.progressCallback) {
        const now = Date.now();
        if (now - this.lastReportTime >= this.reportInterval || trial === numTrials - 1) {
          this.progressCallback(trial + 1, numTrials);
          this.lastReportTime = now;
        }
      }
    }
    const elapsed = performance.now() - startTime;

    const total = perTrial.reduce((sum, value) => sum + value, 0);
    return {
      average: total / numTrials,
      perTrial,
      avgTrialTime: elapsed / numTrials,
      averageChecks: totalChecks / numTrials,
      averageSolutions: totalSolutions / numTrials,
    };
  }
}

/**
 * Estimate the node count for an n x n board. With a seed the per-trial
 * sequence is reproducible; without one the generator is seeded from the OS.
 */
export function estimate(n: number, numTrials: number, seed?: number): EstimateResult {
  return new MonteCarloEstimator(n, createRandom(seed)).estimate(numTrials);
}
