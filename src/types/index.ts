/**
 * board[row] holds the column of the queen placed in that row, or UNPLACED.
 * Only rows below the current search depth are ever populated.
 */
export type Board = number[];

export const UNPLACED = -1;

export interface ExactResult {
  nodeCount: number;
  solutionCount: number;
  /** Number of candidate squares tested with isSafe during the search */
  placementChecks: number;
  /** Wall-clock time in milliseconds */
  elapsedTime: number;
}

export interface TrialSample {
  /** 1 + m1 + m1*m2 + ... along the sampled path */
  nodes: number;
  /** Estimated candidate squares tested, n per visited internal node */
  checks: number;
  /** m1*m2*...*mn when the path reached a full placement, otherwise 0 */
  solutions: number;
}

export interface EstimateResult {
  average: number;
  perTrial: number[];
  /** Average wall-clock time per trial in milliseconds */
  avgTrialTime: number;
  averageChecks: number;
  averageSolutions: number;
}

export interface Stats {
  mean: number;
  variance: number;
  stdDev: number;
}

export interface RunSummary {
  run: number;
  average: number;
  min: number;
  max: number;
  median: number;
  avgTrialTime: number;
}

export interface ExperimentConfig {
  boardSize: number;
  numTrials: number;
  numRuns: number;
  additionalRuns: number;
  seed?: number;
}

export interface ExperimentReport {
  config: ExperimentConfig;
  exact: ExactResult;
  runs: RunSummary[];
  /** Statistics over the run averages of the first numRuns runs */
  summary: Stats;
  relativeError: number;
  averageTrialTime: number;
  additionalAverages: number[];
  /** Statistics over every run average, first and additional runs together */
  final: Stats;
  finalRelativeError: number;
  coefficientOfVariation: number;
}

export interface SweepRow {
  boardSize: number;
  estimate: number;
  stdDev: number;
  solutionEstimate: number;
  avgTrialTime: number;
  /** Present only when the board was small enough to search exhaustively */
  exact?: ExactResult;
  relativeError?: number;
}
