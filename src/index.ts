export { isSafe, getValidPositions, createBoard, assertBoardSize } from './core/placement';
export { BacktrackingCounter, countNodes } from './core/enumeration';
export { MonteCarloEstimator, estimate } from './core/monteCarloEstimator';
export { SeededRandom, MAX_SEED, assertSeed, choice, createRandom, randomSeed } from './core/random';
export type { RandomSource } from './core/random';
export {
  summarize,
  relativeError,
  coefficientOfVariation,
  median,
  extent,
} from './core/statistics';
export { runExperiment, runSweep, validateExperimentConfig, MAX_SWEEP_BOARD_SIZE } from './runner/experiment';
export type { ExperimentHooks, SweepConfig } from './runner/experiment';
export * from './types';
