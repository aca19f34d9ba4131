import { runExperiment, validateExperimentConfig } from '../runner/experiment';
import { ExperimentConfig } from '../types';
import {
  describeTrialCost,
  exhaustiveSearchBound,
  formatMilliseconds,
  formatNumber,
  formatPercent,
  formatSeconds,
  promptConfirmation,
  separator,
} from '../utils';
import { parseEstimateArgs } from './args';

// Exhaustive search beyond this size takes minutes or more
const CONFIRM_ABOVE = 13;

async function main(): Promise<void> {
  const args = parseEstimateArgs(process.argv.slice(2));
  const config: ExperimentConfig = {
    boardSize: args.boardSize,
    numTrials: args.numTrials,
    numRuns: args.numRuns,
    additionalRuns: args.additionalRuns,
    seed: args.seed,
  };
  validateExperimentConfig(config);
  const n = config.boardSize;

  console.log(separator('='));
  console.log(`Monte Carlo Estimation for ${n}-Queens Problem`);
  console.log(separator('='));
  console.log(`Board Size: ${n}x${n}`);
  console.log(`Number of Monte Carlo trials per run: ${formatNumber(config.numTrials)}`);
  console.log(`Number of runs: ${config.numRuns}`);
  console.log(`Seed: ${config.seed ?? 'random'}`);
  console.log('');

  if (n > CONFIRM_ABOVE && !args.yes) {
    console.log(`Exhaustive search may visit up to ${formatNumber(exhaustiveSearchBound(n))} nodes (upper bound).`);
    const proceed = await promptConfirmation('This may take a long time. Proceed? (y/n): ');
    if (!proceed) {
      console.log('Aborted by user.');
      process.exit(0);
    }
    console.log('');
  }

  console.log(separator());
  console.log('Running Actual Backtracking Algorithm...');
  console.log(separator());

  const searchStart = Date.now();
  const report = runExperiment(config, {
    onExactProgress: (nodes, solutions) => {
      const elapsed = ((Date.now() - searchStart) / 1000).toFixed(1);
      process.stdout.write(`\r[${elapsed}s] Explored ${formatNumber(nodes)} nodes (${formatNumber(solutions)} solutions so far)`);
    },
    onExactComplete: (exact) => {
      process.stdout.write('\r' + ' '.repeat(100) + '\r'); // Clear line
      console.log(`Actual nodes visited by backtracking: ${formatNumber(exact.nodeCount)}`);
      console.log(`Number of solutions found: ${formatNumber(exact.solutionCount)}`);
      console.log(`Backtracking execution time: ${formatSeconds(exact.elapsedTime)}`);
      console.log('');

      console.log(separator());
      console.log('Running Monte Carlo Estimations...');
      console.log(separator());
      console.log('');
    },
    onTrialProgress: (done, total) => {
      process.stdout.write(`\rTrials: ${formatNumber(done)}/${formatNumber(total)}`);
    },
    onRunComplete: (run) => {
      process.stdout.write('\r' + ' '.repeat(100) + '\r'); // Clear line
      console.log(`Run ${run.run}:`);
      console.log(`  Average estimated nodes: ${formatNumber(run.average)}`);
      console.log(`  Min estimate: ${formatNumber(run.min)}`);
      console.log(`  Max estimate: ${formatNumber(run.max)}`);
      console.log(`  Median estimate: ${formatNumber(run.median)}`);
      console.log(`  Average time per trial: ${formatMilliseconds(run.avgTrialTime)}`);
      console.log('');
    },
    onAdditionalRunComplete: (run, average) => {
      if (run === 1) {
        console.log(separator('='));
        console.log('Additional Runs for Statistical Confidence');
        console.log(separator('='));
        console.log(`Running ${config.additionalRuns} additional Monte Carlo estimations...`);
      }
      process.stdout.write('\r' + ' '.repeat(100) + '\r');
      console.log(`Run ${run}: Estimated nodes = ${formatNumber(average)}`);
    },
  });

  const exact = report.exact;

  console.log('');
  console.log(separator());
  console.log('Summary Statistics');
  console.log(separator());
  console.log(`Actual nodes (backtracking): ${formatNumber(exact.nodeCount)}`);
  console.log(`Overall average estimate (Monte Carlo): ${formatNumber(report.summary.mean)}`);
  console.log(`Standard deviation: ${formatNumber(report.summary.stdDev)}`);
  console.log(`Estimation error: ${formatPercent(report.relativeError)}`);
  console.log('');

  console.log(separator());
  console.log('Time Complexity Analysis');
  console.log(separator());
  const timePerNode = exact.elapsedTime / exact.nodeCount;
  console.log('Backtracking algorithm:');
  console.log(`  - Visited ${formatNumber(exact.nodeCount)} nodes, testing ${formatNumber(exact.placementChecks)} candidate squares`);
  console.log(`  - Execution time: ${formatSeconds(exact.elapsedTime)}`);
  console.log(`  - Time per node: ${formatMilliseconds(timePerNode, 6)}`);
  console.log('Monte Carlo estimation:');
  console.log(`  - ${formatNumber(config.numTrials)} trials per run`);
  console.log(`  - Average time per trial: ${formatMilliseconds(report.averageTrialTime, 6)}`);
  console.log(`  - ${describeTrialCost(report.averageTrialTime, exact.elapsedTime, exact.nodeCount)}`);
  console.log('');

  const totalRuns = config.numRuns + config.additionalRuns;
  console.log(`Final average (all ${totalRuns} runs): ${formatNumber(report.final.mean)}`);
  console.log(`Final standard deviation: ${formatNumber(report.final.stdDev)}`);
  console.log(`Coefficient of variation: ${formatPercent(report.coefficientOfVariation)}`);
  console.log(`Final estimation error: ${formatPercent(report.finalRelativeError)}`);
}

main().catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
