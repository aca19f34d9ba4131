import { runSweep } from '../runner/experiment';
import { formatMilliseconds, formatNumber, formatPercent, separator } from '../utils';
import { parseSweepArgs } from './args';

function pad(value: string, width: number): string {
  return value.padStart(width);
}

try {
  const args = parseSweepArgs(process.argv.slice(2));

  console.log('N-Queens Tree Size Sweep');
  console.log('========================');
  console.log(`Board sizes: ${args.from}..${args.to}`);
  console.log(`Trials per size: ${formatNumber(args.numTrials)}`);
  console.log(`Exhaustive search up to: ${args.exactLimit}`);
  console.log(`Seed: ${args.seed ?? 'random'}`);
  console.log('');
  console.log(
    [pad('n', 3), pad('estimate', 20), pad('std dev', 20), pad('solutions est.', 16), pad('exact', 16), pad('error', 9), pad('per trial', 14)].join(' ')
  );
  console.log(separator());

  runSweep(
    {
      from: args.from,
      to: args.to,
      numTrials: args.numTrials,
      exactLimit: args.exactLimit,
      seed: args.seed,
    },
    (row) => {
      console.log(
        [
          pad(String(row.boardSize), 3),
          pad(formatNumber(row.estimate), 20),
          pad(formatNumber(row.stdDev), 20),
          pad(formatNumber(row.solutionEstimate), 16),
          pad(row.exact ? formatNumber(row.exact.nodeCount) : '-', 16),
          pad(row.relativeError !== undefined ? formatPercent(row.relativeError) : '-', 9),
          pad(formatMilliseconds(row.avgTrialTime, 3), 14),
        ].join(' ')
      );
    }
  );
  console.log('');
  console.log('Sweep complete!');
} catch (error) {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
}
