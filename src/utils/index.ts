import * as readline from 'readline';

/**
 * Format large numbers with commas, rounded to whole units
 */
export function formatNumber(num: number): string {
  return Math.round(num).toLocaleString('en-US');
}

export function formatMilliseconds(ms: number, digits: number = 4): string {
  return `${ms.toFixed(digits)} ms`;
}

export function formatSeconds(ms: number): string {
  return `${(ms / 1000).toFixed(4)} seconds`;
}

/**
 * Format a ratio (0.05) as a percentage ("5.00%")
 */
export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(2)}%`;
}

/**
 * Rough upper bound on exhaustive search cost: rows * n! partial placements.
 * Only used to warn before starting a search that will not finish soon.
 */
export function exhaustiveSearchBound(boardSize: number): number {
  let factorial = 1;
  for (let i = 2; i <= boardSize; i++) {
    factorial *= i;
  }
  return Math.max(1, boardSize) * factorial;
}

/**
 * Put one Monte Carlo trial's cost in units of exhaustive-search nodes
 */
export function describeTrialCost(avgTrialTime: number, exactElapsed: number, exactNodes: number): string {
  if (exactElapsed <= 0 || exactNodes <= 0) {
    return 'Exhaustive search finished too quickly to time per node';
  }
  const nodesPerTrial = avgTrialTime / (exactElapsed / exactNodes);
  return `One trial costs about as much as visiting ${formatNumber(nodesPerTrial)} nodes of the exhaustive search, which visited ${formatNumber(exactNodes)}`;
}

/**
 * Prompt user for confirmation
 */
export function promptConfirmation(message: string): Promise<boolean> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
    });

    rl.question(message, (answer: string) => {
      rl.close();
      resolve(answer.toLowerCase() === 'y' || answer.toLowerCase() === 'yes');
    });
  });
}

export const separator = (char: string = '-'): string => char.repeat(70);
