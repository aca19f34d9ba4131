export type ArgValues = Record<string, string | true>;

/**
 * Parse --key=value and bare --flag arguments. Anything else is ignored.
 */
export function parseFlags(argv: string[]): ArgValues {
  const result: ArgValues = {};
  for (const arg of argv) {
    if (arg.startsWith('--')) {
      const eq = arg.indexOf('=');
      if (eq === -1) {
        result[arg.substring(2)] = true;
      } else {
        result[arg.substring(2, eq)] = arg.substring(eq + 1);
      }
    }
  }
  return result;
}

export function readInteger(values: ArgValues, key: string, fallback: number): number {
  const raw = values[key];
  if (raw === undefined) {
    return fallback;
  }
  if (raw === true || !/^-?\d+$/.test(raw)) {
    throw new Error(`--${key} expects an integer value`);
  }
  return parseInt(raw, 10);
}

export function readOptionalInteger(values: ArgValues, key: string): number | undefined {
  if (values[key] === undefined) {
    return undefined;
  }
  return readInteger(values, key, 0);
}

/**
 * --flag, --flag=true and --flag= all count as set
 */
export function readBoolean(values: ArgValues, key: string): boolean {
  const raw = values[key];
  return raw === true || raw === '' || raw === 'true';
}

export interface EstimateArgs {
  boardSize: number;
  numTrials: number;
  numRuns: number;
  additionalRuns: number;
  /** Absent when --random is passed */
  seed?: number;
  yes: boolean;
}

export const DEFAULT_ESTIMATE_ARGS: EstimateArgs = {
  boardSize: 12,
  numTrials: 1000,
  numRuns: 5,
  additionalRuns: 10,
  seed: 42,
  yes: false,
};

export function parseEstimateArgs(argv: string[]): EstimateArgs {
  const values = parseFlags(argv);
  const seed = readBoolean(values, 'random')
    ? undefined
    : readOptionalInteger(values, 'seed') ?? DEFAULT_ESTIMATE_ARGS.seed;

  return {
    boardSize: readInteger(values, 'n', DEFAULT_ESTIMATE_ARGS.boardSize),
    numTrials: readInteger(values, 'trials', DEFAULT_ESTIMATE_ARGS.numTrials),
    numRuns: readInteger(values, 'runs', DEFAULT_ESTIMATE_ARGS.numRuns),
    additionalRuns: readInteger(values, 'additionalRuns', DEFAULT_ESTIMATE_ARGS.additionalRuns),
    seed,
    yes: readBoolean(values, 'yes'),
  };
}

export interface SweepArgs {
  from: number;
  to: number;
  numTrials: number;
  exactLimit: number;
  seed?: number;
}

export function parseSweepArgs(argv: string[]): SweepArgs {
  const values = parseFlags(argv);
  return {
    from: readInteger(values, 'from', 4),
    to: readInteger(values, 'to', 16),
    numTrials: readInteger(values, 'trials', 1000),
    exactLimit: readInteger(values, 'exactLimit', 10),
    seed: readBoolean(values, 'random') ? undefined : readOptionalInteger(values, 'seed') ?? 42,
  };
}
