import { Stats } from '../types';

function assertSample(values: readonly number[]): void {
  if (values.length < 2) {
    throw new Error(`Sample statistics need at least 2 values, got ${values.length}`);
  }
  for (const value of values) {
    if (!Number.isFinite(value)) {
      throw new Error(`Sample contains a non-finite value: ${value}`);
    }
  }
}

/**
 * Mean and sample standard deviation (divisor count - 1)
 */
export function summarize(values: readonly number[]): Stats {
  assertSample(values);

  const mean = values.reduce((sum, value) => sum + value, 0) / values.length;
  const squaredDeviations = values.reduce((sum, value) => sum + (value - mean) ** 2, 0);
  const variance = squaredDeviations / (values.length - 1);

  return {
    mean,
    variance,
    stdDev: Math.sqrt(variance),
  };
}

/**
 * |estimate - reference| / reference
 */
export function relativeError(estimate: number, reference: number): number {
  if (reference === 0) {
    throw new Error('Relative error is undefined for a reference of 0');
  }
  return Math.abs(estimate - reference) / Math.abs(reference);
}

export function coefficientOfVariation(stats: Stats): number {
  if (stats.mean === 0) {
    throw new Error('Coefficient of variation is undefined for a mean of 0');
  }
  return stats.stdDev / Math.abs(stats.mean);
}

export function median(values: readonly number[]): number {
  if (values.length === 0) {
    throw new Error('median expects at least one value');
  }
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

export function extent(values: readonly number[]): { min: number; max: number } {
  if (values.length === 0) {
    throw new Error('extent expects at least one value');
  }
  let min = Infinity;
  let max = -Infinity;
  for (const value of values) {
    if (value < min) min = value;
    if (value > max) max = value;
  }
  return { min, max };
}
