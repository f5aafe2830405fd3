import { EmptyGroupError } from "../errors";
import type { AggregateStat } from "./types";

export const DEFAULT_PERCENTILES = [50, 90, 99] as const;

export function mean(samples: readonly number[]): number {
  let sum = 0;
  for (const s of samples) sum += s;
  return sum / samples.length;
}

/**
 * Standard deviation over the whole population (divides by N, not N - 1).
 */
export function populationStd(samples: readonly number[]): number {
  const m = mean(samples);
  let squares = 0;
  for (const s of samples) {
    squares += (s - m) * (s - m);
  }
  return Math.sqrt(squares / samples.length);
}

/**
 * Percentile of an ascending array by linear interpolation between the two
 * closest ranks, rank = p / 100 * (n - 1).
 */
export function percentile(sorted: readonly number[], p: number): number {
  const n = sorted.length;
  if (n === 0) {
    return Number.NaN;
  }
  const rank = (Math.min(Math.max(p, 0), 100) / 100) * (n - 1);
  const lo = Math.floor(rank);
  const hi = Math.ceil(rank);
  const lower = sorted[lo] ?? Number.NaN;
  const upper = sorted[hi] ?? Number.NaN;
  return lower + (upper - lower) * (rank - lo);
}

export function percentileLabel(p: number): string {
  return `p${p}`;
}

/**
 * Calculate statistics from a sample list.
 *
 * @param samples - Values sharing one unit
 * @param percentiles - Percentiles to include, e.g. `[50, 90, 99]`
 * @param groupId - Named in the error when `samples` is empty
 */
export function computeStats(
  samples: readonly number[],
  percentiles: readonly number[] = [],
  groupId = "<anonymous>",
): AggregateStat {
  if (samples.length === 0) {
    throw new EmptyGroupError(groupId);
  }

  const sorted = [...samples].sort((a, b) => a - b);
  const stats: AggregateStat = {
    mean: mean(samples),
    std: populationStd(samples),
    count: samples.length,
    min: sorted[0] ?? Number.NaN,
    max: sorted[sorted.length - 1] ?? Number.NaN,
  };

  if (percentiles.length === 0) {
    return Object.freeze(stats);
  }

  const values: Record<string, number> = {};
  for (const p of percentiles) {
    values[percentileLabel(p)] = percentile(sorted, p);
  }
  const withPercentiles: AggregateStat = {
    ...stats,
    percentiles: Object.freeze(values),
  };
  return Object.freeze(withPercentiles);
}
