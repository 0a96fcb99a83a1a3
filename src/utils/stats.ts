import type { EnergySample } from '../types';

export const mean = (values: readonly number[]): number => {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
};

/**
 * Population standard deviation (divides by n, not n - 1)
 */
export const standardDeviation = (values: readonly number[]): number => {
  if (values.length === 0) return 0;
  const m = mean(values);
  let squares = 0;
  for (const v of values) squares += (v - m) * (v - m);
  return Math.sqrt(squares / values.length);
};

/**
 * Percentile with linear interpolation between closest ranks.
 * `p` is in [0, 100].
 */
export const percentile = (values: readonly number[], p: number): number => {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const rank = ((sorted.length - 1) * p) / 100;
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (rank - lower);
};

export const median = (values: readonly number[]): number => percentile(values, 50);

export const clamp = (value: number, min: number, max: number): number =>
  Math.min(max, Math.max(min, value));

/**
 * RMS values of the samples inside [start, end], both ends inclusive
 */
export const energyInSpan = (
  samples: readonly EnergySample[],
  start: number,
  end: number
): number[] =>
  samples.filter((s) => s.time >= start && s.time <= end).map((s) => s.rms);

/**
 * Energy stability: 1 - coefficient of variation, floored at 0.
 * A span with zero (or no) energy has no defined stability and scores 0.
 */
export const energyStability = (values: readonly number[]): number => {
  const m = mean(values);
  if (m === 0) return 0;
  return Math.max(0, 1 - standardDeviation(values) / m);
};
