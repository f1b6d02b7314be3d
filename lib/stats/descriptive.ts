/**
 * Pure numeric helpers shared by the analysis stages.
 * Inputs are plain arrays of finite numbers; missing values are filtered out
 * by the caller. Results are NaN where a value cannot be computed.
 */

export function sortAscending(values: readonly number[]): number[] {
  return [...values].sort((a, b) => a - b);
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/**
 * Sample standard deviation (n − 1 denominator).
 * Needs at least two values.
 */
export function sampleStd(values: readonly number[], mu: number = mean(values)): number {
  if (values.length < 2) return NaN;
  let ss = 0;
  for (const v of values) ss += (v - mu) ** 2;
  return Math.sqrt(ss / (values.length - 1));
}

/**
 * Quantile by linear interpolation between order statistics:
 * position = p·(n−1), blending the ranks on either side.
 */
export function quantileSorted(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) return NaN;
  const pos = (sorted.length - 1) * p;
  const base = Math.floor(pos);
  const rest = pos - base;
  if (base + 1 < sorted.length) {
    return sorted[base] + rest * (sorted[base + 1] - sorted[base]);
  }
  return sorted[base];
}

export interface Quartiles {
  q1: number;
  median: number;
  q3: number;
}

export function quartiles(sorted: readonly number[]): Quartiles {
  return {
    q1: quantileSorted(sorted, 0.25),
    median: quantileSorted(sorted, 0.5),
    q3: quantileSorted(sorted, 0.75),
  };
}

/** Map NaN and ±Infinity to null for report tables. */
export function finiteOrNull(x: number): number | null {
  return Number.isFinite(x) ? x : null;
}

/** Smallest and largest value in one pass; null when empty. */
export function extent(values: readonly number[]): [number, number] | null {
  if (values.length === 0) return null;
  let min = Infinity;
  let max = -Infinity;
  for (const v of values) {
    if (v < min) min = v;
    if (v > max) max = v;
  }
  return [min, max];
}

/**
 * Position of `v` within [min, max] as a fraction in [0, 1]. Operands are
 * halved first so spans wider than Number.MAX_VALUE stay finite.
 */
export function unitPosition(v: number, min: number, max: number): number {
  return (v / 2 - min / 2) / (max / 2 - min / 2);
}
