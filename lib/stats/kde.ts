import { mean, sampleStd } from './descriptive';
import type { DensityPoint } from '../types/report';

const INV_SQRT_2PI = 1 / Math.sqrt(2 * Math.PI);

/**
 * Scott's rule bandwidth: σ̂ · n^(−1/5)
 */
export function scottBandwidth(values: readonly number[]): number {
  const sd = sampleStd(values, mean(values));
  if (!Number.isFinite(sd) || sd === 0) return NaN;
  return sd * Math.pow(values.length, -1 / 5);
}

/**
 * Gaussian kernel density estimate sampled at `points` evenly spaced x
 * positions over [lo, hi]. Returns null when the bandwidth is undefined
 * (fewer than two values, or no spread).
 */
export function gaussianKde(
  values: readonly number[],
  lo: number,
  hi: number,
  points: number
): DensityPoint[] | null {
  const h = scottBandwidth(values);
  if (!Number.isFinite(h) || points < 2) return null;

  const n = values.length;
  const step = (hi - lo) / (points - 1);
  const out: DensityPoint[] = [];

  for (let k = 0; k < points; k++) {
    const x = k === points - 1 ? hi : lo + k * step;
    let acc = 0;
    for (const v of values) {
      const u = (x - v) / h;
      acc += Math.exp(-0.5 * u * u);
    }
    out.push({ x, density: (acc * INV_SQRT_2PI) / (n * h) });
  }

  return out;
}
