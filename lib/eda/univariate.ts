import type { CategoricalColumn, Dataset, NumericColumn, SkippedStatistic } from '../types/dataset';
import type {
  CategoricalFrequency,
  CategoryCount,
  Histogram,
  HistogramBin,
  HistogramTransform
} from '../types/report';
import { categoricalColumns, getColumn, numericColumns, presentValues } from '../ingestion/dataset';
import { extent, unitPosition } from '../stats/descriptive';
import { gaussianKde } from '../stats/kde';

export interface HistogramOptions {
  bins?: number;
  /** Number of density samples; 0 skips the density curve */
  densityPoints?: number;
  transform?: HistogramTransform;
}

/**
 * Equal-width bins over [min, max]. Bins are [start, end) except the last,
 * which is closed so the maximum is counted. When min = max there is a
 * single degenerate bin holding every value.
 */
export function binValues(values: readonly number[], bins: number): HistogramBin[] {
  const range = extent(values);
  if (!range) return [];
  const [min, max] = range;

  if (min === max) {
    return [{ start: min, end: max, count: values.length }];
  }

  const width = (max - min) / bins;
  // infinite when the span exceeds Number.MAX_VALUE
  const overflow = !Number.isFinite(width);
  const edge = (i: number) => (overflow ? min * (1 - i / bins) + max * (i / bins) : min + i * width);

  const out: HistogramBin[] = Array.from({ length: bins }, (_, i) => ({
    start: edge(i),
    end: i === bins - 1 ? max : edge(i + 1),
    count: 0
  }));

  for (const v of values) {
    const pos = overflow ? unitPosition(v, min, max) * bins : (v - min) / width;
    // a subnormal span can round width to 0: 0/0 belongs to the first bin
    const idx = Number.isNaN(pos) ? 0 : Math.min(bins - 1, Math.max(0, Math.floor(pos)));
    out[idx].count++;
  }

  return out;
}

export function computeHistogram(column: NumericColumn, options: HistogramOptions = {}): Histogram {
  const { bins = 10, densityPoints = 200, transform = 'none' } = options;

  let values = presentValues(column.values);
  if (transform === 'log1p') {
    values = values.filter((v) => v > -1).map((v) => Math.log1p(v));
  }

  const binned = binValues(values, bins);
  const min = binned.length ? binned[0].start : null;
  const max = binned.length ? binned[binned.length - 1].end : null;
  const density =
    densityPoints > 0 && min !== null && max !== null && min < max
      ? gaussianKde(values, min, max, densityPoints)
      : null;

  return { column: column.name, transform, valueCount: values.length, min, max, bins: binned, density };
}

/**
 * Distinct-value counts, most frequent first; equal counts keep the order
 * in which values were first seen.
 */
export function countCategories(column: CategoricalColumn): CategoricalFrequency {
  const counts = new Map<string, number>();
  let total = 0;
  for (const v of column.values) {
    if (v === null) continue;
    counts.set(v, (counts.get(v) ?? 0) + 1);
    total++;
  }

  const entries: CategoryCount[] = [...counts.entries()]
    .map(([value, count]) => ({ value, count, share: count / total }))
    .sort((a, b) => b.count - a.count);

  return { column: column.name, total, entries };
}

export interface UnivariateOptions {
  bins: number;
  densityPoints: number;
  logScaleColumns: readonly string[];
}

export interface UnivariateResult {
  histograms: Histogram[];
  logHistograms: Histogram[];
  categories: CategoricalFrequency[];
  skipped: SkippedStatistic[];
}

export function analyzeUnivariate(dataset: Dataset, options: UnivariateOptions): UnivariateResult {
  const { bins, densityPoints } = options;
  const skipped: SkippedStatistic[] = [];

  const histograms = numericColumns(dataset).map((c) => computeHistogram(c, { bins, densityPoints }));

  const logHistograms: Histogram[] = [];
  for (const name of options.logScaleColumns) {
    const col = getColumn(dataset, name);
    if (col && col.kind === 'numeric') {
      logHistograms.push(computeHistogram(col, { bins, densityPoints, transform: 'log1p' }));
    } else {
      skipped.push({
        stage: 'univariate',
        statistic: 'log_histogram',
        column: name,
        reason: col ? `column is ${col.kind}, not numeric` : 'column is absent'
      });
    }
  }

  const categories = categoricalColumns(dataset).map(countCategories);

  return { histograms, logHistograms, categories, skipped };
}
