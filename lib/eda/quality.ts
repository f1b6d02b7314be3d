import type { Dataset, NumericColumn, SkippedStatistic } from '../types/dataset';
import type {
  BoxSummary,
  DescriptiveStatistics,
  MissingnessReport,
  OutlierSummary
} from '../types/report';
import { countMissing, getColumn, numericColumns, presentValues } from '../ingestion/dataset';
import { finiteOrNull, mean, quartiles, sampleStd, sortAscending } from '../stats/descriptive';

/**
 * Missing count and percentage per column, most-missing first.
 * Columns with equal counts keep dataset order. With zero rows every
 * percentage is 0.
 */
export function assessMissingness(dataset: Dataset): MissingnessReport {
  const n = dataset.rowCount;
  return dataset.columns
    .map((c) => {
      const missingCount = countMissing(c);
      return { column: c.name, missingCount, missingPct: n === 0 ? 0 : (missingCount / n) * 100 };
    })
    .sort((a, b) => b.missingCount - a.missingCount);
}

export function describeColumn(column: NumericColumn): DescriptiveStatistics {
  const values = presentValues(column.values);
  const sorted = sortAscending(values);
  const mu = mean(values);
  const q = quartiles(sorted);

  return {
    column: column.name,
    count: values.length,
    mean: finiteOrNull(mu),
    std: finiteOrNull(sampleStd(values, mu)),
    min: sorted.length ? sorted[0] : null,
    q1: finiteOrNull(q.q1),
    median: finiteOrNull(q.median),
    q3: finiteOrNull(q.q3),
    max: sorted.length ? sorted[sorted.length - 1] : null
  };
}

export function describeNumeric(dataset: Dataset): DescriptiveStatistics[] {
  return numericColumns(dataset).map(describeColumn);
}

type Fences = { q1: number; median: number; q3: number; iqr: number; lower: number; upper: number };

function tukeyFences(sorted: readonly number[], multiplier: number): Fences | null {
  if (sorted.length === 0) return null;
  const { q1, median, q3 } = quartiles(sorted);
  const iqr = q3 - q1;
  return { q1, median, q3, iqr, lower: q1 - multiplier * iqr, upper: q3 + multiplier * iqr };
}

/**
 * Tukey fencing: a value is an outlier iff it lies strictly outside
 * [Q1 − k·IQR, Q3 + k·IQR]. A constant column has IQR 0, so any value
 * that differs from the constant is flagged.
 */
export function outlierSummary(column: NumericColumn, multiplier = 1.5): OutlierSummary {
  const fences = tukeyFences(sortAscending(presentValues(column.values)), multiplier);
  if (!fences) {
    return { column: column.name, q1: null, q3: null, iqr: null, lowerFence: null, upperFence: null, rowIndices: [] };
  }

  const rowIndices: number[] = [];
  column.values.forEach((v, i) => {
    if (v !== null && (v < fences.lower || v > fences.upper)) rowIndices.push(i);
  });

  return {
    column: column.name,
    q1: fences.q1,
    q3: fences.q3,
    iqr: fences.iqr,
    lowerFence: fences.lower,
    upperFence: fences.upper,
    rowIndices
  };
}

export function detectOutliers(dataset: Dataset, multiplier = 1.5): OutlierSummary[] {
  return numericColumns(dataset).map((c) => outlierSummary(c, multiplier));
}

export function boxSummary(column: NumericColumn, multiplier = 1.5): BoxSummary {
  const sorted = sortAscending(presentValues(column.values));
  const fences = tukeyFences(sorted, multiplier);
  if (!fences) {
    return {
      column: column.name,
      q1: null,
      median: null,
      q3: null,
      lowerFence: null,
      upperFence: null,
      whiskerLow: null,
      whiskerHigh: null,
      outliers: []
    };
  }

  const inside = sorted.filter((v) => v >= fences.lower && v <= fences.upper);
  return {
    column: column.name,
    q1: fences.q1,
    median: fences.median,
    q3: fences.q3,
    lowerFence: fences.lower,
    upperFence: fences.upper,
    whiskerLow: inside.length ? inside[0] : null,
    whiskerHigh: inside.length ? inside[inside.length - 1] : null,
    outliers: sorted.filter((v) => v < fences.lower || v > fences.upper)
  };
}

export interface BoxPlotResult {
  boxes: BoxSummary[];
  skipped: SkippedStatistic[];
}

/** Box-plot data for the named columns; absent or non-numeric ones are skipped. */
export function summarizeBoxPlots(
  dataset: Dataset,
  columns: readonly string[],
  multiplier = 1.5
): BoxPlotResult {
  const boxes: BoxSummary[] = [];
  const skipped: SkippedStatistic[] = [];

  for (const name of columns) {
    const col = getColumn(dataset, name);
    if (col && col.kind === 'numeric') {
      boxes.push(boxSummary(col, multiplier));
    } else {
      skipped.push({
        stage: 'quality',
        statistic: 'box_plot',
        column: name,
        reason: col ? `column is ${col.kind}, not numeric` : 'column is absent'
      });
    }
  }

  return { boxes, skipped };
}
