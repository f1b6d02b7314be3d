import type { Dataset, NumericColumn, SkippedStatistic } from '../types/dataset';
import type { CorrelationMatrix, JointFeatureSummary, JointPoint } from '../types/report';
import { getColumn, numericColumns } from '../ingestion/dataset';
import { pearson } from '../stats/correlation';
import { extent, unitPosition } from '../stats/descriptive';

/** Rows where both columns are present, as two aligned series */
function pairwiseComplete(a: NumericColumn, b: NumericColumn): [number[], number[]] {
  const xs: number[] = [];
  const ys: number[] = [];
  const n = Math.min(a.values.length, b.values.length);
  for (let i = 0; i < n; i++) {
    const x = a.values[i];
    const y = b.values[i];
    if (x !== null && y !== null) {
      xs.push(x);
      ys.push(y);
    }
  }
  return [xs, ys];
}

/**
 * Pearson correlation between every pair of numeric columns, pairwise
 * complete. Entries are NaN when a pair shares fewer than 2 rows or either
 * side has zero variance; the diagonal is 1 wherever the column itself has
 * variance.
 */
export function computeCorrelationMatrix(dataset: Dataset): CorrelationMatrix {
  const cols = numericColumns(dataset);
  const values: number[][] = cols.map(() => cols.map(() => NaN));

  for (let i = 0; i < cols.length; i++) {
    const [self] = pairwiseComplete(cols[i], cols[i]);
    values[i][i] = Number.isNaN(pearson(self, self)) ? NaN : 1;

    for (let j = i + 1; j < cols.length; j++) {
      const [xs, ys] = pairwiseComplete(cols[i], cols[j]);
      const r = pearson(xs, ys);
      values[i][j] = r;
      values[j][i] = r;
    }
  }

  return { columns: cols.map((c) => c.name), values };
}

/** Look up a correlation by column names; NaN when either is missing. */
export function correlationBetween(matrix: CorrelationMatrix, a: string, b: string): number {
  const i = matrix.columns.indexOf(a);
  const j = matrix.columns.indexOf(b);
  if (i < 0 || j < 0) return NaN;
  return matrix.values[i][j];
}

/**
 * Linear min–max scaling of `values` onto [lo, hi]. With no spread every
 * value maps to the midpoint.
 */
export function scaleToRange(values: readonly number[], [lo, hi]: readonly [number, number]): number[] {
  const range = extent(values);
  if (!range) return [];
  const [min, max] = range;
  if (max === min) return values.map(() => (lo + hi) / 2);
  return values.map((v) => lo + unitPosition(v, min, max) * (hi - lo));
}

export interface JointFeatureResult {
  joint: JointFeatureSummary | null;
  skipped: SkippedStatistic[];
}

/**
 * Row-aligned (x, y, emphasis) triples plus the emphasis column scaled to a
 * marker-size range: the data behind a sized scatter plot. Rows missing any
 * of the three values are left out.
 */
export function summarizeJointFeatures(
  dataset: Dataset,
  xName: string,
  yName: string,
  emphasisName: string,
  sizeRange: [number, number]
): JointFeatureResult {
  const resolved: NumericColumn[] = [];
  const skipped: SkippedStatistic[] = [];

  for (const name of [xName, yName, emphasisName]) {
    const col = getColumn(dataset, name);
    if (col && col.kind === 'numeric') {
      resolved.push(col);
    } else {
      skipped.push({
        stage: 'bivariate',
        statistic: 'joint_features',
        column: name,
        reason: col ? `column is ${col.kind}, not numeric` : 'column is absent'
      });
    }
  }

  const [x, y, emphasis] = resolved;
  if (skipped.length > 0 || !x || !y || !emphasis) {
    return { joint: null, skipped };
  }

  const rows: Omit<JointPoint, 'size'>[] = [];
  for (let i = 0; i < dataset.rowCount; i++) {
    const xv = x.values[i];
    const yv = y.values[i];
    const ev = emphasis.values[i];
    if (xv == null || yv == null || ev == null) continue;
    rows.push({ row: i, x: xv, y: yv, emphasis: ev });
  }

  const sizes = scaleToRange(rows.map((p) => p.emphasis), sizeRange);
  const points = rows.map((p, k) => ({ ...p, size: sizes[k] }));

  return {
    joint: { x: xName, y: yName, emphasis: emphasisName, sizeRange: [sizeRange[0], sizeRange[1]], points },
    skipped
  };
}
