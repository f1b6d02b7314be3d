import { format as formatDate } from 'date-fns';
import type { CellValue } from '../types/dataset';
import type { EdaRun } from './pipeline';
import { formatPct, formatStat } from './format';

const RULE = '='.repeat(50);

function banner(title: string): string[] {
  return ['', RULE, title, RULE];
}

function formatCell(v: CellValue | null): string {
  if (v === null) return 'NaN';
  if (v instanceof Date) return formatDate(v, 'yyyy-MM-dd');
  if (typeof v === 'number') return formatStat(v);
  return String(v);
}

/** Left-aligned text table with a dashed rule under the header. */
export function formatTable(headers: readonly string[], rows: readonly (readonly string[])[]): string[] {
  const widths = headers.map((h, j) => rows.reduce((w, r) => Math.max(w, (r[j] ?? '').length), h.length));
  const line = (cells: readonly string[]) =>
    cells.map((c, j) => c.padEnd(widths[j])).join('  ').trimEnd();
  return [line(headers), line(widths.map((w) => '-'.repeat(w))), ...rows.map(line)];
}

/**
 * The textual report bundle: shape, column info, missingness, descriptive
 * statistics, outliers, top categories and ranked insights.
 */
export function formatReport(run: EdaRun): string {
  const { report, config, dataset } = run;
  const { structure } = report;
  const out: string[] = [];

  out.push(`Dataset: ${dataset.name} (${dataset.source.type === 'file' ? dataset.source.path : 'built-in sample'})`);
  for (const d of report.diagnostics) {
    if (d.kind === 'source_unavailable') {
      out.push(`! Source unavailable at ${d.path}: ${d.reason}`);
    } else {
      out.push(`! Schema gap: expected ${d.expectedKind} column "${d.column}"` + (d.actualKind ? ` (found ${d.actualKind})` : ' (absent)'));
    }
  }

  out.push(...banner('STEP 2: INITIAL DATA INSPECTION'));
  out.push(`--- First ${structure.preview.length} Rows ---`);
  const names = structure.columns.map((c) => c.name);
  out.push(...formatTable(names, structure.preview.map((r) => names.map((n) => formatCell(r[n] ?? null)))));
  out.push('', '--- Dataset Shape (Rows, Columns) ---', `(${structure.rowCount}, ${structure.columnCount})`);
  out.push('', '--- Column Info and Data Types ---');
  out.push(
    ...formatTable(
      ['Column', 'Non-Null Count', 'Kind'],
      structure.columns.map((c) => [c.name, String(c.nonNullCount), c.kind])
    )
  );

  out.push(...banner('STEP 3: DATA QUALITY ASSESSMENT'));
  out.push('--- Missing Value Report ---');
  out.push(
    ...formatTable(
      ['Column', 'Missing Count', 'Missing Percentage'],
      report.missingness.map((m) => [m.column, String(m.missingCount), formatPct(m.missingPct)])
    )
  );
  out.push('', '--- Numerical Feature Descriptive Statistics ---');
  out.push(
    ...formatTable(
      ['Column', 'count', 'mean', 'std', 'min', '25%', '50%', '75%', 'max'],
      report.descriptive.map((s) => [
        s.column,
        String(s.count),
        ...[s.mean, s.std, s.min, s.q1, s.median, s.q3, s.max].map((x) => formatStat(x))
      ])
    )
  );
  out.push('', `--- Outliers (IQR × ${config.iqrMultiplier}) ---`);
  out.push(
    ...formatTable(
      ['Column', 'Lower Fence', 'Upper Fence', 'Outlier Rows'],
      report.outliers.map((o) => [
        o.column,
        formatStat(o.lowerFence),
        formatStat(o.upperFence),
        o.rowIndices.length ? o.rowIndices.join(', ') : '-'
      ])
    )
  );

  out.push(...banner('STEP 4: UNIVARIATE ANALYSIS'));
  for (const freq of report.categories) {
    out.push(`--- Top ${config.reportTopCategories} "${freq.column}" Values ---`);
    out.push(
      ...formatTable(
        ['Value', 'Count', 'Share'],
        freq.entries.slice(0, config.reportTopCategories).map((e) => [e.value, String(e.count), formatPct(e.share * 100)])
      )
    );
    out.push('');
  }

  out.push(...banner('STEP 5: BIVARIATE AND MULTIVARIATE ANALYSIS'));
  const corr = run.charts.correlation;
  out.push('--- Correlation Matrix ---');
  out.push(...formatTable(['', ...corr.columns], corr.values.map((row, i) => [corr.columns[i], ...row.map((r) => formatStat(r))])));

  out.push(...banner('STEP 6: FINAL INSIGHTS'));
  if (report.insights.length === 0) out.push('No insight rule fired.');
  for (const insight of report.insights) {
    out.push(`${insight.rank}. ${insight.message}`);
  }
  if (report.skipped.length > 0) {
    out.push('', '--- Skipped Statistics ---');
    for (const s of report.skipped) out.push(`- ${s.stage}/${s.statistic} "${s.column}": ${s.reason}`);
  }
  out.push(RULE);

  return out.join('\n');
}
