import type {
  CategoricalColumn,
  CellValue,
  Column,
  ColumnKind,
  Dataset,
  DatasetSource,
  NumericColumn
} from '../types/dataset';
import { RawCell, inferKind, normalizeHeader, toBoolean, toCategory, toDate, toNumber } from './coerce';
import { MOVIE_COLUMN_KINDS } from './schema';

/**
 * Unique column names from a header row. Blank headers become column_<n>,
 * repeats get a numeric suffix (genre, genre_2, ...).
 */
export function uniqueHeader(header: readonly RawCell[]): string[] {
  const seen = new Map<string, number>();
  return header.map((h, i) => {
    const base = normalizeHeader(h) || `column_${i + 1}`;
    const n = (seen.get(base) ?? 0) + 1;
    seen.set(base, n);
    return n === 1 ? base : `${base}_${n}`;
  });
}

function buildColumn(name: string, kind: ColumnKind, raw: readonly RawCell[]): Column {
  switch (kind) {
    case 'numeric':
      return { name, kind, values: Object.freeze(raw.map((v) => toNumber(v))) };
    case 'date':
      return { name, kind, values: Object.freeze(raw.map((v) => toDate(v))) };
    case 'boolean':
      return { name, kind, values: Object.freeze(raw.map((v) => toBoolean(v))) };
    case 'categorical':
      return { name, kind, values: Object.freeze(raw.map((v) => toCategory(v))) };
  }
}

/**
 * Build an immutable Dataset from a header and row-major cells.
 * Known movie columns get their declared kind; any other column's kind is
 * inferred from its values. Short rows are padded with missing cells.
 */
export function buildDataset(
  name: string,
  header: readonly RawCell[],
  rows: readonly (readonly RawCell[])[],
  source: DatasetSource,
  declaredKinds: Readonly<Record<string, ColumnKind>> = MOVIE_COLUMN_KINDS
): Dataset {
  const names = uniqueHeader(header);

  const columns = names.map((colName, j) => {
    const raw = rows.map((r) => r[j] ?? null);
    const kind = declaredKinds[colName] ?? inferKind(raw);
    return Object.freeze(buildColumn(colName, kind, raw));
  });

  return Object.freeze({
    name,
    rowCount: rows.length,
    columns: Object.freeze(columns),
    source
  });
}

export function getColumn(dataset: Dataset, name: string): Column | undefined {
  return dataset.columns.find((c) => c.name === name);
}

export const isNumericColumn = (c: Column): c is NumericColumn => c.kind === 'numeric';
export const isCategoricalColumn = (c: Column): c is CategoricalColumn => c.kind === 'categorical';

export function getNumericColumn(dataset: Dataset, name: string): NumericColumn | undefined {
  const col = getColumn(dataset, name);
  return col && isNumericColumn(col) ? col : undefined;
}

export function getCategoricalColumn(dataset: Dataset, name: string): CategoricalColumn | undefined {
  const col = getColumn(dataset, name);
  return col && isCategoricalColumn(col) ? col : undefined;
}

export function numericColumns(dataset: Dataset): NumericColumn[] {
  return dataset.columns.filter(isNumericColumn);
}

export function categoricalColumns(dataset: Dataset): CategoricalColumn[] {
  return dataset.columns.filter(isCategoricalColumn);
}

export function presentValues<V>(values: readonly (V | null)[]): V[] {
  const out: V[] = [];
  for (const v of values) if (v !== null) out.push(v);
  return out;
}

export function countMissing(column: Column): number {
  let missing = 0;
  for (const v of column.values) if (v === null) missing++;
  return missing;
}

/** Row i as a name → value map, in column order */
export function rowRecord(dataset: Dataset, i: number): Record<string, CellValue | null> {
  const record: Record<string, CellValue | null> = {};
  for (const col of dataset.columns) record[col.name] = col.values[i] ?? null;
  return record;
}
