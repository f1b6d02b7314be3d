import type { ColumnKind, Dataset, SchemaGapDiagnostic } from '../types/dataset';

/** Declared kinds of the movie columns; other columns are inferred. */
export const MOVIE_COLUMN_KINDS: Readonly<Record<string, ColumnKind>> = {
  title: 'categorical',
  release_date: 'date',
  budget: 'numeric',
  revenue: 'numeric',
  runtime: 'numeric',
  vote_average: 'numeric',
  genre: 'categorical',
  director: 'categorical',
  is_english: 'boolean'
};

export interface ExpectedColumn {
  name: string;
  kind: ColumnKind;
}

/** Columns the analysis stages depend on */
export const ANALYTICAL_COLUMNS: readonly ExpectedColumn[] = [
  { name: 'budget', kind: 'numeric' },
  { name: 'revenue', kind: 'numeric' },
  { name: 'runtime', kind: 'numeric' },
  { name: 'vote_average', kind: 'numeric' },
  { name: 'genre', kind: 'categorical' }
];

/**
 * One schema_gap diagnostic per expected column that is absent or was
 * loaded with a different kind.
 */
export function findSchemaGaps(
  dataset: Dataset,
  expected: readonly ExpectedColumn[] = ANALYTICAL_COLUMNS
): SchemaGapDiagnostic[] {
  const gaps: SchemaGapDiagnostic[] = [];
  for (const { name, kind } of expected) {
    const col = dataset.columns.find((c) => c.name === name);
    if (!col || col.kind !== kind) {
      gaps.push({ kind: 'schema_gap', column: name, expectedKind: kind, actualKind: col?.kind ?? null });
    }
  }
  return gaps;
}
