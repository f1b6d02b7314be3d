export type ColumnKind = "numeric" | "categorical" | "date" | "boolean";

/** A present cell value; missing cells are `null`. */
export type CellValue = number | string | boolean | Date;

interface ColumnBase<K extends ColumnKind, V extends CellValue> {
  name: string;
  kind: K;
  values: readonly (V | null)[];
}

export type NumericColumn = ColumnBase<"numeric", number>;
export type CategoricalColumn = ColumnBase<"categorical", string>;
export type DateColumn = ColumnBase<"date", Date>;
export type BooleanColumn = ColumnBase<"boolean", boolean>;

export type Column = NumericColumn | CategoricalColumn | DateColumn | BooleanColumn;

export type DatasetSource =
  | { type: "file"; path: string; format: "csv" | "xlsx" }
  | { type: "synthetic"; reason: string };

/**
 * Named, ordered collection of equal-length columns.
 * Row i of every column describes the same record.
 */
export interface Dataset {
  name: string;
  rowCount: number;
  columns: readonly Column[];
  source: DatasetSource;
}

export type SourceUnavailableDiagnostic = { kind: "source_unavailable"; path: string; reason: string };

export type SchemaGapDiagnostic = {
  kind: "schema_gap";
  column: string;
  expectedKind: ColumnKind;
  actualKind: ColumnKind | null;
};

export type SourceDiagnostic = SourceUnavailableDiagnostic | SchemaGapDiagnostic;

export interface LoadResult {
  dataset: Dataset;
  diagnostics: SourceDiagnostic[];
}

export type EdaStage = "inspector" | "quality" | "univariate" | "bivariate" | "insights";

/** A statistic a stage could not compute because a column it needs is absent. */
export interface SkippedStatistic {
  stage: EdaStage;
  statistic: string;
  column: string;
  reason: string;
}
