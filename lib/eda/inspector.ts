import type { Column, ColumnKind, Dataset } from '../types/dataset';
import type { ColumnStructure, StructureReport } from '../types/report';
import { countMissing, rowRecord } from '../ingestion/dataset';

class ColumnInfo implements ColumnStructure {
  readonly name: string;
  readonly kind: ColumnKind;
  private readonly column: Column;
  private readonly rowCount: number;

  constructor(column: Column, rowCount: number) {
    this.name = column.name;
    this.kind = column.kind;
    this.column = column;
    this.rowCount = rowCount;
  }

  get nonNullCount(): number {
    return this.rowCount - countMissing(this.column);
  }

  toJSON(): { name: string; kind: ColumnKind; nonNullCount: number } {
    return { name: this.name, kind: this.kind, nonNullCount: this.nonNullCount };
  }
}

/**
 * Shape, per-column kind and non-null count, and the first few records.
 * An empty dataset gives an empty report.
 */
export function inspectStructure(dataset: Dataset, previewRows = 5): StructureReport {
  const columns = dataset.columns.map((c) => new ColumnInfo(c, dataset.rowCount));
  const preview = Array.from(
    { length: Math.min(previewRows, dataset.rowCount) },
    (_, i) => rowRecord(dataset, i)
  );

  return {
    rowCount: dataset.rowCount,
    columnCount: dataset.columns.length,
    columns,
    preview
  };
}
