import * as XLSX from 'xlsx';
import type { RawCell } from './coerce';
import type { TableResult } from './csv';

const isRawCell = (v: unknown): v is RawCell =>
  v === null ||
  v === undefined ||
  typeof v === 'string' ||
  typeof v === 'number' ||
  typeof v === 'boolean' ||
  v instanceof Date;

/**
 * Read the first sheet of an Excel workbook as a header row plus data rows.
 * Dates come through as Date cells; blank rows are dropped.
 */
export function parseExcelBuffer(buffer: Buffer): TableResult {
  const workbook = XLSX.read(buffer, { type: 'buffer', cellDates: true });
  if (workbook.SheetNames.length === 0) {
    return { header: [], rows: [], warnings: ['workbook has no sheets'] };
  }

  const sheet = workbook.Sheets[workbook.SheetNames[0]];
  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: null,
    raw: true,
    blankrows: false
  });

  const warnings: string[] = [];
  const cells = matrix.map((row, i) =>
    row.map((v) => {
      if (isRawCell(v)) return v;
      warnings.push(`row ${i}: unsupported cell value treated as missing`);
      return null;
    })
  );

  const [header = [], ...rows] = cells;
  return { header, rows, warnings };
}
