import Papa from 'papaparse';
import type { RawCell } from './coerce';

export type TableResult = {
  header: RawCell[];
  rows: RawCell[][];
  /** Row-level parse problems papaparse recovered from */
  warnings: string[];
};

/**
 * Parse delimited text into a header row and data rows.
 * The delimiter is auto-detected; blank lines are skipped.
 */
export function parseCsv(text: string): TableResult {
  const parsed = Papa.parse<string[]>(text, {
    header: false,
    dynamicTyping: false,
    skipEmptyLines: 'greedy'
  });

  const [header = [], ...rows] = parsed.data.filter((r) => Array.isArray(r));
  const warnings = parsed.errors.map((e) =>
    e.row !== undefined ? `row ${e.row}: ${e.message}` : e.message
  );

  return { header, rows, warnings };
}
