import { parse, isValid } from 'date-fns';
import type { CellValue, ColumnKind } from '../types/dataset';

/** A cell as it comes out of a CSV or Excel reader */
export type RawCell = string | number | boolean | Date | null | undefined;

const MISSING_MARKERS = new Set(['', 'na', 'n/a', 'nan', 'null', 'none']);
const NUMERIC_RE = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:e[-+]?\d+)?$/i;
const TRUE_WORDS = new Set(['true', 't', 'yes', 'y', '1']);
const FALSE_WORDS = new Set(['false', 'f', 'no', 'n', '0']);
const DATE_FORMATS = ['yyyy-MM-dd', 'MM/dd/yyyy', 'M/d/yyyy', 'M/d/yy'];
const ISO_PREFIX_RE = /^\d{4}-\d{2}-\d{2}T/;

/** Normalize header names: trim, lowercase, punctuation/whitespace runs to "_" */
export const normalizeHeader = (s: RawCell): string =>
  String(s ?? '').trim().toLowerCase().replace(/[.\s-]+/g, '_');

export function isMissingCell(v: RawCell): boolean {
  if (v === null || v === undefined) return true;
  if (typeof v === 'number') return Number.isNaN(v);
  if (typeof v === 'string') return MISSING_MARKERS.has(v.trim().toLowerCase());
  return false;
}

export function toNumber(v: RawCell): number | null {
  if (isMissingCell(v)) return null;
  if (typeof v === 'number') return Number.isFinite(v) ? v : null;
  if (typeof v === 'string') {
    const s = v.trim();
    if (!NUMERIC_RE.test(s)) return null;
    const n = Number(s);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

/** Best-effort date parsing: yyyy-MM-dd, US-style slashes, then ISO timestamps. */
export function toDate(v: RawCell): Date | null {
  if (isMissingCell(v)) return null;
  if (v instanceof Date) return isValid(v) ? v : null;
  if (typeof v !== 'string') return null;

  const s = v.trim();
  for (const f of DATE_FORMATS) {
    const d = parse(s, f, new Date(0));
    if (isValid(d)) return d;
  }
  if (ISO_PREFIX_RE.test(s)) {
    const d = new Date(s);
    return isValid(d) ? d : null;
  }
  return null;
}

export function toBoolean(v: RawCell): boolean | null {
  if (isMissingCell(v)) return null;
  if (typeof v === 'boolean') return v;
  if (typeof v === 'number') return v === 1 ? true : v === 0 ? false : null;
  if (typeof v === 'string') {
    const s = v.trim().toLowerCase();
    if (TRUE_WORDS.has(s)) return true;
    if (FALSE_WORDS.has(s)) return false;
  }
  return null;
}

export function toCategory(v: RawCell): string | null {
  if (isMissingCell(v)) return null;
  if (v instanceof Date) return isValid(v) ? v.toISOString().slice(0, 10) : null;
  return String(v).trim();
}

/** Coerce a raw cell to the declared kind; uncoercible values become missing. */
export function coerceCell(v: RawCell, kind: ColumnKind): CellValue | null {
  switch (kind) {
    case 'numeric':
      return toNumber(v);
    case 'date':
      return toDate(v);
    case 'boolean':
      return toBoolean(v);
    case 'categorical':
      return toCategory(v);
  }
}

/**
 * Majority vote over present values. Ties prefer numeric, then date,
 * then boolean, then categorical. An all-missing column is categorical.
 */
export function inferKind(values: readonly RawCell[]): ColumnKind {
  let num = 0, date = 0, bool = 0, text = 0;

  for (const v of values) {
    if (isMissingCell(v)) continue;
    if (typeof v === 'boolean') bool++;
    else if (toNumber(v) !== null) num++;
    else if (toDate(v) !== null) date++;
    else if (toBoolean(v) !== null) bool++;
    else text++;
  }

  const max = Math.max(num, date, bool, text);
  if (max === 0) return 'categorical';
  if (max === num) return 'numeric';
  if (max === date) return 'date';
  if (max === bool) return 'boolean';
  return 'categorical';
}
