/** Compact number formatting for report text. */
export function formatStat(x: number | null, digits = 2): string {
  if (x === null || Number.isNaN(x)) return 'n/a';
  if (!Number.isFinite(x)) return x > 0 ? 'inf' : '-inf';
  return String(Number(x.toFixed(digits)));
}

export function formatPct(x: number, digits = 1): string {
  return `${x.toFixed(digits)}%`;
}

/** "a", "a and b", "a, b and c" */
export function joinWords(items: readonly string[]): string {
  if (items.length <= 1) return items.join('');
  return `${items.slice(0, -1).join(', ')} and ${items[items.length - 1]}`;
}
