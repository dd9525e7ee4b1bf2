/**
 * Minimal table formatter for CLI output.
 * Prints a simple ASCII table with column headers and rows.
 */

const MAX_COLUMN_WIDTH = 60;

export function formatTable(columns: string[], rows: Record<string, unknown>[]): string {
  if (columns.length === 0) return '(no columns)';
  if (rows.length === 0) return '(0 rows)';

  const widths = columns.map((col) => col.length);
  for (const row of rows) {
    columns.forEach((col, i) => {
      const val = formatValue(row[col]);
      widths[i] = Math.min(Math.max(widths[i] ?? 0, val.length), MAX_COLUMN_WIDTH);
    });
  }
  const widthOf = (i: number): number => widths[i] ?? 0;

  const lines: string[] = [];
  lines.push(columns.map((col, i) => col.padEnd(widthOf(i))).join(' | '));
  lines.push(widths.map((w) => '-'.repeat(w)).join('-+-'));

  for (const row of rows) {
    const line = columns
      .map((col, i) => {
        const val = formatValue(row[col]);
        const width = widthOf(i);
        return val.length > width ? val.slice(0, width - 1) + '…' : val.padEnd(width);
      })
      .join(' | ');
    lines.push(line);
  }

  return lines.join('\n');
}

/** Shorten free text for a table cell. */
export function truncate(text: string, max: number): string {
  const oneLine = text.replace(/\s+/g, ' ').trim();
  return oneLine.length > max ? oneLine.slice(0, max - 3) + '...' : oneLine;
}

function formatValue(val: unknown): string {
  if (val === null || val === undefined) return '-';
  if (typeof val === 'number' && !Number.isInteger(val)) return val.toFixed(2);
  if (typeof val === 'object') return JSON.stringify(val);
  return String(val);
}
