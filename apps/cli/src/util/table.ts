/**
 * Plain ASCII table for CLI output.
 */

const MAX_CELL_WIDTH = 60;

export function formatTable(columns: readonly string[], rows: readonly Record<string, unknown>[]): string {
  if (columns.length === 0) return '(no columns)';
  if (rows.length === 0) return '(0 rows)';

  const cells = rows.map((row) => columns.map((col) => formatValue(row[col])));
  const widths = columns.map((col, i) =>
    Math.min(Math.max(col.length, ...cells.map((line) => line[i].length)), MAX_CELL_WIDTH),
  );

  const lines = [
    columns.map((col, i) => col.padEnd(widths[i])).join(' | '),
    widths.map((w) => '-'.repeat(w)).join('-+-'),
  ];
  for (const line of cells) {
    lines.push(line.map((val, i) => fit(val, widths[i])).join(' | '));
  }
  return lines.join('\n');
}

function fit(value: string, width: number): string {
  return value.length > width ? `${value.slice(0, width - 3)}...` : value.padEnd(width);
}

export function formatValue(val: unknown): string {
  if (val === null || val === undefined) return 'NULL';
  if (val instanceof Date) return val.toISOString();
  if (typeof val === 'bigint') return val.toString();
  if (typeof val === 'object') return JSON.stringify(val);
  return String(val);
}
