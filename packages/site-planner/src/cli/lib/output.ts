/**
 * Output Formatting for CLI Commands
 *
 * Table output for terminals, JSON for --json, CSV for rollup reports.
 *
 * @module cli/lib/output
 */

export interface TableColumn {
  readonly key: string;
  readonly header: string;
  readonly align?: 'left' | 'right';
  readonly formatter?: (value: unknown) => string;
}

type Row = object;

function cellValue(row: Row, column: TableColumn): string {
  const value: unknown = Object.prototype.hasOwnProperty.call(row, column.key)
    ? Reflect.get(row, column.key)
    : undefined;
  return column.formatter ? column.formatter(value) : String(value ?? '');
}

/**
 * Columns named after their keys
 */
export function columnsFor(keys: readonly string[]): TableColumn[] {
  return keys.map((key) => ({ key, header: key }));
}

export function formatTable(data: readonly Row[], columns: readonly TableColumn[]): string {
  if (data.length === 0) {
    return 'No entries found.';
  }

  const widths = columns.map((col) =>
    Math.max(col.header.length, ...data.map((row) => cellValue(row, col).length))
  );

  const pad = (value: string, i: number, align: 'left' | 'right' = 'left'): string =>
    align === 'right' ? value.padStart(widths[i]) : value.padEnd(widths[i]);

  const headerRow = columns.map((col, i) => pad(col.header, i, col.align)).join(' | ');
  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');
  const dataRows = data.map((row) =>
    columns.map((col, i) => pad(cellValue(row, col), i, col.align)).join(' | ')
  );

  return [headerRow, separator, ...dataRows].join('\n');
}

export function formatJson<T>(data: T, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * CSV with a header row and a trailing newline
 */
export function formatCsv(data: readonly Row[], columns: readonly TableColumn[]): string {
  const headerRow = columns.map((c) => escapeCSV(c.header)).join(',');
  const dataRows = data.map((row) =>
    columns.map((col) => escapeCSV(cellValue(row, col))).join(',')
  );
  return `${[headerRow, ...dataRows].join('\n')}\n`;
}

export function escapeCSV(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}
