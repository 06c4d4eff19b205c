import type { QueryResult } from '../db/types';

function pad2(value: number): string {
  return value.toString().padStart(2, '0');
}

/**
 * Local wall-clock time as `YYYY-MM-DD HH:MM:SS`.
 */
export function formatExportTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
  return `${day} ${time}`;
}

export function exportHeader(date: Date): string {
  return `# Exported ${formatExportTimestamp(date)}\n`;
}

function formatCell(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') {
    return value.toString();
  }
  return JSON.stringify(value);
}

function formatTableCell(value: unknown): string {
  if (value === null || value === undefined) {
    return 'NULL';
  }
  return formatCell(value);
}

function escapeCsv(value: string): string {
  if (value.includes('"') || value.includes(',') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function padCell(value: string, width: number): string {
  if (value.length >= width) {
    return value;
  }
  return `${value}${' '.repeat(width - value.length)}`;
}

function effectiveColumns(result: QueryResult): string[] {
  return result.columns.length > 0 ? result.columns : Object.keys(result.rows[0] ?? {});
}

export function renderCsv(result: QueryResult): string {
  const columns = effectiveColumns(result);
  if (columns.length === 0) {
    return '';
  }
  const header = columns.map(escapeCsv).join(',');
  const lines = result.rows.map((row) => columns.map((column) => escapeCsv(formatCell(row[column]))).join(','));
  return `${[header, ...lines].join('\n')}\n`;
}

export function renderTable(result: QueryResult): string {
  const columns = effectiveColumns(result);
  if (columns.length === 0) {
    return '(0 rows)\n';
  }

  const widths = columns.map((name) =>
    Math.max(name.length, ...result.rows.map((row) => formatTableCell(row[name]).length))
  );
  const header = columns.map((name, index) => padCell(name, widths[index])).join(' | ');
  const separator = widths.map((width) => '-'.repeat(Math.max(width, 1))).join('-+-');
  const body = result.rows.map((row) =>
    columns.map((name, index) => padCell(formatTableCell(row[name]), widths[index])).join(' | ')
  );
  const count = result.rows.length;
  const footer = `(${count} row${count === 1 ? '' : 's'})`;
  return `${[header, separator, ...body, footer].join('\n')}\n`;
}
