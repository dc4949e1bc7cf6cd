/**
 * CLI output formatting utilities
 */

export interface TableColumn {
  header: string;
  key: string;
  width?: number;
  align?: 'left' | 'right' | 'center';
  format?: (value: unknown) => string;
}

export interface OutputOptions {
  json?: boolean;
}

export type Row = Record<string, unknown>;

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Format a value for display
 */
export function formatValue(value: unknown): string {
  if (value === null || value === undefined) {
    return '-';
  }
  if (typeof value === 'number') {
    return String(value);
  }
  if (typeof value === 'boolean') {
    return value ? 'Yes' : 'No';
  }
  if (Array.isArray(value)) {
    return value.length > 0 ? value.map(formatValue).join(', ') : '-';
  }
  if (isRow(value)) {
    const entries = Object.entries(value);
    return entries.length > 0 ? entries.map(([k, v]) => `${k}=${formatValue(v)}`).join(', ') : '-';
  }
  return String(value);
}

/**
 * Truncate or pad a string to a specific width
 */
function fitToWidth(str: string, width: number, align: 'left' | 'right' | 'center' = 'left'): string {
  if (str.length > width) {
    return str.slice(0, width - 1) + '…';
  }

  const padding = width - str.length;

  switch (align) {
    case 'right':
      return ' '.repeat(padding) + str;
    case 'center': {
      const left = Math.floor(padding / 2);
      const right = padding - left;
      return ' '.repeat(left) + str + ' '.repeat(right);
    }
    default:
      return str + ' '.repeat(padding);
  }
}

function cell(column: TableColumn, row: Row): string {
  const value = row[column.key];
  return column.format ? column.format(value) : formatValue(value);
}

/**
 * Calculate column widths based on content
 */
function calculateWidths(columns: TableColumn[], rows: Row[]): number[] {
  return columns.map((col) => {
    if (col.width) {
      return col.width;
    }
    let maxWidth = col.header.length;
    for (const row of rows) {
      maxWidth = Math.max(maxWidth, cell(col, row).length);
    }
    // Cap at reasonable maximum
    return Math.min(maxWidth, 40);
  });
}

/**
 * Format rows as a table
 */
export function formatTable(columns: TableColumn[], rows: Row[]): string {
  if (rows.length === 0) {
    return 'No data';
  }

  const widths = calculateWidths(columns, rows);
  const lines: string[] = [];

  lines.push(columns.map((col, i) => fitToWidth(col.header, widths[i], 'left')).join('  ').trimEnd());
  lines.push(widths.map((w) => '─'.repeat(w)).join('──'));

  for (const row of rows) {
    lines.push(columns.map((col, i) => fitToWidth(cell(col, row), widths[i], col.align ?? 'left')).join('  ').trimEnd());
  }

  return lines.join('\n');
}

export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Print data as JSON, a table, key-value lines or a plain string
 */
export function output(data: unknown, columns: TableColumn[] | null, options: OutputOptions): void {
  if (options.json) {
    console.log(formatJson(data));
    return;
  }

  if (columns && Array.isArray(data)) {
    console.log(formatTable(columns, data.filter(isRow)));
    return;
  }

  if (isRow(data)) {
    const keys = Object.keys(data);
    const maxKeyLen = Math.max(0, ...keys.map((k) => k.length));
    for (const [key, value] of Object.entries(data)) {
      console.log(`${key.padEnd(maxKeyLen)}  ${formatValue(value)}`);
    }
    return;
  }

  console.log(String(data));
}

/**
 * Format a unix timestamp in seconds as an ISO string
 */
export function formatTimestamp(seconds: number): string {
  return new Date(seconds * 1000).toISOString();
}

export function success(message: string): void {
  console.log(`✓ ${message}`);
}

export function error(message: string): void {
  console.error(`✗ ${message}`);
}

export function warn(message: string): void {
  console.warn(`! ${message}`);
}

export function info(message: string): void {
  console.log(`→ ${message}`);
}

/**
 * Truncate a string to a maximum length, adding ellipsis if needed
 */
export function truncate(str: string, maxLen: number): string {
  if (str.length <= maxLen) return str;
  return str.slice(0, maxLen - 1) + '…';
}
