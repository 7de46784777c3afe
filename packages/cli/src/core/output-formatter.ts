/**
 * Output Formatter - JSON and table formats
 */

import type { OutputFormat } from '../types/index.js';

export function formatJSON(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Convert a value to a displayable string, handling nested objects
 */
function valueToString(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Format rows as a simple aligned table
 */
export function formatTable(data: unknown[], columns?: string[]): string {
  if (data.length === 0) {
    return 'No data to display';
  }

  const first = data[0];
  const detectedColumns = columns ?? (isRecord(first) ? Object.keys(first) : []);
  if (detectedColumns.length === 0) {
    return formatJSON(data);
  }

  const cell = (row: unknown, col: string): string => valueToString(isRecord(row) ? row[col] : undefined);
  const widths = detectedColumns.map((col) =>
    Math.max(col.length, ...data.map((row) => cell(row, col).length))
  );
  const pad = (text: string, index: number): string => text.padEnd(widths[index] ?? 0);

  const lines: string[] = [];
  lines.push(detectedColumns.map((col, index) => pad(col, index)).join(' | '));
  lines.push(widths.map((width) => '-'.repeat(width)).join('-|-'));
  for (const row of data) {
    lines.push(detectedColumns.map((col, index) => pad(cell(row, col), index)).join(' | '));
  }

  return lines.join('\n');
}

/**
 * Render a handler result. Plain strings are printed as they are; a single
 * object in table format becomes a key/value listing.
 */
export function formatOutput(data: unknown, format: OutputFormat = 'table'): string {
  if (format === 'json') {
    return formatJSON(data);
  }
  if (typeof data === 'string') {
    return data;
  }
  if (Array.isArray(data)) {
    return formatTable(data);
  }
  if (isRecord(data)) {
    return formatTable(
      Object.entries(data).map(([key, value]) => ({ key, value })),
      ['key', 'value']
    );
  }
  return valueToString(data);
}
