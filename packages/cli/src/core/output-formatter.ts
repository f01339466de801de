/**
 * Output Formatter - JSON and table formats
 */

import type { OutputFormat } from '../types/index.js';

export function formatJSON(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Convert a value to a displayable string, nested values as compact JSON
 */
function valueToString(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

function isRow(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Format rows as a simple table. Columns default to the keys of the first row.
 */
export function formatTable(data: readonly unknown[], columns?: string[]): string {
  if (data.length === 0) {
    return 'No data to display';
  }

  const rows = data.filter(isRow);
  const [first] = rows;
  const detectedColumns = columns ?? (first ? Object.keys(first) : []);
  if (detectedColumns.length === 0 || rows.length !== data.length) {
    return formatJSON(data);
  }

  const widths = new Map<string, number>();
  for (const col of detectedColumns) {
    widths.set(col, Math.max(col.length, ...rows.map((row) => valueToString(row[col]).length)));
  }
  const width = (col: string): number => widths.get(col) ?? col.length;

  const lines: string[] = [];
  lines.push(detectedColumns.map((col) => col.padEnd(width(col))).join(' | '));
  lines.push(detectedColumns.map((col) => '-'.repeat(width(col))).join('-|-'));
  for (const row of rows) {
    lines.push(detectedColumns.map((col) => valueToString(row[col]).padEnd(width(col))).join(' | '));
  }

  return lines.join('\n');
}

/**
 * Format a handler result. Tables render arrays of rows; objects render
 * one `key | value` row per property.
 */
export function formatOutput(data: unknown, format: OutputFormat = 'table'): string {
  if (format === 'json') {
    return formatJSON(data);
  }
  if (Array.isArray(data)) {
    return formatTable(data);
  }
  if (isRow(data)) {
    return formatTable(
      Object.entries(data).map(([key, value]) => ({ key, value })),
      ['key', 'value']
    );
  }
  return valueToString(data);
}
