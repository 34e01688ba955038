/**
 * Table Formatter for result rows
 *
 * One renderer per output format, all fed the same (already sorted) rows:
 * - table: Aligned text table with borders, for the console
 * - csv: RFC4180 CSV for piping/export
 * - json: Array of objects keyed by column name
 */

import Papa from 'papaparse';
import type { Cell, ColumnSpec, Row } from '../types/index.js';

// ============================================================================
// Types
// ============================================================================

export type OutputFormat = 'table' | 'csv' | 'json';

export interface FormatOptions {
  max_width?: number;        // Max cell width for table format (default: 40)
  show_footer?: boolean;     // Show row count footer (default: true)
}

export interface RowRenderer {
  format: OutputFormat;
  render(rows: readonly Row[], columns: readonly ColumnSpec[], options?: FormatOptions): string;
}

const DEFAULT_MAX_WIDTH = 40;

// ============================================================================
// Formatting Helpers
// ============================================================================

/** Truncate string with ellipsis */
export function truncate(str: string, maxLen: number): string {
  if (!str) return '-';
  if (str.length <= maxLen) return str;
  return str.slice(0, maxLen - 3) + '...';
}

/** Display text for a cell; null shows as '-' */
export function formatCell(value: Cell | undefined): string {
  if (value === null || value === undefined) return '-';
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? '-' : value.toISOString();
  return String(value);
}

/** Export text for a cell; null exports as an empty field */
function exportCell(value: Cell | undefined): string {
  if (value === null || value === undefined) return '';
  return formatCell(value);
}

/** JSON value for a cell; dates become ISO strings */
function jsonCell(value: Cell | undefined): string | number | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value.toISOString();
  return value;
}

/** Pad string to width */
function pad(str: string, width: number): string {
  const truncated = str.length > width ? str.slice(0, width) : str;
  return truncated + ' '.repeat(width - truncated.length);
}

// ============================================================================
// Table Formatting
// ============================================================================

/**
 * Format rows as aligned text table
 */
export function formatAsTable(
  rows: readonly Row[],
  columns: readonly ColumnSpec[],
  options: FormatOptions = {}
): string {
  if (columns.length === 0 || rows.length === 0) {
    return 'No results';
  }

  const maxWidth = options.max_width || DEFAULT_MAX_WIDTH;
  const cells = rows.map(row => columns.map(col => truncate(formatCell(row[col.index]), maxWidth)));
  const headers = columns.map(col => truncate(col.name, maxWidth));
  const widths = headers.map((header, i) =>
    Math.max(header.length, ...cells.map(rowCells => rowCells[i].length))
  );

  // Build separator
  const separatorCells = widths.map(width => '─'.repeat(width));
  const topBorder = '┌─' + separatorCells.join('─┬─') + '─┐';
  const headerSep = '├─' + separatorCells.join('─┼─') + '─┤';
  const bottomBorder = '└─' + separatorCells.join('─┴─') + '─┘';

  const headerRow = '│ ' + headers.map((header, i) => pad(header, widths[i])).join(' │ ') + ' │';
  const dataRows = cells.map(rowCells =>
    '│ ' + rowCells.map((cell, i) => pad(cell, widths[i])).join(' │ ') + ' │'
  );

  const lines = [topBorder, headerRow, headerSep, ...dataRows, bottomBorder];

  if (options.show_footer !== false) {
    lines.push(`${rows.length} ${rows.length === 1 ? 'row' : 'rows'}`);
  }

  return lines.join('\n');
}

/**
 * Format rows as CSV (header row of column names, CRLF line endings)
 */
export function formatAsCSV(rows: readonly Row[], columns: readonly ColumnSpec[]): string {
  if (columns.length === 0) {
    return '';
  }

  return Papa.unparse(
    {
      fields: columns.map(col => col.name),
      data: rows.map(row => columns.map(col => exportCell(row[col.index]))),
    },
    { newline: '\r\n' }
  );
}

/**
 * Format rows as a JSON array of objects keyed by column name
 */
export function formatAsJSON(rows: readonly Row[], columns: readonly ColumnSpec[]): string {
  const records = rows.map(row =>
    Object.fromEntries(columns.map(col => [col.name, jsonCell(row[col.index])]))
  );
  return JSON.stringify(records, null, 2);
}

// ============================================================================
// Renderers
// ============================================================================

export const RENDERERS: Record<OutputFormat, RowRenderer> = {
  table: { format: 'table', render: formatAsTable },
  csv: { format: 'csv', render: (rows, columns) => formatAsCSV(rows, columns) },
  json: { format: 'json', render: (rows, columns) => formatAsJSON(rows, columns) },
};

/**
 * Format rows according to the requested format
 */
export function formatRows(
  rows: readonly Row[],
  columns: readonly ColumnSpec[],
  format: OutputFormat = 'table',
  options: FormatOptions = {}
): string {
  return RENDERERS[format].render(rows, columns, options);
}
