/**
 * render_rows Command Handler
 *
 * Renders a results file produced by the operation layer:
 *
 * ```json
 * {
 *   "columns": [{ "name": "Port", "hint": "port" }, { "name": "Time" }],
 *   "rows": [["1A", "2024-05-01T10:00:00Z"], ["2B", null]]
 * }
 * ```
 *
 * Column indexes follow the order of `columns`.
 */

import { readFileSync } from 'fs';
import { ValidationError } from '../types/index.js';
import type { Cell, ColumnHint, ColumnSpec, Row } from '../types/index.js';
import { renderTable, type RenderResult } from '../pipeline/renderTable.js';
import { buildRenderMode, type TableOutputInput } from './output_options.js';
import type { ToolContext } from './context.js';

export interface RenderRowsInput extends TableOutputInput {
  file: string;
}

export interface RowsDocument {
  columns: ColumnSpec[];
  rows: Row[];
}

const HINTS: readonly ColumnHint[] = ['timestamp', 'port', 'generic'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isHint(value: unknown): value is ColumnHint {
  return HINTS.some(hint => hint === value);
}

function isCell(value: unknown): value is Cell {
  return value === null || typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value));
}

function parseColumn(value: unknown, index: number): ColumnSpec {
  if (typeof value === 'string') return { name: value, index };
  const name = isRecord(value) ? value.name : undefined;
  if (!isRecord(value) || typeof name !== 'string') {
    throw new ValidationError(`columns[${index}] must be a name or an object with a string "name"`, 'columns');
  }
  const hint = value.hint;
  if (hint === undefined) return { name, index };
  if (!isHint(hint)) {
    throw new ValidationError(`columns[${index}].hint must be one of: ${HINTS.join(', ')}`, 'columns');
  }
  return { name, index, hint };
}

function parseRow(value: unknown, index: number, width: number): Row {
  if (!Array.isArray(value)) {
    throw new ValidationError(`rows[${index}] must be an array`, 'rows');
  }
  if (value.length !== width) {
    throw new ValidationError(`rows[${index}] has ${value.length} cells; expected ${width}`, 'rows');
  }
  return value.map((cell: unknown, column) => {
    if (!isCell(cell)) {
      throw new ValidationError(`rows[${index}][${column}] must be a string, number or null`, 'rows');
    }
    return cell;
  });
}

/**
 * Validate a parsed results document
 */
export function parseRowsDocument(data: unknown): RowsDocument {
  const columnValues: unknown = isRecord(data) ? data.columns : undefined;
  const rowValues: unknown = isRecord(data) ? data.rows : undefined;
  if (!Array.isArray(columnValues) || !Array.isArray(rowValues)) {
    throw new ValidationError('Results file must be an object with "columns" and "rows" arrays');
  }
  const columns = columnValues.map((column: unknown, i) => parseColumn(column, i));
  const rows = rowValues.map((row: unknown, i) => parseRow(row, i, columns.length));
  return { columns, rows };
}

export function readRowsDocument(filePath: string): RowsDocument {
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ValidationError(
      `Cannot read results file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      'file'
    );
  }
  return parseRowsDocument(data);
}

/**
 * Handle the `render` command
 */
export function handleRenderRows(input: RenderRowsInput, context: ToolContext): RenderResult {
  if (!input || typeof input.file !== 'string' || input.file.trim() === '') {
    throw new ValidationError('A results file is required', 'file');
  }

  const { columns, rows } = readRowsDocument(input.file);
  const mode = buildRenderMode(input, { config: context.config, command: 'render', now: context.now });

  return renderTable({ columns, rows, sort: input.sort, mode }, context.io);
}
