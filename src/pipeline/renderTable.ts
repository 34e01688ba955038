/**
 * Table Pipeline
 *
 * Sorts result rows once and sends the same sorted sequence to every requested
 * output: the console table, CSV and JSON (each to stdout or a file).
 *
 * Console-only mode: when CSV or JSON goes to stdout, stdout carries that
 * stream and nothing else. The table, summary lines and export confirmations
 * are all dropped for the invocation.
 */

import { writeFileSync } from 'fs';
import { RenderModeError } from '../types/index.js';
import type { ColumnSpec, Diagnostic, Row, SortKey } from '../types/index.js';
import { parseSortDirective } from '../parsers/sortDirective.js';
import { sortRows } from '../formatters/sortRows.js';
import { RENDERERS, type FormatOptions } from '../formatters/tableFormatter.js';
import type { ExportFormat } from '../formatters/exportFile.js';
import { formatConfirmation, formatDiagnostic } from './diagnostics.js';

// ============================================================================
// Types
// ============================================================================

export type ExportTarget = { kind: 'stdout' } | { kind: 'file'; path: string };

export interface RenderMode {
  table: boolean;
  csv?: ExportTarget;
  json?: ExportTarget;
}

/** Where rendered text goes; swapped out in tests */
export interface PipelineIO {
  stdout(text: string): void;
  stderr(text: string): void;
  writeFile(path: string, content: string): void;
}

export interface RenderRequest {
  columns: readonly ColumnSpec[];
  rows: readonly Row[];
  /** Sort directive, e.g. "2,1d" */
  sort?: string;
  mode: RenderMode;
  /** Incidental lines printed after the table (dropped in console-only mode) */
  summary?: string[];
  format?: FormatOptions;
}

export interface RenderResult {
  rows: Row[];
  sortKey: SortKey;
  diagnostics: Diagnostic[];
  consoleOnly: boolean;
  /** Files written by this render */
  written: string[];
}

const LINE_ENDINGS: Record<ExportFormat, string> = {
  csv: '\r\n',
  json: '\n',
};

export const processIO: PipelineIO = {
  stdout: text => {
    process.stdout.write(text);
  },
  stderr: text => {
    process.stderr.write(text + '\n');
  },
  writeFile: (path, content) => {
    writeFileSync(path, content, 'utf-8');
  },
};

// ============================================================================
// Render Mode
// ============================================================================

/**
 * Build a render mode, rejecting two machine-readable streams on stdout
 */
export function createRenderMode(options: Partial<RenderMode> = {}): RenderMode {
  const mode: RenderMode = { table: options.table ?? true, csv: options.csv, json: options.json };
  assertRenderMode(mode);
  return mode;
}

export function assertRenderMode(mode: RenderMode): void {
  if (mode.csv?.kind === 'stdout' && mode.json?.kind === 'stdout') {
    throw new RenderModeError('CSV and JSON cannot both be written to the console; send one of them to a file');
  }
}

/** True when a machine-readable stream owns stdout */
export function isConsoleOnly(mode: RenderMode): boolean {
  return mode.csv?.kind === 'stdout' || mode.json?.kind === 'stdout';
}

// ============================================================================
// Pipeline
// ============================================================================

/**
 * Sort and render rows to every facet of the render mode
 *
 * Directive problems and failed file writes are reported as diagnostics on
 * stderr; neither stops the render.
 */
export function renderTable(request: RenderRequest, io: PipelineIO = processIO): RenderResult {
  const { columns, rows, mode } = request;
  assertRenderMode(mode);

  const consoleOnly = isConsoleOnly(mode);
  const { sortKey, diagnostics } = parseSortDirective(request.sort, columns, rows);
  const sorted = sortRows(rows, columns, sortKey);

  const written: string[] = [];
  const confirmations: string[] = [];

  for (const format of ['csv', 'json'] as const) {
    const target = mode[format];
    if (!target) continue;

    const output = RENDERERS[format].render(sorted, columns);
    if (target.kind === 'stdout') {
      io.stdout(output + LINE_ENDINGS[format]);
      continue;
    }

    try {
      io.writeFile(target.path, output + LINE_ENDINGS[format]);
      written.push(target.path);
      confirmations.push(formatConfirmation(format, target.path));
    } catch (error) {
      diagnostics.push({
        kind: 'ExportFailed',
        message: `Failed to write ${format.toUpperCase()} export to ${target.path}: ${
          error instanceof Error ? error.message : String(error)
        }`,
      });
    }
  }

  for (const diagnostic of diagnostics) {
    io.stderr(formatDiagnostic(diagnostic));
  }

  if (!consoleOnly) {
    const lines: string[] = [];
    if (mode.table) lines.push(RENDERERS.table.render(sorted, columns, request.format));
    lines.push(...(request.summary ?? []), ...confirmations);
    if (lines.length > 0) io.stdout(lines.join('\n') + '\n');
  }

  return { rows: sorted, sortKey, diagnostics, consoleOnly, written };
}
