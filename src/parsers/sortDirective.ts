/**
 * Sort Directive Parser
 *
 * Parses the compact --sort syntax ("2,1d,4") into a SortKey. Bad tokens are
 * dropped with a diagnostic; the rest of the directive still applies.
 */

import type { ColumnSpec, Diagnostic, Row, SortKey, SortTerm } from '../types/index.js';
import { classifyColumn } from '../formatters/coerce.js';

export interface SortDirectiveResult {
  sortKey: SortKey;
  diagnostics: Diagnostic[];
  /** True when the default policy picked the key */
  usedDefault: boolean;
}

const DIRECTIVE_TOKEN = /^(\d+)([ad])?$/i;

/**
 * Default sort policy, first match wins:
 * 1. first timestamp column, descending
 * 2. first port column, ascending
 * 3. second column, ascending
 * 4. first column, ascending
 */
export function defaultSortKey(columns: readonly ColumnSpec[], rows: readonly Row[] = []): SortKey {
  if (columns.length === 0) return [];

  const hints = columns.map(column => classifyColumn(column, rows));

  const timestamp = hints.indexOf('timestamp');
  if (timestamp >= 0) return [{ columnIndex: columns[timestamp].index, direction: 'desc' }];

  const port = hints.indexOf('port');
  if (port >= 0) return [{ columnIndex: columns[port].index, direction: 'asc' }];

  const fallback = columns.length > 1 ? columns[1] : columns[0];
  return [{ columnIndex: fallback.index, direction: 'asc' }];
}

/**
 * Parse a sort directive against the table's columns
 *
 * @param text - Directive such as "2,1d,4" (1-based column numbers)
 * @param columns - Columns in display order
 * @param rows - Rows used to classify columns for the default policy
 */
export function parseSortDirective(
  text: string | undefined,
  columns: readonly ColumnSpec[],
  rows: readonly Row[] = []
): SortDirectiveResult {
  const diagnostics: Diagnostic[] = [];
  const terms: SortTerm[] = [];

  for (const raw of (text ?? '').split(',')) {
    const token = raw.trim();
    if (!token) continue;

    const match = DIRECTIVE_TOKEN.exec(token);
    if (!match) {
      diagnostics.push({
        kind: 'BadDirectiveToken',
        token,
        message: `Ignoring sort token '${token}': expected a column number with optional a/d, e.g. 2d`,
      });
      continue;
    }

    const position = Number(match[1]);
    if (position < 1 || position > columns.length) {
      diagnostics.push({
        kind: 'BadDirectiveToken',
        token,
        message: `Ignoring sort token '${token}': column ${position} is out of range (1-${columns.length})`,
      });
      continue;
    }

    terms.push({
      columnIndex: columns[position - 1].index,
      direction: match[2]?.toLowerCase() === 'd' ? 'desc' : 'asc',
    });
  }

  if (terms.length === 0) {
    return { sortKey: defaultSortKey(columns, rows), diagnostics, usedDefault: true };
  }

  return { sortKey: terms, diagnostics, usedDefault: false };
}
