/**
 * Unit tests for the sort directive parser
 */

import { describe, test, expect } from 'vitest';
import { defaultSortKey, parseSortDirective } from './sortDirective.js';
import type { ColumnSpec, Row } from '../types/index.js';

const COLUMNS: ColumnSpec[] = [
  { name: 'Port', index: 0 },
  { name: 'Time', index: 1 },
  { name: 'Count', index: 2 },
];

const ROWS: Row[] = [
  ['1A', '2024-05-01T10:00:00Z', 3],
  ['1B', '2024-05-02T10:00:00Z', 7],
];

// ============================================================================
// Directive Tokens
// ============================================================================

describe('parseSortDirective', () => {
  test('parses a multi-key directive', () => {
    const result = parseSortDirective('2,1d,3a', COLUMNS, ROWS);
    expect(result.sortKey).toEqual([
      { columnIndex: 1, direction: 'asc' },
      { columnIndex: 0, direction: 'desc' },
      { columnIndex: 2, direction: 'asc' },
    ]);
    expect(result.diagnostics).toEqual([]);
    expect(result.usedDefault).toBe(false);
  });

  test('tolerates whitespace and upper-case directions', () => {
    const result = parseSortDirective(' 2D , 1 A ', COLUMNS);
    expect(result.sortKey).toEqual([{ columnIndex: 1, direction: 'desc' }]);
    expect(result.diagnostics).toHaveLength(1);
    expect(result.diagnostics[0].token).toBe('1 A');
  });

  test('maps positions through column indexes', () => {
    const columns: ColumnSpec[] = [
      { name: 'Host', index: 4 },
      { name: 'Port', index: 2 },
    ];
    expect(parseSortDirective('2d', columns).sortKey).toEqual([{ columnIndex: 2, direction: 'desc' }]);
  });

  test('drops bad tokens and keeps the rest', () => {
    const result = parseSortDirective('2,x,4,1d', COLUMNS, ROWS);

    expect(result.sortKey).toEqual([
      { columnIndex: 1, direction: 'asc' },
      { columnIndex: 0, direction: 'desc' },
    ]);
    expect(result.diagnostics).toEqual([
      {
        kind: 'BadDirectiveToken',
        token: 'x',
        message: "Ignoring sort token 'x': expected a column number with optional a/d, e.g. 2d",
      },
      {
        kind: 'BadDirectiveToken',
        token: '4',
        message: "Ignoring sort token '4': column 4 is out of range (1-3)",
      },
    ]);
  });

  test('rejects column zero', () => {
    const result = parseSortDirective('0', COLUMNS, ROWS);
    expect(result.diagnostics[0].message).toBe("Ignoring sort token '0': column 0 is out of range (1-3)");
  });

  test('falls back to the default when every token is bad', () => {
    const result = parseSortDirective('z,9d', COLUMNS, ROWS);
    expect(result.usedDefault).toBe(true);
    expect(result.sortKey).toEqual([{ columnIndex: 1, direction: 'desc' }]);
    expect(result.diagnostics).toHaveLength(2);
  });

  test('uses the default without diagnostics when no directive is given', () => {
    for (const text of [undefined, '', ' , ']) {
      const result = parseSortDirective(text, COLUMNS, ROWS);
      expect(result.usedDefault).toBe(true);
      expect(result.diagnostics).toEqual([]);
    }
  });
});

// ============================================================================
// Default Policy
// ============================================================================

describe('defaultSortKey', () => {
  test('prefers the first timestamp column, descending', () => {
    expect(defaultSortKey(COLUMNS, ROWS)).toEqual([{ columnIndex: 1, direction: 'desc' }]);
  });

  test('uses a column hint without looking at rows', () => {
    const columns: ColumnSpec[] = [
      { name: 'Name', index: 0 },
      { name: 'Seen', index: 1, hint: 'timestamp' },
    ];
    expect(defaultSortKey(columns)).toEqual([{ columnIndex: 1, direction: 'desc' }]);
  });

  test('falls back to the first port column, ascending', () => {
    const columns: ColumnSpec[] = [
      { name: 'Name', index: 0 },
      { name: 'Port', index: 1 },
    ];
    const rows: Row[] = [
      ['uplink', '2B'],
      ['core', '1A'],
    ];
    expect(defaultSortKey(columns, rows)).toEqual([{ columnIndex: 1, direction: 'asc' }]);
  });

  test('treats a column with mixed kinds as generic', () => {
    const columns: ColumnSpec[] = [
      { name: 'Value', index: 0 },
      { name: 'Name', index: 1 },
      { name: 'Note', index: 2 },
    ];
    const rows: Row[] = [
      ['1A', 'b', 'x'],
      ['2024-05-01', 'a', 'y'],
    ];
    expect(defaultSortKey(columns, rows)).toEqual([{ columnIndex: 1, direction: 'asc' }]);
  });

  test('keeps a timestamp column with one unreadable cell', () => {
    const columns: ColumnSpec[] = [
      { name: 'ID', index: 0 },
      { name: 'Name', index: 1 },
      { name: 'Time', index: 2 },
    ];
    const rows: Row[] = [
      [1, 'a', '2024-05-01'],
      [2, 'b', 'pending'],
      [3, 'c', '2024-05-03'],
    ];
    expect(defaultSortKey(columns, rows)).toEqual([{ columnIndex: 2, direction: 'desc' }]);
  });

  test('uses the only column of a one-column table', () => {
    expect(defaultSortKey([{ name: 'Name', index: 0 }], [['x']])).toEqual([{ columnIndex: 0, direction: 'asc' }]);
  });

  test('returns an empty key for a table without columns', () => {
    expect(defaultSortKey([])).toEqual([]);
  });
});
