/**
 * Unit tests for multi-key row sorting
 */

import { describe, test, expect } from 'vitest';
import { sortRows } from './sortRows.js';
import type { Cell, ColumnSpec, Row } from '../types/index.js';

const COLUMNS: ColumnSpec[] = [
  { name: 'Port', index: 0, hint: 'port' },
  { name: 'Status', index: 1 },
  { name: 'Last Seen', index: 2, hint: 'timestamp' },
];

const ROWS: Row[] = [
  ['10A', 'up', '2024-05-01T10:00:00Z'],
  ['2B', 'down', null],
  ['2A', 'up', '2024-05-03T10:00:00Z'],
  ['1.04', 'Down', '2024-05-02T10:00:00Z'],
];

function ports(rows: Row[]): Cell[] {
  return rows.map(row => row[0]);
}

describe('sortRows', () => {
  test('sorts ports numerically by board and slot', () => {
    const sorted = sortRows(ROWS, COLUMNS, [{ columnIndex: 0, direction: 'asc' }]);
    expect(ports(sorted)).toEqual(['1.04', '2A', '2B', '10A']);
  });

  test('sorts timestamps descending with missing last', () => {
    const sorted = sortRows(ROWS, COLUMNS, [{ columnIndex: 2, direction: 'desc' }]);
    expect(ports(sorted)).toEqual(['2A', '1.04', '10A', '2B']);
  });

  test('keeps missing last when ascending', () => {
    const sorted = sortRows(ROWS, COLUMNS, [{ columnIndex: 2, direction: 'asc' }]);
    expect(ports(sorted)).toEqual(['10A', '1.04', '2A', '2B']);
  });

  test('sorts an unreadable cell in an unhinted timestamp column last', () => {
    const columns: ColumnSpec[] = [
      { name: 'ID', index: 0 },
      { name: 'Time', index: 1 },
    ];
    const rows: Row[] = [
      [1, '2024-05-01T10:00:00Z'],
      [2, 'pending'],
      [3, '2024-05-03T10:00:00Z'],
    ];
    expect(ports(sortRows(rows, columns, [{ columnIndex: 1, direction: 'desc' }]))).toEqual([3, 1, 2]);
    expect(ports(sortRows(rows, columns, [{ columnIndex: 1, direction: 'asc' }]))).toEqual([1, 3, 2]);
  });

  test('breaks ties with later terms', () => {
    const sorted = sortRows(ROWS, COLUMNS, [
      { columnIndex: 1, direction: 'asc' },
      { columnIndex: 0, direction: 'desc' },
    ]);
    // 'down' and 'Down' compare equal, so the port term decides
    expect(ports(sorted)).toEqual(['2B', '1.04', '10A', '2A']);
  });

  test('keeps input order for rows equal on every term', () => {
    const rows: Row[] = [
      ['1A', 'up', null],
      ['1B', 'up', null],
      ['1C', 'up', null],
    ];
    const sorted = sortRows(rows, COLUMNS, [{ columnIndex: 1, direction: 'desc' }]);
    expect(ports(sorted)).toEqual(['1A', '1B', '1C']);
  });

  test('skips terms for unknown columns', () => {
    const sorted = sortRows(ROWS, COLUMNS, [{ columnIndex: 7, direction: 'asc' }]);
    expect(sorted).toEqual(ROWS);
  });

  test('does not mutate the input', () => {
    const input = [...ROWS];
    const sorted = sortRows(input, COLUMNS, [{ columnIndex: 0, direction: 'asc' }]);
    expect(input).toEqual(ROWS);
    expect(sorted).not.toBe(input);
  });
});
