/**
 * Stable multi-key row sort
 */

import type { ColumnHint, ColumnSpec, Row, SortKey } from '../types/index.js';
import { classifyColumn, coerceCell, compareSortable, type SortableValue } from './coerce.js';

interface Decorated {
  row: Row;
  position: number;
  keys: SortableValue[];
}

/**
 * Sort rows by a SortKey without mutating the input.
 *
 * Ties fall through to the next term; rows equal on every term keep their
 * input order. Terms naming a column that does not exist are skipped. A
 * column without a hint is classified once from its cells, so an unreadable
 * cell in a timestamp column sorts as missing.
 */
export function sortRows(rows: readonly Row[], columns: readonly ColumnSpec[], sortKey: SortKey): Row[] {
  const byIndex = new Map<number, ColumnSpec>(columns.map(column => [column.index, column]));
  const terms = sortKey.filter(term => byIndex.has(term.columnIndex));

  if (terms.length === 0) return [...rows];

  const hints = new Map<number, ColumnHint | undefined>();
  for (const term of terms) {
    const column = byIndex.get(term.columnIndex);
    if (!column || hints.has(column.index)) continue;
    const kind = classifyColumn(column, rows);
    hints.set(column.index, kind === 'generic' && !column.hint ? undefined : kind);
  }

  const decorated: Decorated[] = rows.map((row, position) => ({
    row,
    position,
    keys: terms.map(term => coerceCell(row[term.columnIndex], hints.get(term.columnIndex))),
  }));

  decorated.sort((a, b) => {
    for (let i = 0; i < terms.length; i++) {
      const order = compareSortable(a.keys[i], b.keys[i], terms[i].direction);
      if (order !== 0) return order;
    }
    return a.position - b.position;
  });

  return decorated.map(item => item.row);
}
