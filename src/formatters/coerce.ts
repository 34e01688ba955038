/**
 * Column Value Coercion
 *
 * Classifies raw cells into comparable values for sorting:
 * port -> timestamp -> numeric -> text, with null/empty cells as 'missing'.
 * Missing values (and cells of a timestamp column that cannot be read) always
 * sort last, whatever the direction.
 */

import type { CanonicalPort, Cell, ColumnHint, ColumnSpec, Row, SortDirection } from '../types/index.js';
import { comparePorts, tryCanonicalize } from '../parsers/port.js';

// ============================================================================
// Types
// ============================================================================

export type SortableValue =
  | { kind: 'port'; port: CanonicalPort }
  | { kind: 'timestamp'; time: number }
  | { kind: 'numeric'; value: number }
  | { kind: 'text'; value: string }
  | { kind: 'missing' };

export type SortableKind = SortableValue['kind'];

/** Rank of each kind when a column mixes them; direction never changes it */
const KIND_RANK: Record<Exclude<SortableKind, 'missing'>, number> = {
  port: 0,
  timestamp: 1,
  numeric: 2,
  text: 3,
};

// Epoch seconds between 2001-09-09 and 2286-11-20
const MIN_EPOCH_SECONDS = 1_000_000_000;
const MAX_EPOCH_SECONDS = 10_000_000_000;

const ISO_DATETIME =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?)?(Z|[+-]\d{2}:?\d{2})?$/i;
const SLASH_DATETIME = /^(\d{4})\/(\d{2})\/(\d{2})(?: (\d{2}):(\d{2})(?::(\d{2}))?)?$/;
const MONTH_DAY_TIME = /^(\d{2})-(\d{2}) (\d{2}):(\d{2})$/;
const NUMERIC = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;

// ============================================================================
// Timestamp Parsing
// ============================================================================

function utc(
  year: number,
  month: number,
  day: number,
  hour: number = 0,
  minute: number = 0,
  second: number = 0,
  millis: number = 0
): number | null {
  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) return null;
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second, millis));
  // Date.UTC rolls 02-30 over into March
  if (date.getUTCFullYear() !== year || date.getUTCDate() !== day) return null;
  return date.getTime();
}

function zoneOffsetMinutes(zone: string | undefined): number {
  if (!zone || zone.toUpperCase() === 'Z') return 0;
  const sign = zone.startsWith('-') ? -1 : 1;
  const digits = zone.slice(1).replace(':', '');
  return sign * (Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2, 4)));
}

function fromEpochSeconds(seconds: number): number | null {
  if (!Number.isInteger(seconds) || seconds < MIN_EPOCH_SECONDS || seconds >= MAX_EPOCH_SECONDS) {
    return null;
  }
  return seconds * 1000;
}

/**
 * Parse a timestamp cell into epoch milliseconds
 *
 * Accepts Date objects, epoch seconds, ISO-8601 and common date-time patterns.
 * Times without a zone are read as UTC.
 */
export function parseTimestamp(raw: Cell | undefined): number | null {
  if (raw === null || raw === undefined) return null;
  if (raw instanceof Date) {
    const time = raw.getTime();
    return Number.isNaN(time) ? null : time;
  }
  if (typeof raw === 'number') return fromEpochSeconds(raw);

  const text = raw.trim();
  if (!text) return null;
  if (/^\d+$/.test(text)) return fromEpochSeconds(Number(text));

  const iso = ISO_DATETIME.exec(text);
  if (iso) {
    const [, y, mo, d, h, mi, s, fraction, zone] = iso;
    const millis = fraction ? Number(fraction.slice(0, 3).padEnd(3, '0')) : 0;
    const time = utc(Number(y), Number(mo), Number(d), Number(h ?? 0), Number(mi ?? 0), Number(s ?? 0), millis);
    return time === null ? null : time - zoneOffsetMinutes(zone) * 60_000;
  }

  const slash = SLASH_DATETIME.exec(text);
  if (slash) {
    const [, y, mo, d, h, mi, s] = slash;
    return utc(Number(y), Number(mo), Number(d), Number(h ?? 0), Number(mi ?? 0), Number(s ?? 0));
  }

  const monthDay = MONTH_DAY_TIME.exec(text);
  if (monthDay) {
    const [, mo, d, h, mi] = monthDay;
    return utc(1900, Number(mo), Number(d), Number(h), Number(mi));
  }

  return null;
}

// ============================================================================
// Coercion
// ============================================================================

function isMissing(raw: Cell | undefined): boolean {
  if (raw === null || raw === undefined) return true;
  if (typeof raw === 'number') return Number.isNaN(raw);
  if (typeof raw === 'string') return raw.trim() === '';
  return false;
}

function cellText(raw: Cell): string {
  return raw instanceof Date ? raw.toISOString() : String(raw);
}

/**
 * First port named by a cell: "1A-1D" -> 1A, "5D,1B" -> 5D, "7" -> 7A
 */
export function portFromCell(raw: Cell | undefined): CanonicalPort | null {
  if (raw === null || raw === undefined || raw instanceof Date) return null;
  const first = String(raw).split(',')[0].trim();
  const dash = first.indexOf('-');
  const head = dash > 0 ? first.slice(0, dash) : first;
  return tryCanonicalize(head, true);
}

function genericValue(raw: Exclude<Cell, null>): SortableValue {
  if (typeof raw === 'number') return { kind: 'numeric', value: raw };
  if (raw instanceof Date) return { kind: 'numeric', value: raw.getTime() };
  const text = raw.trim();
  if (NUMERIC.test(text)) {
    const value = Number(text);
    if (Number.isFinite(value)) return { kind: 'numeric', value };
  }
  return { kind: 'text', value: text.toLowerCase() };
}

/**
 * Coerce a raw cell into a sortable value
 *
 * @param raw - Cell as produced by the operation layer
 * @param hint - Column hint; skips auto-classification
 */
export function coerceCell(raw: Cell | undefined, hint?: ColumnHint): SortableValue {
  if (raw === undefined || raw === null || isMissing(raw)) return { kind: 'missing' };

  switch (hint) {
    case 'timestamp': {
      const time = parseTimestamp(raw);
      return time === null ? { kind: 'missing' } : { kind: 'timestamp', time };
    }
    case 'port': {
      const port = portFromCell(raw);
      return port ? { kind: 'port', port } : { kind: 'text', value: cellText(raw).trim().toLowerCase() };
    }
    case 'generic':
      return genericValue(raw);
  }

  if (typeof raw === 'string') {
    const port = tryCanonicalize(raw);
    if (port) return { kind: 'port', port };
  }

  const time = parseTimestamp(raw);
  if (time !== null) return { kind: 'timestamp', time };

  return genericValue(raw);
}

// ============================================================================
// Comparison
// ============================================================================

function compareNumbers(a: number, b: number): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function compareSameKind(
  a: Exclude<SortableValue, { kind: 'missing' }>,
  b: Exclude<SortableValue, { kind: 'missing' }>
): number {
  switch (a.kind) {
    case 'port':
      return b.kind === 'port' ? comparePorts(a.port, b.port) : 0;
    case 'timestamp':
      return b.kind === 'timestamp' ? compareNumbers(a.time, b.time) : 0;
    case 'numeric':
      return b.kind === 'numeric' ? compareNumbers(a.value, b.value) : 0;
    case 'text':
      return b.kind === 'text' ? (a.value < b.value ? -1 : a.value > b.value ? 1 : 0) : 0;
  }
}

/**
 * Compare two sortable values in the given direction.
 *
 * Direction only orders values of the same kind. Kinds keep their rank
 * (port, timestamp, numeric, text, then missing) in both directions.
 */
export function compareSortable(a: SortableValue, b: SortableValue, direction: SortDirection = 'asc'): number {
  if (a.kind === 'missing' || b.kind === 'missing') {
    if (a.kind === b.kind) return 0;
    return a.kind === 'missing' ? 1 : -1;
  }
  if (a.kind !== b.kind) return compareNumbers(KIND_RANK[a.kind], KIND_RANK[b.kind]);

  const order = compareSameKind(a, b);
  if (order === 0) return 0;
  return direction === 'desc' ? -order : order;
}

// ============================================================================
// Column Classification
// ============================================================================

/**
 * Classify a column for sorting and for the default sort policy.
 *
 * A column without a hint counts as port or timestamp when that is the only
 * recognised kind in it and its readable cells outnumber the unreadable ones
 * (text or plain numbers). Mixing ports and timestamps makes it generic.
 */
export function classifyColumn(column: ColumnSpec, rows: readonly Row[] = []): ColumnHint {
  if (column.hint) return column.hint;

  let kind: 'port' | 'timestamp' | null = null;
  let readable = 0;
  let unreadable = 0;

  for (const row of rows) {
    const value = coerceCell(row[column.index]);
    switch (value.kind) {
      case 'missing':
        continue;
      case 'port':
      case 'timestamp':
        if (kind !== null && kind !== value.kind) return 'generic';
        kind = value.kind;
        readable++;
        break;
      default:
        unreadable++;
    }
  }

  return kind !== null && readable > unreadable ? kind : 'generic';
}
