/**
 * Type definitions for portbank
 *
 * Port identifiers, port specifications, result rows and sort keys shared by
 * the parsers, formatters and the table pipeline.
 */

// ============================================================================
// Port Identifiers
// ============================================================================

/** Surface syntax a port was written in: `1A` (letter) or `1.01` (decimal) */
export type PortForm = 'letter' | 'decimal';

/**
 * Canonical port identifier.
 *
 * Equality and ordering use only `board` and `slot`; `form` is kept so a port
 * is displayed the way the operator wrote it.
 */
export interface CanonicalPort {
  readonly board: number;
  readonly slot: number;
  readonly form: PortForm;
}

/** Ordered, duplicate-free ports in first-occurrence order */
export type PortSet = readonly CanonicalPort[];

/** Full device inventory used to expand `*` / `all` */
export type PortInventory = readonly CanonicalPort[] | (() => readonly CanonicalPort[]);

// ============================================================================
// Specification Tokens
// ============================================================================

export type SpecToken =
  | { kind: 'single'; text: string }
  | { kind: 'range'; text: string; start: string; end: string }
  | { kind: 'wildcard'; text: string }
  | { kind: 'file'; text: string; path: string };

export interface DefaultSlotAssumedWarning {
  kind: 'DefaultSlotAssumed';
  message: string;
  ports: CanonicalPort[];
}

export type ResolveWarning = DefaultSlotAssumedWarning;

export interface ResolveOptions {
  inventory?: PortInventory;
}

export interface ResolveResult {
  ports: PortSet;
  warnings: ResolveWarning[];
}

// ============================================================================
// Result Rows & Sorting
// ============================================================================

export type Cell = string | number | Date | null;

export type Row = readonly Cell[];

export type ColumnHint = 'timestamp' | 'port' | 'generic';

export interface ColumnSpec {
  name: string;
  index: number;
  hint?: ColumnHint;
}

export type SortDirection = 'asc' | 'desc';

export interface SortTerm {
  columnIndex: number;
  direction: SortDirection;
}

export type SortKey = readonly SortTerm[];

export interface Diagnostic {
  kind: 'BadDirectiveToken' | 'ExportFailed';
  message: string;
  token?: string;
}

// ============================================================================
// Error Types
// ============================================================================

export type PortSpecErrorKind =
  | 'MalformedToken'
  | 'InvertedRange'
  | 'InvalidCsvRow'
  | 'UnresolvedWildcard'
  | 'FileNotFound';

export class PortSpecError extends Error {
  constructor(
    message: string,
    public kind: PortSpecErrorKind,
    public token: string,
    public expected?: string,
    public rowNumber?: number
  ) {
    super(message);
    this.name = 'PortSpecError';
  }
}

export class ValidationError extends Error {
  constructor(
    message: string,
    public field?: string
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class RenderModeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RenderModeError';
  }
}
