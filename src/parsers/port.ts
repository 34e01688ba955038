/**
 * Port Identifier Parser
 *
 * Converts the surface syntaxes operators use for a port into a CanonicalPort:
 * - Letter form: "1A", "2d", "32C" (A=1, B=2, ...)
 * - Decimal form: "1.01", "2.04" (slot always written with two digits)
 * - Bare board: "3" (slot 1 assumed; caller is told via slotAssumed)
 *
 * Also provides the comparator used for range expansion and row sorting, and
 * conversions between the two written forms.
 */

import { PortSpecError } from '../types/index.js';
import type { CanonicalPort, PortForm } from '../types/index.js';

// ============================================================================
// Grammar
// ============================================================================

const LETTER_FORM = /^(\d+)([A-Z])$/;
const DECIMAL_FORM = /^(\d+)\.(\d+)$/;
const BARE_BOARD = /^\d+$/;

const LETTER_COUNT = 26;
const FIRST_LETTER = 'A'.charCodeAt(0);

/** Human-readable grammar quoted in parse errors */
export const PORT_GRAMMAR = '<board><letter> (1A), <board>.<2-digit slot> (1.01) or <board> (1)';

export interface ParsedPortToken {
  port: CanonicalPort;
  /** True when the token was a bare board and slot 1 was assumed */
  slotAssumed: boolean;
}

// ============================================================================
// Construction
// ============================================================================

/**
 * Build a frozen CanonicalPort, rejecting non-positive components
 */
export function createPort(board: number, slot: number, form: PortForm = 'letter'): CanonicalPort {
  if (!Number.isSafeInteger(board) || board < 1 || !Number.isSafeInteger(slot) || slot < 1) {
    throw new PortSpecError(
      `Invalid port: board and slot must be positive integers (got board ${board}, slot ${slot})`,
      'MalformedToken',
      `${board}/${slot}`,
      PORT_GRAMMAR
    );
  }
  return Object.freeze({ board, slot, form });
}

function malformed(token: string, detail?: string): PortSpecError {
  const reason = detail ?? `Unrecognized port '${token}'`;
  return new PortSpecError(`${reason}; expected ${PORT_GRAMMAR}`, 'MalformedToken', token, PORT_GRAMMAR);
}

/**
 * Parse one port token, reporting whether the slot was assumed
 *
 * @throws PortSpecError (MalformedToken) for anything outside the three grammars
 */
export function parsePortToken(token: string): ParsedPortToken {
  const text = token.trim().toUpperCase();

  const letter = LETTER_FORM.exec(text);
  if (letter) {
    const board = Number(letter[1]);
    if (board < 1 || !Number.isSafeInteger(board)) {
      throw malformed(token, `Board must be a positive integer in '${token}'`);
    }
    const slot = letter[2].charCodeAt(0) - FIRST_LETTER + 1;
    return { port: createPort(board, slot, 'letter'), slotAssumed: false };
  }

  const decimal = DECIMAL_FORM.exec(text);
  if (decimal) {
    const [, boardDigits, slotDigits] = decimal;
    if (slotDigits.length !== 2) {
      // "2.2" could mean slot 2 or slot 20
      throw malformed(token, `Ambiguous slot in '${token}': decimal slots need exactly two digits`);
    }
    const board = Number(boardDigits);
    const slot = Number(slotDigits);
    if (board < 1 || !Number.isSafeInteger(board) || slot < 1) {
      throw malformed(token, `Board and slot must be positive integers in '${token}'`);
    }
    return { port: createPort(board, slot, 'decimal'), slotAssumed: false };
  }

  if (BARE_BOARD.test(text)) {
    const board = Number(text);
    if (board < 1 || !Number.isSafeInteger(board)) {
      throw malformed(token, `Board must be a positive integer in '${token}'`);
    }
    return { port: createPort(board, 1, 'letter'), slotAssumed: true };
  }

  throw malformed(token);
}

/**
 * Canonicalize a single port token
 *
 * @example
 * ```typescript
 * canonicalize('2d');   // { board: 2, slot: 4, form: 'letter' }
 * canonicalize('2.04'); // { board: 2, slot: 4, form: 'decimal' }
 * canonicalize('2.2');  // throws PortSpecError (MalformedToken)
 * ```
 */
export function canonicalize(token: string): CanonicalPort {
  return parsePortToken(token).port;
}

/**
 * Parse a token without throwing. Bare boards are only accepted when asked
 * for, since a lone integer is usually just a number.
 */
export function tryCanonicalize(token: string, allowBareBoard: boolean = false): CanonicalPort | null {
  try {
    const parsed = parsePortToken(token);
    if (parsed.slotAssumed && !allowBareBoard) return null;
    return parsed.port;
  } catch (error) {
    if (error instanceof PortSpecError) return null;
    throw error;
  }
}

/** True for bare-board tokens such as "7" */
export function isBareBoard(token: string): boolean {
  return BARE_BOARD.test(token.trim());
}

/** Written form a token uses, or null for bare boards and garbage */
export function surfaceForm(token: string): PortForm | null {
  const text = token.trim().toUpperCase();
  if (LETTER_FORM.test(text)) return 'letter';
  if (DECIMAL_FORM.test(text)) return 'decimal';
  return null;
}

// ============================================================================
// Comparison
// ============================================================================

/**
 * Total order on (board, slot), both numeric
 */
export function comparePorts(a: CanonicalPort, b: CanonicalPort): -1 | 0 | 1 {
  if (a.board !== b.board) return a.board < b.board ? -1 : 1;
  if (a.slot !== b.slot) return a.slot < b.slot ? -1 : 1;
  return 0;
}

export function portsEqual(a: CanonicalPort, b: CanonicalPort): boolean {
  return comparePorts(a, b) === 0;
}

/** Dedup key; ignores the written form */
export function portKey(port: CanonicalPort): string {
  return `${port.board}:${port.slot}`;
}

// ============================================================================
// Formatting & Conversion
// ============================================================================

/**
 * Render a port in the requested form (defaults to the form it was written in).
 * Slots past Z always render in decimal form.
 */
export function formatPort(port: CanonicalPort, form: PortForm = port.form): string {
  if (form === 'letter' && port.slot <= LETTER_COUNT) {
    return `${port.board}${String.fromCharCode(FIRST_LETTER + port.slot - 1)}`;
  }
  return `${port.board}.${String(port.slot).padStart(2, '0')}`;
}

/**
 * Convert a token to letter form: "1.02" -> "1B", "1a" -> "1A"
 */
export function toLetterForm(token: string): string {
  const port = canonicalize(token);
  if (port.slot > LETTER_COUNT) {
    throw malformed(token, `Slot ${port.slot} in '${token}' has no letter form`);
  }
  return formatPort(port, 'letter');
}

/**
 * Convert a token to decimal form: "4D" -> "4.04"
 */
export function toDecimalForm(token: string): string {
  return formatPort(canonicalize(token), 'decimal');
}

/**
 * Join ports into the comma-separated list the device API accepts
 */
export function formatPortsForApi(
  ports: ReadonlyArray<CanonicalPort | string>,
  form: PortForm = 'letter'
): string {
  return ports
    .map(port => (typeof port === 'string' ? canonicalize(port) : port))
    .map(port => formatPort(port, form))
    .join(',');
}
