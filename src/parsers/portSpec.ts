/**
 * Port Specification Resolver
 *
 * Expands an operator's port specification into an ordered, duplicate-free
 * PortSet.
 *
 * Supports:
 * - Single ports: "1A", "2.03", "7"
 * - Ranges on one board: "1A-1D", "2.01-2.04"
 * - Board ranges: "1-4" (slot 1 on each board)
 * - Lists of any of the above: "1A,3B-3D,5.01"
 * - Wildcards: "*", "all" (expanded from an injected inventory)
 * - CSV files: "ports.csv" (see parsers/csv.ts)
 */

import { PortSpecError } from '../types/index.js';
import type {
  CanonicalPort,
  PortInventory,
  ResolveOptions,
  ResolveResult,
  ResolveWarning,
  SpecToken,
} from '../types/index.js';
import {
  PORT_GRAMMAR,
  comparePorts,
  createPort,
  formatPort,
  isBareBoard,
  parsePortToken,
  portKey,
  surfaceForm,
} from './port.js';
import { readPortCSV } from './csv.js';

// ============================================================================
// Tokenizer
// ============================================================================

const WILDCARDS = ['*', 'all'];

/** Widest board range one fragment may expand to */
export const MAX_BOARD_RANGE = 1024;

const RANGE_GRAMMAR = '<port>-<port> on one board in one form (1A-1D, 2.01-2.04) or <board>-<board> (1-4)';

/**
 * Split a specification into typed fragments. Empty fragments are skipped.
 */
export function tokenizePortSpec(spec: string): SpecToken[] {
  const tokens: SpecToken[] = [];

  for (const raw of spec.split(',')) {
    const text = raw.trim();
    if (!text) continue;

    const lower = text.toLowerCase();
    if (WILDCARDS.includes(lower)) {
      tokens.push({ kind: 'wildcard', text });
    } else if (lower.endsWith('.csv')) {
      tokens.push({ kind: 'file', text, path: text });
    } else if (text.includes('-') && !text.startsWith('-') && !text.endsWith('-')) {
      const dash = text.indexOf('-');
      tokens.push({
        kind: 'range',
        text,
        start: text.slice(0, dash).trim(),
        end: text.slice(dash + 1).trim(),
      });
    } else {
      tokens.push({ kind: 'single', text });
    }
  }

  return tokens;
}

// ============================================================================
// Expansion
// ============================================================================

interface Expanded {
  port: CanonicalPort;
  slotAssumed: boolean;
}

function rangeError(token: string, reason: string): PortSpecError {
  return new PortSpecError(`Invalid range '${token}': ${reason}; expected ${RANGE_GRAMMAR}`, 'MalformedToken', token, RANGE_GRAMMAR);
}

function invertedRange(token: string): PortSpecError {
  return new PortSpecError(
    `Invalid range '${token}': end comes before start; write the lower port first`,
    'InvertedRange',
    token,
    RANGE_GRAMMAR
  );
}

/**
 * Expand "A-B" inclusively, in ascending (board, slot) order
 */
export function expandRange(token: Extract<SpecToken, { kind: 'range' }>): Expanded[] {
  const { start, end, text } = token;

  if (isBareBoard(start) && isBareBoard(end)) {
    const first = parsePortToken(start).port;
    const last = parsePortToken(end).port;
    if (comparePorts(last, first) < 0) throw invertedRange(text);
    const span = last.board - first.board + 1;
    if (span > MAX_BOARD_RANGE) {
      throw rangeError(text, `spans ${span} boards; at most ${MAX_BOARD_RANGE} are allowed`);
    }

    const expanded: Expanded[] = [];
    for (let board = first.board; board <= last.board; board++) {
      expanded.push({ port: createPort(board, 1, 'letter'), slotAssumed: true });
    }
    return expanded;
  }

  const startForm = surfaceForm(start);
  const endForm = surfaceForm(end);
  if (startForm === null || endForm === null) {
    // Garbage on either end reports its own MalformedToken
    parsePortToken(startForm === null ? start : end);
    throw rangeError(text, 'a board cannot be paired with a full port');
  }
  if (startForm !== endForm) {
    throw rangeError(text, 'both ends must use the same form');
  }

  const first = parsePortToken(start).port;
  const last = parsePortToken(end).port;
  if (first.board !== last.board) {
    throw rangeError(text, 'both ends must be on the same board');
  }
  if (comparePorts(last, first) < 0) throw invertedRange(text);

  const expanded: Expanded[] = [];
  for (let slot = first.slot; slot <= last.slot; slot++) {
    expanded.push({ port: createPort(first.board, slot, startForm), slotAssumed: false });
  }
  return expanded;
}

function expandWildcard(text: string, inventory: PortInventory | undefined): Expanded[] {
  if (inventory === undefined) {
    throw new PortSpecError(
      `Cannot expand '${text}': no device inventory is configured`,
      'UnresolvedWildcard',
      text,
      'an explicit port list, or a configured inventory for * / all'
    );
  }
  const ports = typeof inventory === 'function' ? inventory() : inventory;
  return ports.map(port => ({ port, slotAssumed: false }));
}

function expandToken(token: SpecToken, options: ResolveOptions): Expanded[] {
  switch (token.kind) {
    case 'single': {
      const parsed = parsePortToken(token.text);
      return [{ port: parsed.port, slotAssumed: parsed.slotAssumed }];
    }
    case 'range':
      return expandRange(token);
    case 'wildcard':
      return expandWildcard(token.text, options.inventory);
    case 'file':
      return readPortCSV(token.path).entries.map(entry => ({
        port: entry.port,
        slotAssumed: entry.slot_assumed,
      }));
  }
}

// ============================================================================
// Resolver
// ============================================================================

/**
 * Resolve a port specification into a PortSet
 *
 * Duplicates (including overlaps between ranges) keep their first position.
 * Ports whose slot had to be assumed are reported in one aggregated warning.
 *
 * @throws PortSpecError for any fragment that cannot be understood
 *
 * @example
 * ```typescript
 * const { ports, warnings } = resolvePortSpec('1A,3,5.02');
 * // ports -> [1A, 3A, 5.02]; warnings -> [{ kind: 'DefaultSlotAssumed', ... }]
 * ```
 */
export function resolvePortSpec(spec: string, options: ResolveOptions = {}): ResolveResult {
  const tokens = tokenizePortSpec(spec);
  if (tokens.length === 0) {
    throw new PortSpecError('Empty port specification', 'MalformedToken', spec, PORT_GRAMMAR);
  }

  const seen = new Set<string>();
  const ports: CanonicalPort[] = [];
  const assumed: CanonicalPort[] = [];

  for (const token of tokens) {
    for (const { port, slotAssumed } of expandToken(token, options)) {
      const key = portKey(port);
      if (seen.has(key)) continue;
      seen.add(key);
      ports.push(port);
      if (slotAssumed) assumed.push(port);
    }
  }

  if (ports.length === 0) {
    throw new PortSpecError(`No ports found in '${spec}'`, 'MalformedToken', spec, PORT_GRAMMAR);
  }

  const warnings: ResolveWarning[] = [];
  if (assumed.length > 0) {
    const noun = assumed.length === 1 ? 'port' : 'ports';
    warnings.push({
      kind: 'DefaultSlotAssumed',
      message: `No slot given for ${assumed.length} ${noun}; assumed slot 1: ${assumed.map(port => formatPort(port)).join(', ')}`,
      ports: assumed,
    });
  }

  return { ports, warnings };
}
