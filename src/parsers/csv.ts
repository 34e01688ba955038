/**
 * CSV Parser for port-list files
 *
 * Features:
 * - Reads a UTF-8, comma-delimited file with a header row
 * - Requires a 'port' column, accepts an optional 'slot' column
 * - Header matching is case-insensitive and whitespace-tolerant
 * - Combines bare boards with their slot ("3" + "01" -> 3.01, "1" + "B" -> 1B)
 * - Reports rows whose slot had to be assumed instead of failing them
 * - Handles quoted fields (via papaparse)
 */

import Papa from 'papaparse';
import { readFileSync } from 'fs';
import { PortSpecError } from '../types/index.js';
import type { CanonicalPort } from '../types/index.js';
import { isBareBoard, parsePortToken } from './port.js';

// ============================================================================
// Types
// ============================================================================

export interface CSVPortEntry {
  port: CanonicalPort;
  /** 1-based line in the file; the header is row 1 */
  row_number: number;
  /** True when the row named only a board and slot 1 was assumed */
  slot_assumed: boolean;
}

export interface CSVPortParseResult {
  entries: CSVPortEntry[];
  port_column: string;
  slot_column?: string;
}

const PORT_COLUMN = 'port';
const SLOT_COLUMN = 'slot';

const CSV_GRAMMAR = "header row with a 'port' column and optional 'slot' column";

// ============================================================================
// Main Functions
// ============================================================================

/**
 * Read and parse a port-list CSV file
 *
 * The file is read in one call and released before parsing starts.
 *
 * @throws PortSpecError FileNotFound when the path does not exist,
 *   InvalidCsvRow for a bad header or row
 */
export function readPortCSV(filePath: string): CSVPortParseResult {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new PortSpecError(`CSV file not found: ${filePath}`, 'FileNotFound', filePath, CSV_GRAMMAR);
    }
    throw error;
  }
  return parsePortCSV(content, filePath);
}

/**
 * Parse port-list CSV content
 *
 * @param content - CSV text
 * @param source - File name used in error messages
 *
 * @example
 * ```typescript
 * const result = parsePortCSV('port,slot\n1,A\n3,01\n', 'ports.csv');
 * // result.entries.map(e => e.port) -> [1A, 3.01]
 * ```
 */
export function parsePortCSV(content: string, source: string = 'CSV'): CSVPortParseResult {
  // Excel writes a byte-order mark
  const text = content.replace(/^\uFEFF/, '');

  if (text.trim().length === 0) {
    throw invalidRow(source, 1, 'file is empty or has no header row');
  }

  const parseResult = Papa.parse<string[]>(text, {
    header: false,
    delimiter: ',',
    skipEmptyLines: false,
  });

  if (parseResult.errors.length > 0) {
    const first = parseResult.errors[0];
    throw invalidRow(source, (first.row ?? 0) + 1, first.message);
  }

  const [header = [], ...records] = parseResult.data;
  const headers = header.map(name => name.trim().toLowerCase());
  const portIndex = headers.indexOf(PORT_COLUMN);
  const slotIndex = headers.indexOf(SLOT_COLUMN);

  if (portIndex < 0) {
    throw invalidRow(source, 1, `missing required '${PORT_COLUMN}' column`);
  }

  const entries: CSVPortEntry[] = [];

  records.forEach((record, i) => {
    const rowNumber = i + 2;
    if (record.every(cell => cell.trim() === '')) return;

    const portValue = (record[portIndex] ?? '').trim();
    const slotValue = slotIndex >= 0 ? (record[slotIndex] ?? '').trim() : '';

    entries.push(parseRow(source, rowNumber, portValue, slotValue));
  });

  if (entries.length === 0) {
    throw invalidRow(source, 1, 'file contains no port rows');
  }

  return {
    entries,
    port_column: header[portIndex].trim(),
    slot_column: slotIndex >= 0 ? header[slotIndex].trim() : undefined,
  };
}

// ============================================================================
// Row Helpers
// ============================================================================

function invalidRow(source: string, rowNumber: number, reason: string): PortSpecError {
  return new PortSpecError(
    `Invalid row ${rowNumber} in ${source}: ${reason}`,
    'InvalidCsvRow',
    source,
    CSV_GRAMMAR,
    rowNumber
  );
}

/**
 * Combine a board with a slot cell: letters keep letter form, digits become
 * decimal form, ".01" is appended as written.
 */
export function combinePortAndSlot(portValue: string, slotValue: string): string | null {
  const slot = slotValue.trim().toUpperCase();
  if (/^[A-Z]$/.test(slot)) return `${portValue}${slot}`;
  if (/^\d{1,2}$/.test(slot)) return `${portValue}.${slot.padStart(2, '0')}`;
  if (/^\.\d{2}$/.test(slot)) return `${portValue}${slot}`;
  return null;
}

function parseRow(source: string, rowNumber: number, portValue: string, slotValue: string): CSVPortEntry {
  if (!portValue) {
    throw invalidRow(source, rowNumber, `empty '${PORT_COLUMN}' value`);
  }

  let token = portValue;
  if (slotValue) {
    if (!isBareBoard(portValue)) {
      throw invalidRow(
        source,
        rowNumber,
        `port '${portValue}' already names a slot, so '${SLOT_COLUMN}' must be empty`
      );
    }
    const combined = combinePortAndSlot(portValue, slotValue);
    if (combined === null) {
      throw invalidRow(source, rowNumber, `unrecognized slot '${slotValue}'; expected a letter (A) or digits (01)`);
    }
    token = combined;
  }

  try {
    const parsed = parsePortToken(token);
    return { port: parsed.port, row_number: rowNumber, slot_assumed: parsed.slotAssumed };
  } catch (error) {
    if (error instanceof PortSpecError) {
      const shown = slotValue ? `port '${portValue}', slot '${slotValue}'` : `port '${portValue}'`;
      throw invalidRow(source, rowNumber, `cannot read ${shown}: ${error.message}`);
    }
    throw error;
  }
}
