/**
 * Unit tests for the port-list CSV parser
 */

import { describe, test, expect, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { combinePortAndSlot, parsePortCSV, readPortCSV } from './csv.js';
import { formatPort } from './port.js';
import { PortSpecError } from '../types/index.js';

// ============================================================================
// Test Helpers
// ============================================================================

const TEST_DIR = mkdtempSync(join(tmpdir(), 'portbank-csv-'));

function createTestFile(filename: string, content: string): string {
  const filePath = join(TEST_DIR, filename);
  writeFileSync(filePath, content, 'utf-8');
  return filePath;
}

function portsOf(content: string): string[] {
  return parsePortCSV(content).entries.map(entry => formatPort(entry.port));
}

function csvError(content: string): PortSpecError {
  try {
    parsePortCSV(content, 'ports.csv');
  } catch (error) {
    if (error instanceof PortSpecError) return error;
    throw error;
  }
  throw new Error('expected parsePortCSV to fail');
}

afterAll(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

// ============================================================================
// Port Column
// ============================================================================

describe('parsePortCSV - port column', () => {
  test('reads full port tokens', () => {
    expect(portsOf('port\n1A\n2.03\n4d\n')).toEqual(['1A', '2.03', '4D']);
  });

  test('matches the header case-insensitively', () => {
    const result = parsePortCSV(' Port ,Name\n1A,uplink\n');
    expect(result.port_column).toBe('Port');
    expect(result.slot_column).toBeUndefined();
    expect(result.entries.map(entry => formatPort(entry.port))).toEqual(['1A']);
  });

  test('ignores extra columns in any position', () => {
    expect(portsOf('name,port,notes\nuplink,3B,x\ncore,5.01,y\n')).toEqual(['3B', '5.01']);
  });

  test('numbers rows from the header', () => {
    const result = parsePortCSV('port\n1A\n\n2B\n');
    expect(result.entries.map(entry => entry.row_number)).toEqual([2, 4]);
  });

  test('flags bare boards as slot-assumed', () => {
    const result = parsePortCSV('port\n3\n3B\n');
    expect(result.entries.map(entry => entry.slot_assumed)).toEqual([true, false]);
    expect(formatPort(result.entries[0].port)).toBe('3A');
  });

  test('strips a byte-order mark', () => {
    expect(portsOf('\uFEFFport\n1A\n')).toEqual(['1A']);
  });

  test('handles CRLF line endings and quoted fields', () => {
    expect(portsOf('port,name\r\n"1A","uplink, core"\r\n2B,edge\r\n')).toEqual(['1A', '2B']);
  });
});

// ============================================================================
// Slot Column
// ============================================================================

describe('parsePortCSV - slot column', () => {
  test('combines boards with letter and digit slots', () => {
    const result = parsePortCSV('port,slot\n1,A\n3,01\n5,2\n6,.04\n');
    expect(result.slot_column).toBe('slot');
    expect(result.entries.map(entry => formatPort(entry.port))).toEqual(['1A', '3.01', '5.02', '6.04']);
    expect(result.entries.every(entry => !entry.slot_assumed)).toBe(true);
  });

  test('treats an empty slot as missing', () => {
    const result = parsePortCSV('port,slot\n7,\n');
    expect(result.entries[0].slot_assumed).toBe(true);
  });

  test('rejects a slot alongside a full port', () => {
    const error = csvError('port,slot\n1A,B\n');
    expect(error.kind).toBe('InvalidCsvRow');
    expect(error.rowNumber).toBe(2);
    expect(error.message).toBe("Invalid row 2 in ports.csv: port '1A' already names a slot, so 'slot' must be empty");
  });

  test('rejects an unreadable slot', () => {
    const error = csvError('port,slot\n1,A\n2,xyz\n');
    expect(error.rowNumber).toBe(3);
    expect(error.message).toBe(
      "Invalid row 3 in ports.csv: unrecognized slot 'xyz'; expected a letter (A) or digits (01)"
    );
  });
});

describe('combinePortAndSlot', () => {
  test('builds tokens from slot cells', () => {
    expect(combinePortAndSlot('2', 'c')).toBe('2C');
    expect(combinePortAndSlot('2', '7')).toBe('2.07');
    expect(combinePortAndSlot('2', '12')).toBe('2.12');
    expect(combinePortAndSlot('2', '.03')).toBe('2.03');
    expect(combinePortAndSlot('2', '123')).toBeNull();
  });
});

// ============================================================================
// Errors
// ============================================================================

describe('parsePortCSV - errors', () => {
  test('rejects an empty file', () => {
    const error = csvError('');
    expect(error.kind).toBe('InvalidCsvRow');
    expect(error.rowNumber).toBe(1);
  });

  test('rejects a file without a port column', () => {
    const error = csvError('name,slot\nuplink,A\n');
    expect(error.rowNumber).toBe(1);
    expect(error.message).toBe("Invalid row 1 in ports.csv: missing required 'port' column");
  });

  test('rejects a header with no data rows', () => {
    const error = csvError('port\n\n');
    expect(error.rowNumber).toBe(1);
    expect(error.message).toBe('Invalid row 1 in ports.csv: file contains no port rows');
  });

  test('rejects an empty port cell', () => {
    const error = csvError('port,name\n,uplink\n');
    expect(error.rowNumber).toBe(2);
    expect(error.message).toBe("Invalid row 2 in ports.csv: empty 'port' value");
  });

  test('rejects a malformed port with the row number', () => {
    const error = csvError('port\n1A\n2B\n2.2\n');
    expect(error.kind).toBe('InvalidCsvRow');
    expect(error.rowNumber).toBe(4);
    expect(error.token).toBe('ports.csv');
    expect(error.message).toMatch(/^Invalid row 4 in ports\.csv: cannot read port '2\.2': Ambiguous slot/);
  });
});

// ============================================================================
// Files
// ============================================================================

describe('readPortCSV', () => {
  test('reads a file from disk', () => {
    const file = createTestFile('uplinks.csv', 'port\n1A\n1B\n');
    expect(readPortCSV(file).entries.map(entry => formatPort(entry.port))).toEqual(['1A', '1B']);
  });

  test('reports a missing file as FileNotFound', () => {
    const file = join(TEST_DIR, 'nope.csv');
    expect(() => readPortCSV(file)).toThrow(`CSV file not found: ${file}`);
    try {
      readPortCSV(file);
    } catch (error) {
      expect(error instanceof PortSpecError && error.kind).toBe('FileNotFound');
    }
  });
});
