import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import chalk from 'chalk';
import { formatConfirmation, formatDiagnostic, formatError, formatWarning, setColorEnabled } from './diagnostics.js';
import { PortSpecError, ValidationError } from '../types/index.js';

describe('diagnostics', () => {
  beforeAll(() => {
    setColorEnabled(false);
  });

  afterAll(() => {
    setColorEnabled(true);
  });

  it('should prefix warnings', () => {
    expect(formatWarning({ kind: 'DefaultSlotAssumed', message: 'No slot given', ports: [] })).toBe(
      'Warning: No slot given'
    );
  });

  it('should print diagnostics as their message', () => {
    expect(formatDiagnostic({ kind: 'ExportFailed', message: 'Failed to write' })).toBe('Failed to write');
  });

  it('should name the export file in confirmations', () => {
    expect(formatConfirmation('json', 'out/a.json')).toBe('✓ JSON export written to: out/a.json');
  });

  it('should show the expected grammar for CSV row errors', () => {
    const error = new PortSpecError('Invalid row 3 in a.csv: bad', 'InvalidCsvRow', 'a.csv', "a 'port' column", 3);
    expect(formatError(error)).toBe("Error: Invalid row 3 in a.csv: bad\nExpected: a 'port' column");
  });

  it('should print other errors on one line', () => {
    expect(formatError(new PortSpecError('Unrecognized port', 'MalformedToken', 'x', '1A'))).toBe(
      'Error: Unrecognized port'
    );
    expect(formatError(new ValidationError('A results file is required'))).toBe('Error: A results file is required');
    expect(formatError('boom')).toBe('Error: boom');
  });

  it('should colour output when enabled', () => {
    setColorEnabled(true);
    expect(chalk.level).toBeGreaterThan(0);
    expect(formatWarning({ kind: 'DefaultSlotAssumed', message: 'x', ports: [] })).toBe(chalk.yellow('Warning: x'));
    setColorEnabled(false);
    expect(chalk.level).toBe(0);
  });
});
