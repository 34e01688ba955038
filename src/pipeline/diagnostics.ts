/**
 * Human-readable messages: warnings, diagnostics, confirmations and errors.
 *
 * Everything here is for people, never for machine-readable output streams.
 */

import chalk from 'chalk';
import { PortSpecError } from '../types/index.js';
import type { Diagnostic, ResolveWarning } from '../types/index.js';

/** Turn colour on or off for every message formatter */
export function setColorEnabled(enabled: boolean): void {
  chalk.level = enabled ? (chalk.level === 0 ? 1 : chalk.level) : 0;
}

export function formatWarning(warning: ResolveWarning): string {
  return chalk.yellow(`Warning: ${warning.message}`);
}

/** Non-fatal diagnostics are dimmed */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  return chalk.dim(diagnostic.message);
}

export function formatConfirmation(format: 'csv' | 'json', path: string): string {
  return chalk.green(`✓ ${format.toUpperCase()} export written to: ${path}`);
}

/**
 * Format a fatal error for stderr. Port specification errors also show the
 * grammar that was expected.
 */
export function formatError(error: unknown): string {
  const prefix = chalk.red('Error: ');

  if (error instanceof PortSpecError) {
    const lines = [`${prefix}${error.message}`];
    if (error.kind === 'InvalidCsvRow' && error.expected) {
      lines.push(chalk.dim(`Expected: ${error.expected}`));
    }
    return lines.join('\n');
  }

  if (error instanceof Error) {
    return `${prefix}${error.message}`;
  }

  return `${prefix}${String(error)}`;
}
