/**
 * Shared --sort / --csv / --json / --save handling for table commands
 */

import { join } from 'path';
import { RenderModeError, ValidationError } from '../types/index.js';
import type { PortbankConfig } from '../config/index.js';
import { exportFileName, withExtension, type ExportFormat } from '../formatters/exportFile.js';
import { createRenderMode, type ExportTarget, type RenderMode } from '../pipeline/renderTable.js';

export interface TableOutputInput {
  sort?: string;
  /** true (flag without a value) means the console; a string names the file */
  csv?: string | boolean;
  json?: string | boolean;
  /** Write an auto-named export file in this format */
  save?: string;
}

export interface OutputContext {
  config: PortbankConfig;
  command: string;
  now?: Date;
}

const EXPORT_FORMATS: readonly ExportFormat[] = ['csv', 'json'];

function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some(format => format === value);
}

function toTarget(value: string | boolean | undefined, format: ExportFormat): ExportTarget | undefined {
  if (value === undefined || value === false) return undefined;
  if (value === true || value === '' || value === '-') return { kind: 'stdout' };
  return { kind: 'file', path: withExtension(value, format) };
}

/**
 * Turn command options into a RenderMode
 */
export function buildRenderMode(input: TableOutputInput, context: OutputContext): RenderMode {
  const targets: Partial<Record<ExportFormat, ExportTarget>> = {
    csv: toTarget(input.csv, 'csv'),
    json: toTarget(input.json, 'json'),
  };

  if (input.save !== undefined) {
    const format = input.save.trim().toLowerCase();
    if (!isExportFormat(format)) {
      throw new ValidationError(`--save must be one of: ${EXPORT_FORMATS.join(', ')} (got '${input.save}')`, 'save');
    }
    if (targets[format]) {
      throw new RenderModeError(`--${format} and --save ${format} both name a ${format.toUpperCase()} target`);
    }
    const fileName = exportFileName({
      format,
      command: context.command,
      profile: context.config.profile,
      now: context.now,
    });
    targets[format] = { kind: 'file', path: join(context.config.exportDir, fileName) };
  }

  return createRenderMode({ table: true, csv: targets.csv, json: targets.json });
}
