/**
 * resolve_ports Command Handler
 *
 * Resolves a port specification and shows the resulting port set as a table
 * (or CSV/JSON), with any default-slot warning as a summary line.
 */

import { ValidationError } from '../types/index.js';
import type { ColumnSpec, PortSet, ResolveWarning, Row } from '../types/index.js';
import { inventoryFromConfig } from '../config/index.js';
import { formatPort } from '../parsers/port.js';
import { resolvePortSpec } from '../parsers/portSpec.js';
import { formatWarning } from '../pipeline/diagnostics.js';
import { renderTable, type RenderResult } from '../pipeline/renderTable.js';
import { buildRenderMode, type TableOutputInput } from './output_options.js';
import type { ToolContext } from './context.js';

export interface ResolvePortsInput extends TableOutputInput {
  spec: string;
}

export interface ResolvePortsOutput {
  ports: PortSet;
  warnings: ResolveWarning[];
  render: RenderResult;
}

/** '#' is the position in the resolved set (first-occurrence order) */
export const PORT_COLUMNS: readonly ColumnSpec[] = [
  { name: '#', index: 0, hint: 'generic' },
  { name: 'Port', index: 1, hint: 'port' },
  { name: 'Board', index: 2, hint: 'generic' },
  { name: 'Slot', index: 3, hint: 'generic' },
];

export function portRows(ports: PortSet): Row[] {
  return ports.map((port, i) => [i + 1, formatPort(port), port.board, port.slot]);
}

/**
 * Handle the `ports` command
 *
 * @throws PortSpecError when the specification cannot be resolved
 */
export function handleResolvePorts(input: ResolvePortsInput, context: ToolContext): ResolvePortsOutput {
  if (!input || typeof input.spec !== 'string' || input.spec.trim() === '') {
    throw new ValidationError('A port specification is required, e.g. "1A-1D,3.01"', 'spec');
  }

  // A spec that does not resolve prints nothing but the error
  const { ports, warnings } = resolvePortSpec(input.spec, {
    inventory: inventoryFromConfig(context.config),
  });

  const mode = buildRenderMode(input, { config: context.config, command: 'ports', now: context.now });
  const noun = ports.length === 1 ? 'port' : 'ports';

  const render = renderTable(
    {
      columns: PORT_COLUMNS,
      rows: portRows(ports),
      sort: input.sort,
      mode,
      summary: [...warnings.map(formatWarning), `Resolved ${ports.length} ${noun}`],
    },
    context.io
  );

  return { ports, warnings, render };
}
