/**
 * Environment configuration
 *
 * PORTBANK_PROFILE     Profile name used in generated export file names
 * PORTBANK_INVENTORY   Port specification of the device's full inventory (for * / all)
 * PORTBANK_EXPORT_DIR  Directory for auto-named exports
 * NO_COLOR             Disable coloured output
 */

import type { PortInventory, PortSet } from '../types/index.js';
import { resolvePortSpec } from '../parsers/portSpec.js';

export interface PortbankConfig {
  profile: string;
  inventorySpec?: string;
  exportDir: string;
  color: boolean;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): PortbankConfig {
  return {
    profile: nonEmpty(env.PORTBANK_PROFILE) ?? 'default',
    inventorySpec: nonEmpty(env.PORTBANK_INVENTORY),
    exportDir: nonEmpty(env.PORTBANK_EXPORT_DIR) ?? '.',
    color: env.NO_COLOR === undefined || env.NO_COLOR === '',
  };
}

/**
 * Wildcard inventory for the resolver. Resolved only when a wildcard is used;
 * an invalid inventory spec surfaces as the resolver's own error.
 */
export function inventoryFromConfig(config: PortbankConfig): PortInventory | undefined {
  const spec = config.inventorySpec;
  if (spec === undefined) return undefined;

  let cached: PortSet | undefined;
  return () => {
    cached ??= resolvePortSpec(spec).ports;
    return cached;
  };
}
