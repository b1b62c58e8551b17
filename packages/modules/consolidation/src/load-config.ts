import fs from 'fs';
import path from 'path';
import { DEFAULT_CURRENCY, parseWith } from '@unitecon/shared';
import { ConfigFileNotFoundError, InvalidConfigError } from './errors';
import { unitEconomicsConfigSchema } from './validation';
import type { UnitEconomicsConfig, UnitEconomicsConfigInput } from './validation';

export const EXAMPLE_CONFIG_FILE = 'config.example.json';

/** Skeleton used when no example configuration ships alongside the tool. */
export const DEFAULT_CONFIG: UnitEconomicsConfigInput = {
  currency: DEFAULT_CURRENCY,
  tax: { profit_tax_rate: 0.22 },
  jewelry: { channels: [], overheads: {} },
  yoga: { capacity: 0, classes: {}, pricing: {}, corporate: {}, overheads: {} },
  retail: { categories: [], overheads: {} },
};

export function parseConfigText(text: string): UnitEconomicsConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new InvalidConfigError(err instanceof Error ? err.message : String(err));
  }
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new InvalidConfigError('expected a JSON object at the top level');
  }
  return parseWith(unitEconomicsConfigSchema, raw, 'Invalid unit economics configuration');
}

export function readConfigFile(filePath: string): UnitEconomicsConfig {
  const resolved = path.resolve(filePath);
  if (!fs.existsSync(resolved)) {
    throw new ConfigFileNotFoundError(filePath);
  }
  return parseConfigText(fs.readFileSync(resolved, 'utf-8'));
}

/**
 * Text of the example configuration, or the default skeleton when the
 * example file is missing.
 */
export function loadDefaultConfigText(
  examplePath: string = path.resolve(process.cwd(), EXAMPLE_CONFIG_FILE),
): string {
  if (fs.existsSync(examplePath)) {
    return fs.readFileSync(examplePath, 'utf-8');
  }
  return JSON.stringify(DEFAULT_CONFIG, null, 2);
}
