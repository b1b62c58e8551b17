/**
 * Runtime configuration: environment-driven settings for the tools that
 * run the model. The calculators themselves read no environment.
 */

import { DEFAULT_CURRENCY } from '@unitecon/shared';
import { isLogLevel } from '../observability/logger';
import type { LogLevel } from '../observability/logger';

export type RuntimeEnvironment = 'production' | 'development' | 'test';

export interface RuntimeConfig {
  environment: RuntimeEnvironment;
  logLevel: LogLevel;
  /** Report currency when the configuration names none */
  defaultCurrency: string;
  /** Treat assumption warnings as errors */
  strictAssumptions: boolean;
}

function detectEnvironment(): RuntimeEnvironment {
  if (process.env.NODE_ENV === 'production') return 'production';
  if (process.env.NODE_ENV === 'test' || process.env.VITEST) return 'test';
  return 'development';
}

function parseFlag(value: string | undefined): boolean {
  return value === 'true' || value === '1';
}

let _config: RuntimeConfig | null = null;

export function getRuntimeConfig(): RuntimeConfig {
  if (_config) return _config;

  const environment = detectEnvironment();
  const level = process.env.LOG_LEVEL;

  _config = {
    environment,
    // production defaults to warn
    logLevel: isLogLevel(level) ? level : environment === 'production' ? 'warn' : 'info',
    defaultCurrency: process.env.UNIT_ECON_DEFAULT_CURRENCY?.trim().toUpperCase() || DEFAULT_CURRENCY,
    strictAssumptions: parseFlag(process.env.UNIT_ECON_STRICT),
  };

  return _config;
}

/** Reset cached config (for testing) */
export function resetRuntimeConfig(): void {
  _config = null;
}
