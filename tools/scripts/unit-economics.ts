/**
 * unit-economics.ts
 *
 * Computes the monthly unit-economics report (jewelry, yoga studio, retail,
 * consolidated P&L with profit tax) for a JSON configuration file.
 *
 * Usage:
 *   npm run unit-economics -- --config config.example.json
 *   npm run unit-economics -- --config my-config.json --format text --strict
 *   npm run unit-economics -- --example > my-config.json
 *
 * Environment (.env.local, .env):
 *   LOG_LEVEL                    debug | info | warn | error
 *   UNIT_ECON_DEFAULT_CURRENCY   report currency when the config names none
 *   UNIT_ECON_STRICT             true to fail on out-of-range assumptions
 */

import dotenv from 'dotenv';
import path from 'path';

// ── dotenv cascade ──────────────────────────────────────────────
dotenv.config({ path: path.resolve(process.cwd(), '.env.local') });
dotenv.config();

import { errorFields, getRuntimeConfig, logger, setLogDestination, setLogLevel } from '@unitecon/core';
import { runCli } from '@unitecon/module-consolidation';

// stdout carries the report
setLogDestination('stderr');
setLogLevel(getRuntimeConfig().logLevel);

try {
  process.exitCode = runCli(process.argv.slice(2));
} catch (err) {
  logger.error('Unit economics run failed', { error: errorFields(err) });
  process.exitCode = 1;
}
