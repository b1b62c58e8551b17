import { AppError, ValidationError } from '@unitecon/shared';
import { errorFields, getRuntimeConfig, logger } from '@unitecon/core';
import { collectAssumptionWarnings } from '../assumptions';
import { buildSummary } from '../build-summary';
import { CliUsageError } from '../errors';
import { loadDefaultConfigText, readConfigFile } from '../load-config';
import { renderSummary, renderTextSummary } from '../render-summary';
import { USAGE, parseCliArgs } from './args';
import type { CliCommand } from './args';

export interface CliIo {
  out: (text: string) => void;
  err: (text: string) => void;
}

const processIo: CliIo = {
  out: (text) => process.stdout.write(text),
  err: (text) => process.stderr.write(text),
};

/**
 * Run the unit-economics command. Returns the process exit code:
 * 0 on success, 1 when the configuration cannot be computed, 2 on bad usage.
 */
export function runCli(argv: string[], io: CliIo = processIo): number {
  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (err) {
    if (!(err instanceof CliUsageError)) throw err;
    logger.error(err.message, { error: errorFields(err) });
    io.err(USAGE);
    return 2;
  }

  if (command.kind === 'help') {
    io.out(USAGE);
    return 0;
  }
  if (command.kind === 'example') {
    io.out(`${loadDefaultConfigText()}\n`);
    return 0;
  }

  const { configPath, format } = command;
  const runtime = getRuntimeConfig();
  const startedAt = Date.now();

  try {
    const config = readConfigFile(configPath);

    const warnings = collectAssumptionWarnings(config);
    for (const warning of warnings) {
      logger.warn(warning.message, { field: warning.field, configPath });
    }
    if (warnings.length > 0 && (command.strict || runtime.strictAssumptions)) {
      throw new ValidationError('Configuration has out-of-range assumptions', warnings);
    }

    const report = buildSummary(config, { defaultCurrency: runtime.defaultCurrency });
    io.out(`${format === 'text' ? renderTextSummary(report) : renderSummary(report)}\n`);

    logger.debug('Unit economics computed', { configPath, durationMs: Date.now() - startedAt });
    return 0;
  } catch (err) {
    if (!(err instanceof AppError)) throw err;
    logger.error(err.message, { configPath, error: errorFields(err), details: err.details });
    return 1;
  }
}
