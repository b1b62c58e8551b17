export const MODULE_KEY = 'consolidation';
export const MODULE_NAME = 'Consolidation';
export const MODULE_VERSION = '0.1.0';

// Validation
export * from './validation';
export * from './errors';

// Consolidated P&L and report
export { aggregateResults } from './aggregate-results';
export type { AggregateResult } from './aggregate-results';
export { assembleReport, REPORT_ASSUMPTION } from './assemble-report';
export type { UnitEconomicsReport, ReportNotes, AssembleReportInput } from './assemble-report';
export { buildSummary } from './build-summary';
export type { BuildSummaryOptions } from './build-summary';

// Input and output
export {
  parseConfigText,
  readConfigFile,
  loadDefaultConfigText,
  DEFAULT_CONFIG,
  EXAMPLE_CONFIG_FILE,
} from './load-config';
export { renderSummary, renderTextSummary } from './render-summary';
export { collectAssumptionWarnings } from './assumptions';
export type { AssumptionWarning } from './assumptions';

// Command line
export { parseCliArgs, USAGE } from './cli/args';
export type { CliCommand, OutputFormat } from './cli/args';
export { runCli } from './cli/run';
export type { CliIo } from './cli/run';
