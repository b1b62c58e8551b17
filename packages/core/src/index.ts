export { logger, log, setLogLevel, setLogDestination, isLogLevel, errorFields } from './observability/logger';
export type { LogLevel, LogEntry, LogDestination } from './observability/logger';
export { getRuntimeConfig, resetRuntimeConfig } from './config';
export type { RuntimeConfig, RuntimeEnvironment } from './config';
export { sumOverheads, buildSegmentPnl } from './helpers/segment-pnl';
export type { SegmentPnlInput } from './helpers/segment-pnl';
export { computeLineItem, computeLineItemSegment } from './helpers/line-item-pnl';
export type { LineItemSegment } from './helpers/line-item-pnl';
export { calculateProfitTax } from './helpers/profit-tax';
export type { ProfitTaxResult } from './helpers/profit-tax';
