export const MODULE_KEY = 'retail';
export const MODULE_NAME = 'Retail';
export const MODULE_VERSION = '0.1.0';

// Validation
export * from './validation';

// Calculators
export { computeRetail } from './compute-retail';
export type { RetailResult } from './compute-retail';
