export const MODULE_KEY = 'yoga';
export const MODULE_NAME = 'Yoga Studio';
export const MODULE_VERSION = '0.1.0';

// Validation
export * from './validation';

// Calculators
export { computeYoga } from './compute-yoga';
export type { YogaResult, YogaOperatingAssumptions, YogaCorporateReport } from './compute-yoga';
