export const MODULE_KEY = 'jewelry';
export const MODULE_NAME = 'Jewelry';
export const MODULE_VERSION = '0.1.0';

// Validation
export * from './validation';

// Calculators
export { computeJewelry } from './compute-jewelry';
export type { JewelryResult } from './compute-jewelry';
