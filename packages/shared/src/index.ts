export * from './errors';
export * from './validation';
export * from './constants/currencies';
export * from './schemas/unit-economics';
export type * from './types/unit-economics';
