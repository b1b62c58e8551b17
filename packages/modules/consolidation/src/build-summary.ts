import { parseWith } from '@unitecon/shared';
import { computeJewelry } from '@unitecon/module-jewelry';
import { computeRetail } from '@unitecon/module-retail';
import { computeYoga } from '@unitecon/module-yoga';
import { aggregateResults } from './aggregate-results';
import { assembleReport } from './assemble-report';
import type { UnitEconomicsReport } from './assemble-report';
import { unitEconomicsConfigSchema } from './validation';
import type { UnitEconomicsConfigInput } from './validation';

export interface BuildSummaryOptions {
  /** Used when the configuration names no currency */
  defaultCurrency?: string;
}

/**
 * Run the whole model on one configuration: jewelry, yoga and retail in
 * that order, then the consolidated P&L, then the report.
 */
export function buildSummary(
  config: UnitEconomicsConfigInput = {},
  options: BuildSummaryOptions = {},
): UnitEconomicsReport {
  const parsed = parseWith(unitEconomicsConfigSchema, config, 'Invalid unit economics configuration');

  const jewelry = computeJewelry(parsed.jewelry);
  const yoga = computeYoga(parsed.yoga);
  const retail = computeRetail(parsed.retail);
  const aggregate = aggregateResults(jewelry, yoga, retail, parsed.tax);

  return assembleReport({
    currency: parsed.currency ?? options.defaultCurrency,
    jewelry,
    yoga,
    retail,
    aggregate,
    tax: parsed.tax,
  });
}
