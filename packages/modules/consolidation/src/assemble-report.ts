import { DEFAULT_CURRENCY, parseWith } from '@unitecon/shared';
import type { JewelryResult } from '@unitecon/module-jewelry';
import type { RetailResult } from '@unitecon/module-retail';
import type { YogaResult } from '@unitecon/module-yoga';
import type { AggregateResult } from './aggregate-results';
import { taxConfigSchema } from './validation';
import type { TaxConfigInput } from './validation';

export const REPORT_ASSUMPTION =
  'All figures are monthly unless specified; break-even fill rate shown as share of capacity.';

export interface ReportNotes {
  profit_tax_rate: number;
  assumption: string;
}

export interface UnitEconomicsReport {
  currency: string;
  jewelry: JewelryResult;
  yoga: YogaResult;
  retail: RetailResult;
  aggregate: AggregateResult;
  notes: ReportNotes;
}

export interface AssembleReportInput {
  currency?: string;
  jewelry: JewelryResult;
  yoga: YogaResult;
  retail: RetailResult;
  aggregate: AggregateResult;
  tax?: TaxConfigInput;
}

/** Package computed results into the report. Nothing is recomputed here. */
export function assembleReport(input: AssembleReportInput): UnitEconomicsReport {
  const { profit_tax_rate } = parseWith(taxConfigSchema, input.tax, 'Invalid tax configuration');
  return {
    currency: input.currency ?? DEFAULT_CURRENCY,
    jewelry: input.jewelry,
    yoga: input.yoga,
    retail: input.retail,
    aggregate: input.aggregate,
    notes: {
      profit_tax_rate,
      assumption: REPORT_ASSUMPTION,
    },
  };
}
