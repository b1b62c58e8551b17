import type { AggregatePnl, SegmentResult } from '@unitecon/shared';
import { parseWith } from '@unitecon/shared';
import { calculateProfitTax } from '@unitecon/core';
import { taxConfigSchema } from './validation';
import type { TaxConfigInput } from './validation';

export type AggregateResult = AggregatePnl;

/**
 * Consolidated P&L of the three segments, after profit tax.
 *
 * Revenue, variable and fixed costs are summed across segments; margin and
 * profit are derived from the sums, never summed themselves.
 */
export function aggregateResults(
  jewelry: SegmentResult,
  yoga: SegmentResult,
  retail: SegmentResult,
  tax: TaxConfigInput = {},
): AggregateResult {
  const segments = [jewelry, yoga, retail];
  const revenue = segments.reduce((sum, s) => sum + s.pnl.revenue, 0);
  const variableCosts = segments.reduce((sum, s) => sum + s.pnl.variable_costs, 0);
  const fixedCosts = segments.reduce((sum, s) => sum + s.pnl.fixed_costs, 0);

  const contributionMargin = revenue - variableCosts;
  const profitBeforeTax = contributionMargin - fixedCosts;

  const { profit_tax_rate } = parseWith(taxConfigSchema, tax, 'Invalid tax configuration');
  const { taxExpense, profitAfterTax } = calculateProfitTax(profitBeforeTax, profit_tax_rate);

  return {
    revenue,
    variable_costs: variableCosts,
    fixed_costs: fixedCosts,
    contribution_margin: contributionMargin,
    profit_before_tax: profitBeforeTax,
    tax_expense: taxExpense,
    profit_after_tax: profitAfterTax,
  };
}
