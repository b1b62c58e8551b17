import type { Overheads, SegmentPnl } from '@unitecon/shared';

/** Fixed costs of a segment: the sum of its overhead entries. */
export function sumOverheads(overheads: Overheads): number {
  return Object.values(overheads).reduce((sum, amount) => sum + amount, 0);
}

export interface SegmentPnlInput {
  revenue: number;
  variableCosts: number;
  fixedCosts: number;
  breakEvenUnits?: number | null;
  breakEvenFillRate?: number | null;
}

/**
 * Build a segment P&L from its totals.
 *
 *   contribution_margin = revenue − variable_costs
 *   profit_before_tax   = contribution_margin − fixed_costs
 */
export function buildSegmentPnl(input: SegmentPnlInput): SegmentPnl {
  const contributionMargin = input.revenue - input.variableCosts;
  return {
    revenue: input.revenue,
    variable_costs: input.variableCosts,
    fixed_costs: input.fixedCosts,
    contribution_margin: contributionMargin,
    profit_before_tax: contributionMargin - input.fixedCosts,
    break_even_units: input.breakEvenUnits ?? null,
    break_even_fill_rate: input.breakEvenFillRate ?? null,
  };
}
