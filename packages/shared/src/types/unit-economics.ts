/**
 * Result shapes of the unit-economics model.
 *
 * Key names are snake_case: these records are serialised to JSON as-is and
 * the key names are part of the report format.
 */

/** Cost label → monthly amount. */
export type Overheads = Record<string, number>;

/**
 * One P&L shape for every segment. Line-item segments fill
 * `break_even_units`, the yoga studio fills `break_even_fill_rate`;
 * the other field stays null.
 */
export interface SegmentPnl {
  revenue: number;
  variable_costs: number;
  fixed_costs: number;
  contribution_margin: number;
  profit_before_tax: number;
  break_even_units: number | null;
  break_even_fill_rate: number | null;
}

export interface LineItemResult {
  name: string;
  /** units × price, before discount and returns */
  gross_revenue: number;
  net_revenue: number;
  /** units after returns */
  sold_units: number;
  /** unit costs + ops + payment fees + channel fees */
  variable_costs: number;
  contribution: number;
  margin_per_unit: number;
  break_even_units: number | null;
}

export interface SegmentResult {
  pnl: SegmentPnl;
  fixed_costs_detail: Overheads;
}

export interface AggregatePnl {
  revenue: number;
  variable_costs: number;
  fixed_costs: number;
  contribution_margin: number;
  profit_before_tax: number;
  tax_expense: number;
  profit_after_tax: number;
}
