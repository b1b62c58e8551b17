import type { LineItem, LineItemResult, Overheads, SegmentPnl } from '@unitecon/shared';
import { buildSegmentPnl, sumOverheads } from './segment-pnl';

export interface LineItemSegment {
  pnl: SegmentPnl;
  items: LineItemResult[];
  fixed_costs_detail: Overheads;
}

/**
 * Unit economics of one sales line (a channel or a category).
 *
 *   effective_price = price × (1 − discount_rate)
 *   sold_units      = units × (1 − return_rate)
 *   net_revenue     = sold_units × effective_price
 *   variable_costs  = sold_units × (unit_cost + variable_ops_cost)
 *                     + net_revenue × (payment_fee_rate + channel_fee_rate)
 *
 * `fixedCosts` is the segment total; break-even units are how many sold units
 * at this line's margin cover all of it.
 */
export function computeLineItem(item: LineItem, fixedCosts: number): LineItemResult {
  const effectivePrice = item.avg_price * (1 - item.discount_rate);
  const soldUnits = item.units * (1 - item.return_rate);
  const netRevenue = soldUnits * effectivePrice;
  const unitCosts = soldUnits * (item.unit_cost + item.variable_ops_cost);
  const paymentFees = netRevenue * item.payment_fee_rate;
  const channelFees = netRevenue * item.channel_fee_rate;
  const variableTotal = unitCosts + paymentFees + channelFees;
  const contribution = netRevenue - variableTotal;

  const marginPerUnit = soldUnits !== 0 ? contribution / soldUnits : 0;
  const breakEvenUnits = marginPerUnit > 0 ? fixedCosts / marginPerUnit : null;

  return {
    name: item.name,
    gross_revenue: item.units * item.avg_price,
    net_revenue: netRevenue,
    sold_units: soldUnits,
    variable_costs: variableTotal,
    contribution,
    margin_per_unit: marginPerUnit,
    break_even_units: breakEvenUnits,
  };
}

/**
 * P&L of a segment made of sales lines, in input order.
 *
 * The segment's break_even_units is the first line's value, not a
 * segment-wide figure; an empty segment has none.
 */
export function computeLineItemSegment(items: LineItem[], overheads: Overheads): LineItemSegment {
  const fixedCosts = sumOverheads(overheads);
  const results = items.map((item) => computeLineItem(item, fixedCosts));

  const revenue = results.reduce((sum, r) => sum + r.net_revenue, 0);
  const variableCosts = results.reduce((sum, r) => sum + r.variable_costs, 0);

  return {
    pnl: buildSegmentPnl({
      revenue,
      variableCosts,
      fixedCosts,
      breakEvenUnits: results[0]?.break_even_units ?? null,
    }),
    items: results,
    fixed_costs_detail: overheads,
  };
}
