import { describe, it, expect } from 'vitest';
import { lineItemSchema } from '@unitecon/shared';
import type { LineItemInput } from '@unitecon/shared';
import { computeLineItem, computeLineItemSegment } from '../helpers/line-item-pnl';

const item = (input: LineItemInput) => lineItemSchema('channel').parse(input);

describe('computeLineItem', () => {
  it('applies discount, returns, fees and unit costs', () => {
    const result = computeLineItem(
      item({
        name: 'Marketplace',
        units: 100,
        avg_price: 50,
        unit_cost: 20,
        discount_rate: 0.1,
        return_rate: 0.05,
        payment_fee_rate: 0.02,
        channel_fee_rate: 0.03,
        variable_ops_cost: 1,
      }),
      1000,
    );

    expect(result.name).toBe('Marketplace');
    expect(result.gross_revenue).toBe(5000);
    expect(result.sold_units).toBeCloseTo(95, 10);
    expect(result.net_revenue).toBeCloseTo(4275, 9);
    // 95 × 21 + 4275 × 0.05
    expect(result.variable_costs).toBeCloseTo(2208.75, 9);
    expect(result.contribution).toBeCloseTo(2066.25, 9);
    expect(result.margin_per_unit).toBeCloseTo(21.75, 9);
    expect(result.break_even_units).toBeCloseTo(1000 / 21.75, 9);
  });

  it('equals units × price when there are no discounts or returns', () => {
    const result = computeLineItem(item({ units: 40, avg_price: 25 }), 0);
    expect(result.net_revenue).toBe(1000);
    expect(result.gross_revenue).toBe(result.net_revenue);
  });

  it('reports zero margin and no break-even when nothing is sold', () => {
    const result = computeLineItem(item({ units: 10, avg_price: 30, return_rate: 1 }), 500);
    expect(result.sold_units).toBe(0);
    expect(result.margin_per_unit).toBe(0);
    expect(result.break_even_units).toBeNull();
  });

  it('has no break-even when each unit loses money', () => {
    const result = computeLineItem(item({ units: 10, avg_price: 10, unit_cost: 12 }), 500);
    expect(result.margin_per_unit).toBe(-2);
    expect(result.break_even_units).toBeNull();
  });

  it('gives zero break-even units when there are no fixed costs', () => {
    const result = computeLineItem(item({ units: 10, avg_price: 10, unit_cost: 4 }), 0);
    expect(result.break_even_units).toBe(0);
  });
});

describe('computeLineItemSegment', () => {
  it('sums lines and subtracts fixed costs', () => {
    const segment = computeLineItemSegment(
      [item({ units: 10, avg_price: 100, unit_cost: 40 }), item({ units: 20, avg_price: 10, unit_cost: 5 })],
      { rent: 300, salaries: 200 },
    );

    expect(segment.items).toHaveLength(2);
    expect(segment.pnl).toEqual({
      revenue: 1200,
      variable_costs: 500,
      fixed_costs: 500,
      contribution_margin: 700,
      profit_before_tax: 200,
      break_even_units: 500 / 60,
      break_even_fill_rate: null,
    });
    expect(segment.fixed_costs_detail).toEqual({ rent: 300, salaries: 200 });
  });

  it('takes break-even units from the first line only', () => {
    const segment = computeLineItemSegment(
      [item({ units: 5, avg_price: 10, unit_cost: 20 }), item({ units: 5, avg_price: 50, unit_cost: 10 })],
      { rent: 400 },
    );
    expect(segment.items[1]?.break_even_units).toBe(10);
    expect(segment.pnl.break_even_units).toBeNull();
  });

  it('handles an empty segment', () => {
    const segment = computeLineItemSegment([], { rent: 750 });
    expect(segment.items).toEqual([]);
    expect(segment.pnl.revenue).toBe(0);
    expect(segment.pnl.variable_costs).toBe(0);
    expect(segment.pnl.break_even_units).toBeNull();
    expect(segment.pnl.profit_before_tax).toBe(-750);
  });
});
