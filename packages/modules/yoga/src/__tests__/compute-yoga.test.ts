import { describe, it, expect } from 'vitest';
import { computeYoga } from '../compute-yoga';
import type { YogaConfigInput } from '../validation';

const studio: YogaConfigInput = {
  capacity: 10,
  classes: { slots_per_day: 2, days_per_week: 5, weeks_per_month: 4, fill_rate: 0.5 },
  pricing: {
    single_class_price: 10,
    discount_rate: 0,
    corporate_day_rate: 1000,
    corporate_variable_cost_rate: 0.1,
  },
  payment_fee_rate: 0.05,
  trainer_payout_rate: 0.25,
  variable_cost_per_attendee: 1,
  corporate: { days_per_month: 4 },
  overheads: { rent: 5000 },
};

describe('computeYoga', () => {
  it('computes a public-only schedule', () => {
    const result = computeYoga({
      classes: { slots_per_day: 4, days_per_week: 5, weeks_per_month: 4.3, fill_rate: 0.6 },
      capacity: 10,
      corporate: { days_per_month: 0 },
      pricing: { single_class_price: 20, discount_rate: 0 },
      overheads: {},
    });

    expect(result.operating_assumptions.total_slots).toBeCloseTo(86, 10);
    expect(result.operating_assumptions.public_slots).toBeCloseTo(86, 10);
    expect(result.operating_assumptions.avg_attendees).toBeCloseTo(6, 10);
    expect(result.operating_assumptions.total_attendees).toBeCloseTo(516, 9);
    expect(result.pnl.revenue).toBeCloseTo(10320, 8);
    expect(result.pnl.variable_costs).toBe(0);
    expect(result.pnl.profit_before_tax).toBeCloseTo(10320, 8);
    // nothing to cover
    expect(result.pnl.break_even_fill_rate).toBe(0);
    expect(result.pnl.break_even_units).toBeNull();
  });

  it('blends corporate days into the studio P&L', () => {
    const result = computeYoga(studio);

    expect(result.corporate).toEqual({ revenue: 4000, contribution: 3600 });
    expect(result.operating_assumptions).toEqual({
      total_slots: 40,
      public_slots: 32,
      avg_attendees: 5,
      total_attendees: 160,
    });
    expect(result.pnl.revenue).toBe(5600);
    // attendees 160 + trainers 400 + payments 80 + corporate 400
    expect(result.pnl.variable_costs).toBeCloseTo(1040, 9);
    expect(result.pnl.contribution_margin).toBeCloseTo(4560, 9);
    expect(result.pnl.profit_before_tax).toBeCloseTo(-440, 9);
    // (5000 − 3600) / 6 per attendee / 320 seats
    expect(result.pnl.break_even_fill_rate).toBeCloseTo(1400 / 6 / 320, 10);
    expect(result.fixed_costs_detail).toEqual({ rent: 5000 });
  });

  it('keeps public slots when corporate days do not replace them', () => {
    const result = computeYoga({ ...studio, corporate: { days_per_month: 4, replace_public_slots: false } });
    expect(result.operating_assumptions.public_slots).toBe(40);
    expect(result.operating_assumptions.total_attendees).toBe(200);
  });

  it('accepts the public_slots_replaced spelling of the flag', () => {
    const result = computeYoga({ ...studio, corporate: { days_per_month: 4, public_slots_replaced: false } });
    expect(result.operating_assumptions.public_slots).toBe(40);
  });

  it('never schedules a negative number of public slots', () => {
    const result = computeYoga({ ...studio, corporate: { days_per_month: 30 } });
    expect(result.operating_assumptions.public_slots).toBe(0);
    expect(result.operating_assumptions.total_attendees).toBe(0);
    expect(result.pnl.break_even_fill_rate).toBeNull();
  });

  it('has no break-even fill rate when an attendee does not pay for itself', () => {
    const result = computeYoga({ ...studio, variable_cost_per_attendee: 50 });
    expect(result.pnl.break_even_fill_rate).toBeNull();
  });

  it('needs no public attendance when corporate work covers fixed costs', () => {
    const result = computeYoga({ ...studio, overheads: { rent: 2000 } });
    expect(result.pnl.break_even_fill_rate).toBe(0);
  });

  it('defaults to 4.3 weeks per month', () => {
    const result = computeYoga({ classes: { slots_per_day: 1, days_per_week: 1 } });
    expect(result.operating_assumptions.total_slots).toBe(4.3);
  });

  it('computes an empty studio from an empty configuration', () => {
    const result = computeYoga();
    expect(result.pnl.revenue).toBe(0);
    expect(result.pnl.profit_before_tax).toBe(0);
    expect(result.pnl.break_even_fill_rate).toBeNull();
    expect(result.corporate).toEqual({ revenue: 0, contribution: 0 });
  });

  it('returns the same result for the same input', () => {
    expect(computeYoga(studio)).toEqual(computeYoga(studio));
  });
});
