import { describe, it, expect } from 'vitest';
import { ValidationError } from '@unitecon/shared';
import { buildSummary } from '../build-summary';
import { REPORT_ASSUMPTION, assembleReport } from '../assemble-report';

describe('buildSummary', () => {
  it('computes an all-zero report from an empty configuration', () => {
    const report = buildSummary();

    expect(Object.keys(report)).toEqual(['currency', 'jewelry', 'yoga', 'retail', 'aggregate', 'notes']);
    expect(report.currency).toBe('RUB');
    expect(report.aggregate).toEqual({
      revenue: 0,
      variable_costs: 0,
      fixed_costs: 0,
      contribution_margin: 0,
      profit_before_tax: 0,
      tax_expense: 0,
      profit_after_tax: 0,
    });
    expect(report.notes).toEqual({ profit_tax_rate: 0, assumption: REPORT_ASSUMPTION });
  });

  it('rolls every segment into the consolidated P&L', () => {
    const report = buildSummary({
      currency: 'EUR',
      tax: { profit_tax_rate: 0.2 },
      jewelry: { channels: [{ units: 10, avg_price: 100, unit_cost: 40 }], overheads: { rent: 300 } },
      yoga: {
        capacity: 10,
        classes: { slots_per_day: 1, days_per_week: 5, weeks_per_month: 4, fill_rate: 0.5 },
        pricing: { single_class_price: 10 },
        overheads: { rent: 500 },
      },
      retail: { categories: [{ units: 20, avg_price: 50, unit_cost: 30 }], overheads: { rent: 100 } },
    });

    expect(report.currency).toBe('EUR');
    expect(report.jewelry.pnl.profit_before_tax).toBe(300);
    // 20 slots × 5 attendees × 10
    expect(report.yoga.pnl.revenue).toBe(1000);
    // 500 / 10 per attendee / 200 seats
    expect(report.yoga.pnl.break_even_fill_rate).toBe(0.25);
    expect(report.retail.pnl.profit_before_tax).toBe(300);
    expect(report.aggregate).toEqual({
      revenue: 3000,
      variable_costs: 1000,
      fixed_costs: 900,
      contribution_margin: 2000,
      profit_before_tax: 1100,
      tax_expense: 220,
      profit_after_tax: 880,
    });
    expect(report.notes.profit_tax_rate).toBe(0.2);
  });

  it('uses the default currency option when the configuration names none', () => {
    expect(buildSummary({}, { defaultCurrency: 'USD' }).currency).toBe('USD');
    expect(buildSummary({ currency: 'KZT' }, { defaultCurrency: 'USD' }).currency).toBe('KZT');
  });

  it('returns the same report for the same configuration', () => {
    const config = { jewelry: { channels: [{ units: 3, avg_price: 7 }] } };
    expect(buildSummary(config)).toEqual(buildSummary(config));
  });

  it('rejects a malformed section', () => {
    expect(() => buildSummary(JSON.parse('{"tax": {"profit_tax_rate": "high"}}'))).toThrow(ValidationError);
  });
});

describe('assembleReport', () => {
  it('composes results without recomputing them', () => {
    const base = buildSummary({ jewelry: { channels: [{ units: 1, avg_price: 10 }] } });
    const report = assembleReport({
      jewelry: base.jewelry,
      yoga: base.yoga,
      retail: base.retail,
      aggregate: base.aggregate,
      tax: { profit_tax_rate: 0.15 },
    });

    expect(report.currency).toBe('RUB');
    expect(report.jewelry).toBe(base.jewelry);
    expect(report.aggregate).toBe(base.aggregate);
    expect(report.notes.profit_tax_rate).toBe(0.15);
  });
});
