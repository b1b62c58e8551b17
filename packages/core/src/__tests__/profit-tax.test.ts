import { describe, it, expect } from 'vitest';
import { calculateProfitTax } from '../helpers/profit-tax';

describe('calculateProfitTax', () => {
  it('taxes a positive profit', () => {
    expect(calculateProfitTax(1200, 0.2)).toEqual({ taxExpense: 240, profitAfterTax: 960 });
  });

  it('charges no tax on a loss', () => {
    expect(calculateProfitTax(-500, 0.2)).toEqual({ taxExpense: 0, profitAfterTax: -500 });
  });

  it('charges no tax at break-even', () => {
    expect(calculateProfitTax(0, 0.2)).toEqual({ taxExpense: 0, profitAfterTax: 0 });
  });

  it('treats a zero rate as untaxed', () => {
    expect(calculateProfitTax(800, 0)).toEqual({ taxExpense: 0, profitAfterTax: 800 });
  });
});
