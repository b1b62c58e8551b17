export interface ProfitTaxResult {
  taxExpense: number;
  profitAfterTax: number;
}

/**
 * Profit tax on a consolidated result.
 *
 * Tax applies only to a positive profit; a loss carries no negative tax.
 *   tax_expense      = profit_before_tax × rate   (profit_before_tax > 0)
 *   profit_after_tax = profit_before_tax − tax_expense
 */
export function calculateProfitTax(profitBeforeTax: number, profitTaxRate: number): ProfitTaxResult {
  const taxExpense = profitBeforeTax > 0 ? profitBeforeTax * profitTaxRate : 0;
  return {
    taxExpense,
    profitAfterTax: profitBeforeTax - taxExpense,
  };
}
