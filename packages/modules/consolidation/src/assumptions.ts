import type { ErrorDetail } from '@unitecon/shared';
import type { UnitEconomicsConfig } from './validation';

export type AssumptionWarning = ErrorDetail;

const LINE_ITEM_RATES = ['discount_rate', 'return_rate', 'payment_fee_rate', 'channel_fee_rate'] as const;
const LINE_ITEM_AMOUNTS = ['units', 'avg_price', 'unit_cost', 'variable_ops_cost'] as const;

class WarningCollector {
  readonly warnings: AssumptionWarning[] = [];

  rate(field: string, value: number): void {
    if (value < 0 || value > 1) {
      this.warnings.push({ field, message: `${field} should be between 0 and 1, got ${value}` });
    }
  }

  nonNegative(field: string, value: number): void {
    if (value < 0) {
      this.warnings.push({ field, message: `${field} should not be negative, got ${value}` });
    }
  }

  overheads(prefix: string, overheads: Record<string, number>): void {
    for (const [label, amount] of Object.entries(overheads)) {
      this.nonNegative(`${prefix}.overheads.${label}`, amount);
    }
  }
}

/**
 * List inputs outside their meaningful range: rates outside [0, 1] and
 * negative counts, prices, costs or overheads.
 *
 * The calculators accept such values and compute with them; this check only
 * reports them.
 */
export function collectAssumptionWarnings(config: UnitEconomicsConfig): AssumptionWarning[] {
  const check = new WarningCollector();
  const { jewelry, retail, yoga, tax } = config;

  const lineItems = [
    ...jewelry.channels.map((item, i) => ({ item, prefix: `jewelry.channels.${i}` })),
    ...retail.categories.map((item, i) => ({ item, prefix: `retail.categories.${i}` })),
  ];
  for (const { item, prefix } of lineItems) {
    for (const key of LINE_ITEM_RATES) check.rate(`${prefix}.${key}`, item[key]);
    for (const key of LINE_ITEM_AMOUNTS) check.nonNegative(`${prefix}.${key}`, item[key]);
  }
  check.overheads('jewelry', jewelry.overheads);
  check.overheads('retail', retail.overheads);

  check.nonNegative('yoga.capacity', yoga.capacity);
  check.nonNegative('yoga.classes.slots_per_day', yoga.classes.slots_per_day);
  check.nonNegative('yoga.classes.days_per_week', yoga.classes.days_per_week);
  check.nonNegative('yoga.classes.weeks_per_month', yoga.classes.weeks_per_month);
  check.rate('yoga.classes.fill_rate', yoga.classes.fill_rate);
  check.nonNegative('yoga.pricing.single_class_price', yoga.pricing.single_class_price);
  check.rate('yoga.pricing.discount_rate', yoga.pricing.discount_rate);
  check.nonNegative('yoga.pricing.corporate_day_rate', yoga.pricing.corporate_day_rate);
  check.rate('yoga.pricing.corporate_variable_cost_rate', yoga.pricing.corporate_variable_cost_rate);
  check.rate('yoga.payment_fee_rate', yoga.payment_fee_rate);
  check.rate('yoga.trainer_payout_rate', yoga.trainer_payout_rate);
  check.nonNegative('yoga.variable_cost_per_attendee', yoga.variable_cost_per_attendee);
  check.nonNegative('yoga.corporate.days_per_month', yoga.corporate.days_per_month);
  check.overheads('yoga', yoga.overheads);

  check.rate('tax.profit_tax_rate', tax.profit_tax_rate);

  return check.warnings;
}
