import { formatCurrencyAmount } from '@unitecon/shared';
import type { AggregatePnl, SegmentPnl } from '@unitecon/shared';
import type { UnitEconomicsReport } from './assemble-report';

const LABEL_WIDTH = 24;

/** The report as pretty-printed JSON. */
export function renderSummary(report: UnitEconomicsReport): string {
  return JSON.stringify(report, null, 2);
}

function row(label: string, value: string): string {
  return `  ${label.padEnd(LABEL_WIDTH)}${value}`;
}

function formatUnits(units: number | null): string {
  return units === null ? 'n/a' : units.toFixed(2);
}

function formatShare(rate: number | null): string {
  return rate === null ? 'n/a' : `${(rate * 100).toFixed(1)}%`;
}

function pnlRows(pnl: SegmentPnl | AggregatePnl, currency: string): string[] {
  const money = (amount: number) => formatCurrencyAmount(amount, currency);
  return [
    row('Revenue', money(pnl.revenue)),
    row('Variable costs', money(pnl.variable_costs)),
    row('Fixed costs', money(pnl.fixed_costs)),
    row('Contribution margin', money(pnl.contribution_margin)),
    row('Profit before tax', money(pnl.profit_before_tax)),
  ];
}

/**
 * Plain-text P&L: one block per segment, then the consolidated result.
 */
export function renderTextSummary(report: UnitEconomicsReport): string {
  const { currency, jewelry, yoga, retail, aggregate } = report;
  const money = (amount: number) => formatCurrencyAmount(amount, currency);

  const lines = [
    `Unit economics, monthly (${currency})`,
    '',
    'Jewelry',
    ...pnlRows(jewelry.pnl, currency),
    row('Break-even units', formatUnits(jewelry.pnl.break_even_units)),
    '',
    'Yoga studio',
    ...pnlRows(yoga.pnl, currency),
    row('Break-even fill rate', formatShare(yoga.pnl.break_even_fill_rate)),
    '',
    'Retail',
    ...pnlRows(retail.pnl, currency),
    row('Break-even units', formatUnits(retail.pnl.break_even_units)),
    '',
    'Consolidated',
    ...pnlRows(aggregate, currency),
    row(`Tax (${formatShare(report.notes.profit_tax_rate)})`, money(aggregate.tax_expense)),
    row('Profit after tax', money(aggregate.profit_after_tax)),
    '',
    report.notes.assumption,
  ];
  return lines.join('\n');
}
