import type { LineItemResult, SegmentResult } from '@unitecon/shared';
import { parseWith } from '@unitecon/shared';
import { computeLineItemSegment } from '@unitecon/core';
import { retailConfigSchema } from './validation';
import type { RetailConfigInput } from './validation';

export interface RetailResult extends SegmentResult {
  categories: LineItemResult[];
}

/**
 * Monthly P&L of the retail shop, one line per product category.
 */
export function computeRetail(config: RetailConfigInput = {}): RetailResult {
  const { categories, overheads } = parseWith(retailConfigSchema, config, 'Invalid retail configuration');
  const segment = computeLineItemSegment(categories, overheads);

  return {
    pnl: segment.pnl,
    categories: segment.items,
    fixed_costs_detail: segment.fixed_costs_detail,
  };
}
