import type { LineItemResult, SegmentResult } from '@unitecon/shared';
import { parseWith } from '@unitecon/shared';
import { computeLineItemSegment } from '@unitecon/core';
import { jewelryConfigSchema } from './validation';
import type { JewelryConfigInput } from './validation';

export interface JewelryResult extends SegmentResult {
  channels: LineItemResult[];
}

/**
 * Monthly P&L of the jewelry business, one line per sales channel.
 */
export function computeJewelry(config: JewelryConfigInput = {}): JewelryResult {
  const { channels, overheads } = parseWith(jewelryConfigSchema, config, 'Invalid jewelry configuration');
  const segment = computeLineItemSegment(channels, overheads);

  return {
    pnl: segment.pnl,
    channels: segment.items,
    fixed_costs_detail: segment.fixed_costs_detail,
  };
}
