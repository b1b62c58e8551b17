import { z } from 'zod';
import { lineItemSchema, overheadsSchema } from '@unitecon/shared';

export const channelSchema = lineItemSchema('channel');

export const jewelryConfigSchema = z.object({
  channels: z.array(channelSchema).default([]),
  overheads: overheadsSchema,
});

export type JewelryConfig = z.output<typeof jewelryConfigSchema>;
export type JewelryConfigInput = z.input<typeof jewelryConfigSchema>;
