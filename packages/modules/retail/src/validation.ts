import { z } from 'zod';
import { lineItemSchema, overheadsSchema } from '@unitecon/shared';

export const categorySchema = lineItemSchema('category');

export const retailConfigSchema = z.object({
  categories: z.array(categorySchema).default([]),
  overheads: overheadsSchema,
});

export type RetailConfig = z.output<typeof retailConfigSchema>;
export type RetailConfigInput = z.input<typeof retailConfigSchema>;
