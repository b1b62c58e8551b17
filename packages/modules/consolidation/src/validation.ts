import { z } from 'zod';
import { amountSchema } from '@unitecon/shared';
import { jewelryConfigSchema } from '@unitecon/module-jewelry';
import { retailConfigSchema } from '@unitecon/module-retail';
import { yogaConfigSchema } from '@unitecon/module-yoga';

export const taxConfigSchema = z
  .object({
    profit_tax_rate: amountSchema,
  })
  .default({});

/** The whole input snapshot: one section per segment plus tax and currency. */
export const unitEconomicsConfigSchema = z.object({
  currency: z.string().trim().min(1).optional(),
  tax: taxConfigSchema,
  jewelry: jewelryConfigSchema.default({}),
  yoga: yogaConfigSchema.default({}),
  retail: retailConfigSchema.default({}),
});

export type TaxConfig = z.output<typeof taxConfigSchema>;
export type TaxConfigInput = z.input<typeof taxConfigSchema>;
export type UnitEconomicsConfig = z.output<typeof unitEconomicsConfigSchema>;
export type UnitEconomicsConfigInput = z.input<typeof unitEconomicsConfigSchema>;
