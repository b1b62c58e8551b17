import { z } from 'zod';

/**
 * Any numeric input of the model. Absent values count as 0 and numeric
 * strings are accepted; anything that does not read as a number is rejected.
 * Ranges are not checked here.
 */
export const amountSchema = z.coerce.number().default(0);

export const overheadsSchema = z.record(z.coerce.number()).default({});

/**
 * A sales line: a jewelry channel or a retail category.
 * `defaultName` is used when the item carries no name.
 */
export function lineItemSchema(defaultName: string) {
  return z.object({
    name: z.coerce.string().default(defaultName),
    units: amountSchema,
    avg_price: amountSchema,
    unit_cost: amountSchema,
    discount_rate: amountSchema,
    return_rate: amountSchema,
    payment_fee_rate: amountSchema,
    channel_fee_rate: amountSchema,
    variable_ops_cost: amountSchema,
  });
}

export type LineItem = z.output<ReturnType<typeof lineItemSchema>>;
export type LineItemInput = z.input<ReturnType<typeof lineItemSchema>>;
