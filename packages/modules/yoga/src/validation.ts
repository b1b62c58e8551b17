import { z } from 'zod';
import { amountSchema, overheadsSchema } from '@unitecon/shared';

/** Average number of weeks in a month. */
export const DEFAULT_WEEKS_PER_MONTH = 4.3;

export const classScheduleSchema = z
  .object({
    slots_per_day: amountSchema,
    days_per_week: amountSchema,
    weeks_per_month: z.coerce.number().default(DEFAULT_WEEKS_PER_MONTH),
    /** Share of slot capacity taken by attendees */
    fill_rate: amountSchema,
  })
  .default({});

export const yogaPricingSchema = z
  .object({
    single_class_price: amountSchema,
    discount_rate: amountSchema,
    corporate_day_rate: amountSchema,
    corporate_variable_cost_rate: amountSchema,
  })
  .default({});

export const corporateContractSchema = z
  .object({
    days_per_month: amountSchema,
    // Both spellings are accepted; `replace_public_slots` wins when both are set
    replace_public_slots: z.boolean().optional(),
    public_slots_replaced: z.boolean().optional(),
  })
  .default({});

export const yogaConfigSchema = z.object({
  overheads: overheadsSchema,
  capacity: amountSchema,
  classes: classScheduleSchema,
  pricing: yogaPricingSchema,
  corporate: corporateContractSchema,
  payment_fee_rate: amountSchema,
  trainer_payout_rate: amountSchema,
  variable_cost_per_attendee: amountSchema,
});

export type YogaConfig = z.output<typeof yogaConfigSchema>;
export type YogaConfigInput = z.input<typeof yogaConfigSchema>;
export type CorporateContract = z.output<typeof corporateContractSchema>;

/** Whether corporate days take public class slots off the schedule (default: yes). */
export function replacesPublicSlots(corporate: CorporateContract): boolean {
  return corporate.replace_public_slots ?? corporate.public_slots_replaced ?? true;
}
