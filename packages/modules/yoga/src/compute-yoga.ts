import type { SegmentResult } from '@unitecon/shared';
import { parseWith } from '@unitecon/shared';
import { buildSegmentPnl, sumOverheads } from '@unitecon/core';
import { replacesPublicSlots, yogaConfigSchema } from './validation';
import type { YogaConfigInput } from './validation';

export interface YogaOperatingAssumptions {
  total_slots: number;
  public_slots: number;
  avg_attendees: number;
  total_attendees: number;
}

export interface YogaCorporateReport {
  revenue: number;
  contribution: number;
}

export interface YogaResult extends SegmentResult {
  operating_assumptions: YogaOperatingAssumptions;
  corporate: YogaCorporateReport;
}

/**
 * Monthly P&L of the yoga studio: public classes sold per attendee plus
 * corporate days sold at a day rate.
 *
 * Corporate days occupy every slot of the day when they replace public
 * classes. The break-even fill rate is the share of public capacity that
 * must be filled for class contribution to cover whatever fixed costs the
 * corporate contribution leaves uncovered.
 */
export function computeYoga(config: YogaConfigInput = {}): YogaResult {
  const c = parseWith(yogaConfigSchema, config, 'Invalid yoga configuration');
  const { classes, pricing, corporate } = c;
  const fixedCosts = sumOverheads(c.overheads);

  const totalSlots = classes.slots_per_day * classes.days_per_week * classes.weeks_per_month;
  const effectivePrice = pricing.single_class_price * (1 - pricing.discount_rate);

  // Corporate contracts
  const corporateDays = corporate.days_per_month;
  const corporateRevenue = corporateDays * pricing.corporate_day_rate;
  const corporateVariable = corporateRevenue * pricing.corporate_variable_cost_rate;
  const corporateContribution = corporateRevenue - corporateVariable;

  // Public classes
  const publicSlots = Math.max(
    replacesPublicSlots(corporate) ? totalSlots - corporateDays * classes.slots_per_day : totalSlots,
    0,
  );
  const avgAttendees = c.capacity * classes.fill_rate;
  const totalAttendees = publicSlots * avgAttendees;

  const netRevenue = totalAttendees * effectivePrice;
  const trainerPayout = netRevenue * c.trainer_payout_rate;
  const paymentFees = netRevenue * c.payment_fee_rate;
  const attendeeCosts = totalAttendees * c.variable_cost_per_attendee;
  const classVariable = attendeeCosts + trainerPayout + paymentFees;

  const contributionPerAttendee =
    effectivePrice * (1 - c.trainer_payout_rate - c.payment_fee_rate) - c.variable_cost_per_attendee;
  const publicCapacity = publicSlots * c.capacity;

  let breakEvenFillRate: number | null = null;
  if (contributionPerAttendee > 0 && publicCapacity > 0) {
    const requiredAttendees = Math.max(fixedCosts - corporateContribution, 0) / contributionPerAttendee;
    breakEvenFillRate = requiredAttendees / publicCapacity;
  }

  return {
    pnl: buildSegmentPnl({
      revenue: netRevenue + corporateRevenue,
      variableCosts: classVariable + corporateVariable,
      fixedCosts,
      breakEvenFillRate,
    }),
    operating_assumptions: {
      total_slots: totalSlots,
      public_slots: publicSlots,
      avg_attendees: avgAttendees,
      total_attendees: totalAttendees,
    },
    corporate: {
      revenue: corporateRevenue,
      contribution: corporateContribution,
    },
    fixed_costs_detail: c.overheads,
  };
}
