import { PlanType } from "../common/common-enum";
import { PricingPlan, PricingPlans } from "../types/model/pricingPlan.model";
import { PRICING_CONSTANTS } from "./constants";
import { roundTo } from "./geo";

// Amounts are settled to paise first, then the fractional rupee is dropped.
const toWholeRupees = (amount: number): number => Math.trunc(roundTo(amount, 2));

export class SubscriptionCalculator {
  public calculatePlan(baseMonthly: number, planType: PlanType): PricingPlan {
    const { months, multiplier, duration } = PRICING_CONSTANTS.PLANS[planType];
    const undiscounted = months * baseMonthly;
    const total = toWholeRupees(undiscounted * multiplier);

    return {
      duration,
      months,
      total,
      monthly: toWholeRupees(baseMonthly * multiplier),
      savings: roundTo(undiscounted - total, 2),
    };
  }

  public calculatePlans(baseMonthly: number): PricingPlans {
    return {
      [PlanType.ONE_MONTH]: this.calculatePlan(baseMonthly, PlanType.ONE_MONTH),
      [PlanType.THREE_MONTH]: this.calculatePlan(baseMonthly, PlanType.THREE_MONTH),
      [PlanType.TWELVE_MONTH]: this.calculatePlan(baseMonthly, PlanType.TWELVE_MONTH),
    };
  }
}

export const subscriptionCalculator = new SubscriptionCalculator();
