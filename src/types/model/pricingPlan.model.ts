import { PlanType } from "../../common/common-enum";

export interface PricingPlan {
  duration: string;
  months: number;
  total: number;
  monthly: number;
  savings: number;
}

export type PricingPlans = Record<PlanType, PricingPlan>;
