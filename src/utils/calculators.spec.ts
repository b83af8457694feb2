import { PlanType } from "../common/common-enum";
import { SubscriptionCalculator } from "./calculators";

describe("SubscriptionCalculator", () => {
  const calculator = new SubscriptionCalculator();

  it("prices the three plans for a 2499 base", () => {
    expect(calculator.calculatePlans(2499)).toEqual({
      [PlanType.ONE_MONTH]: {
        duration: "1 month",
        months: 1,
        total: 2499,
        monthly: 2499,
        savings: 0,
      },
      [PlanType.THREE_MONTH]: {
        duration: "3 months",
        months: 3,
        total: 6972,
        monthly: 2324,
        savings: 525,
      },
      [PlanType.TWELVE_MONTH]: {
        duration: "12 months",
        months: 12,
        total: 24890,
        monthly: 2074,
        savings: 5098,
      },
    });
  });

  it("keeps totals exact when the discount lands on a whole rupee", () => {
    const plans = calculator.calculatePlans(1000);
    expect(plans[PlanType.THREE_MONTH].total).toBe(2790);
    expect(plans[PlanType.TWELVE_MONTH].total).toBe(9960);
    expect(plans[PlanType.TWELVE_MONTH].savings).toBe(2040);
  });

  it("drops the fractional rupee of a decimal base", () => {
    const plan = calculator.calculatePlan(999.5, PlanType.ONE_MONTH);
    expect(plan.total).toBe(999);
    expect(plan.monthly).toBe(999);
    expect(plan.savings).toBe(0.5);
  });

  it("reports savings as undiscounted price minus total", () => {
    for (const planType of Object.values(PlanType)) {
      const plan = calculator.calculatePlan(1799, planType);
      expect(plan.savings).toBeCloseTo(plan.months * 1799 - plan.total, 2);
    }
  });
});
