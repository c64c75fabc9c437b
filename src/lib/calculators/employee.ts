/**
 * Employee calculators.
 *
 * Monthly cost = salary/12 + overhead + benefits + allowances. Overhead is
 * salary/12 * (multiplier - 1), so a multiplier of 1 adds nothing.
 */

import type { CalculatorRegistry } from "@/lib/calculatorRegistry";
import { dependencyValue, paramValue } from "@/lib/calculatorRegistry";
import { daysBetween } from "@/lib/dates";
import { sumValues } from "@/lib/entities";

import { DAYS_PER_YEAR, activeInPeriod } from "./shared";

export const DEFAULT_OVERHEAD_MULTIPLIER = 1;
export const DEFAULT_CLIFF_YEARS = 1;

export function registerEmployeeCalculators(registry: CalculatorRegistry): void {
  registry.register(
    "employee",
    "salary_calc",
    (e, ctx) => (activeInPeriod(e, ctx) ? e.salary / 12 : 0),
    { description: "Monthly base salary" },
  );

  registry.register(
    "employee",
    "overhead_calc",
    (e, ctx) => {
      const multiplier = e.overheadMultiplier ?? DEFAULT_OVERHEAD_MULTIPLIER;
      return dependencyValue(ctx, "salary_calc") * (multiplier - 1);
    },
    { description: "Payroll overhead above base salary", dependencies: ["salary_calc"] },
  );

  registry.register(
    "employee",
    "total_cost_calc",
    (e, ctx) => {
      if (!activeInPeriod(e, ctx)) return 0;
      return (
        dependencyValue(ctx, "salary_calc") +
        dependencyValue(ctx, "overhead_calc") +
        sumValues(e.benefits) +
        sumValues(e.allowances)
      );
    },
    {
      description: "Fully loaded monthly cost",
      dependencies: ["salary_calc", "overhead_calc"],
      rollup: "employeeCosts",
    },
  );

  // Monthly value of vesting equity; needs a share_price parameter.
  registry.register(
    "employee",
    "equity_calc",
    (e, ctx) => {
      if (!activeInPeriod(e, ctx) || !e.equityEligible || e.equityShares === 0) return 0;
      const sharePrice = paramValue(ctx, "share_price", 0);
      if (sharePrice <= 0) return 0;

      const vestingYears = paramValue(ctx, "vesting_years", e.equityVestYears);
      const cliffYears = paramValue(ctx, "cliff_years", DEFAULT_CLIFF_YEARS);
      const yearsElapsed = daysBetween(e.equityStartDate ?? e.startDate, ctx.asOfDate) / DAYS_PER_YEAR;
      if (yearsElapsed < cliffYears || yearsElapsed > vestingYears) return 0;

      return (e.equityShares / vestingYears / 12) * sharePrice;
    },
    { description: "Monthly vesting equity value" },
  );

  registry.register(
    "employee",
    "total_compensation_calc",
    (e, ctx) => {
      const annualSalary = dependencyValue(ctx, "salary_calc") * 12;
      if (annualSalary === 0) return 0;
      const bonuses = annualSalary * (e.bonusPerformanceMax + e.bonusMilestonesMax);
      const equity =
        (e.equityShares / e.equityVestYears) * paramValue(ctx, "equity_value_per_share", 0);
      return annualSalary + bonuses + equity;
    },
    { description: "Annual salary, maximum bonuses and yearly equity value", dependencies: ["salary_calc"] },
  );
}
