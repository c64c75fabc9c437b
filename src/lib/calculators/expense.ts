/**
 * Expense calculators: facilities, software, equipment and projects.
 */

import type { CalculatorRegistry } from "@/lib/calculatorRegistry";
import { daysBetween, isSameMonth, monthOf, monthsBetween } from "@/lib/dates";

import { DAYS_PER_YEAR, activeInPeriod, round2, sumInMonth } from "./shared";

const QUARTER_START_MONTHS = new Set([1, 4, 7, 10]);

export function registerExpenseCalculators(registry: CalculatorRegistry): void {
  // -------------------------------------------------------------------------
  // Facility
  // -------------------------------------------------------------------------

  registry.register(
    "facility",
    "recurring_calc",
    (f, ctx) => {
      if (!activeInPeriod(f, ctx)) return 0;
      const month = monthOf(ctx.asOfDate);
      let rent = f.monthlyCost;
      if (f.paymentFrequency === "annual") rent = month === 1 ? f.monthlyCost * 12 : 0;
      if (f.paymentFrequency === "quarterly") rent = QUARTER_START_MONTHS.has(month) ? f.monthlyCost * 3 : 0;
      return (
        rent + f.utilitiesMonthly + f.insuranceAnnual / 12 + f.securityMonthly + f.maintenanceMonthly
      );
    },
    { description: "Rent plus monthly running costs", rollup: "facilityCosts" },
  );

  registry.register(
    "facility",
    "utilities_calc",
    (f, ctx) => (activeInPeriod(f, ctx) ? f.utilitiesMonthly : 0),
    { description: "Monthly utilities (already included in recurring_calc)" },
  );

  // -------------------------------------------------------------------------
  // Software
  // -------------------------------------------------------------------------

  registry.register(
    "software",
    "recurring_calc",
    (s, ctx) => {
      if (!activeInPeriod(s, ctx)) return 0;
      if (s.annualCost !== undefined && s.annualCost > 0) return s.annualCost / 12;
      return s.monthlyCost ?? 0;
    },
    { description: "Subscription cost per month", rollup: "softwareCosts" },
  );

  // -------------------------------------------------------------------------
  // Equipment
  // -------------------------------------------------------------------------

  registry.register(
    "equipment",
    "depreciation_calc",
    (eq, ctx) => {
      const price = eq.purchasePrice ?? eq.cost;
      const life = eq.usefulLifeYears;
      if (!activeInPeriod(eq, ctx) || price <= 0 || life === undefined) return 0;

      const purchased = eq.purchaseDate ?? eq.startDate;
      const yearsElapsed = daysBetween(purchased, ctx.asOfDate) / DAYS_PER_YEAR;
      if (yearsElapsed < 0 || yearsElapsed > life) return 0;
      return (price - eq.salvageValue) / (life * 12);
    },
    { description: "Straight-line monthly depreciation", rollup: "equipmentCosts" },
  );

  registry.register(
    "equipment",
    "maintenance_calc",
    (eq, ctx) => {
      if (!activeInPeriod(eq, ctx)) return 0;
      if (eq.maintenanceCost !== undefined) return eq.maintenanceCost;
      const price = eq.purchasePrice ?? eq.cost;
      return round2((price * eq.maintenancePercentage) / 12);
    },
    { description: "Monthly maintenance", rollup: "equipmentCosts" },
  );

  registry.register(
    "equipment",
    "one_time_calc",
    (eq, ctx) => {
      if (!activeInPeriod(eq, ctx)) return 0;
      if (!isSameMonth(eq.purchaseDate ?? eq.startDate, ctx.asOfDate)) return 0;
      return eq.cost > 0 ? eq.cost : (eq.purchasePrice ?? 0);
    },
    { description: "Purchase outlay in the purchase month", rollup: "equipmentCosts" },
  );

  // -------------------------------------------------------------------------
  // Project
  // -------------------------------------------------------------------------

  registry.register(
    "project",
    "burn_calc",
    (p, ctx) => {
      if (!activeInPeriod(p, ctx) || p.endDate === null || p.status === "cancelled") return 0;
      return p.totalBudget / Math.max(monthsBetween(p.startDate, p.endDate), 1);
    },
    { description: "Budget spread evenly over the project span", rollup: "projectCosts" },
  );

  registry.register(
    "project",
    "milestone_calc",
    (p, ctx) =>
      activeInPeriod(p, ctx) ? sumInMonth(p.milestones, ctx, (m) => m.plannedDate, (m) => m.budget) : 0,
    { description: "Milestone budget planned for this month" },
  );
}
