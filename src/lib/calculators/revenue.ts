/**
 * Revenue calculators: grants, investments, sales and services.
 */

import type { CalculatorRegistry } from "@/lib/calculatorRegistry";
import { daysBetween, isSameMonth, monthsBetween } from "@/lib/dates";

import { activeInPeriod, sumInMonth } from "./shared";

/** Spread for an open-ended grant without a payment schedule. */
export const DEFAULT_GRANT_MONTHS = 24;

export function registerRevenueCalculators(registry: CalculatorRegistry): void {
  // -------------------------------------------------------------------------
  // Grant
  // -------------------------------------------------------------------------

  registry.register(
    "grant",
    "disbursement_calc",
    (g, ctx) => {
      if (!activeInPeriod(g, ctx)) return 0;
      if (g.paymentSchedule.length > 0) {
        return sumInMonth(g.paymentSchedule, ctx, (p) => p.date, (p) => p.amount);
      }
      const months = g.endDate === null ? DEFAULT_GRANT_MONTHS : Math.max(monthsBetween(g.startDate, g.endDate), 1);
      return g.amount / months;
    },
    { description: "Scheduled or evenly spread grant disbursement", rollup: "grantRevenue" },
  );

  registry.register(
    "grant",
    "milestone_calc",
    (g, ctx) =>
      activeInPeriod(g, ctx) ? sumInMonth(g.milestones, ctx, (m) => m.dueDate, (m) => m.amount ?? 0) : 0,
    { description: "Grant milestone payments due this month" },
  );

  // -------------------------------------------------------------------------
  // Investment
  // -------------------------------------------------------------------------

  registry.register(
    "investment",
    "disbursement_calc",
    (inv, ctx) => {
      if (!activeInPeriod(inv, ctx)) return 0;
      if (inv.disbursementSchedule.length > 0) {
        return sumInMonth(inv.disbursementSchedule, ctx, (d) => d.date, (d) => d.amount);
      }
      return isSameMonth(inv.startDate, ctx.asOfDate) ? inv.amount : 0;
    },
    { description: "Scheduled tranches, else a lump sum at start", rollup: "investmentRevenue" },
  );

  // -------------------------------------------------------------------------
  // Sale
  // -------------------------------------------------------------------------

  registry.register(
    "sale",
    "revenue_calc",
    (s, ctx) => {
      if (!activeInPeriod(s, ctx)) return 0;
      return isSameMonth(s.deliveryDate ?? s.startDate, ctx.asOfDate) ? s.amount : 0;
    },
    { description: "Sale amount recognized in the delivery month", rollup: "salesRevenue" },
  );

  // -------------------------------------------------------------------------
  // Service
  // -------------------------------------------------------------------------

  registry.register(
    "service",
    "recurring_calc",
    (s, ctx) => {
      if (!activeInPeriod(s, ctx)) return 0;
      if (s.monthlyAmount !== undefined && s.monthlyAmount > 0) return s.monthlyAmount;
      if (s.hourlyRate !== undefined && s.hoursPerMonth !== undefined) return s.hourlyRate * s.hoursPerMonth;
      if (s.contractValue !== undefined) {
        if (s.endDate === null || daysBetween(s.startDate, s.endDate) >= 365) return s.contractValue / 12;
        return s.contractValue / Math.max(monthsBetween(s.startDate, s.endDate), 1);
      }
      return 0;
    },
    { description: "Monthly service revenue", rollup: "serviceRevenue" },
  );
}
