/**
 * Post-hoc views over a produced period table. No recomputation.
 */

import type { ExpenseCategory, RevenueCategory } from "@/lib/calculatorRegistry";
import type { IsoDate } from "@/lib/dates";

import type { PeriodRow } from "./types";

type Columns<K extends keyof PeriodRow> = Pick<PeriodRow, "period" | K>;

export type RevenueView = Columns<RevenueCategory>;
export type ExpenseView = Columns<ExpenseCategory>;
export type SummaryView = Columns<"totalRevenue" | "totalExpenses" | "netCashFlow" | "cashBalance">;
export type GrowthView = Columns<"revenueGrowthRate" | "expenseGrowthRate" | "revenuePerEmployee">;

export interface CategoryAggregation {
  revenue: RevenueView[];
  expenses: ExpenseView[];
  summary: SummaryView[];
  growth: GrowthView[];
}

export function aggregateByCategory(rows: readonly PeriodRow[]): CategoryAggregation {
  return {
    revenue: rows.map((r) => ({
      period: r.period,
      grantRevenue: r.grantRevenue,
      investmentRevenue: r.investmentRevenue,
      salesRevenue: r.salesRevenue,
      serviceRevenue: r.serviceRevenue,
    })),
    expenses: rows.map((r) => ({
      period: r.period,
      employeeCosts: r.employeeCosts,
      facilityCosts: r.facilityCosts,
      softwareCosts: r.softwareCosts,
      equipmentCosts: r.equipmentCosts,
      projectCosts: r.projectCosts,
    })),
    summary: rows.map((r) => ({
      period: r.period,
      totalRevenue: r.totalRevenue,
      totalExpenses: r.totalExpenses,
      netCashFlow: r.netCashFlow,
      cashBalance: r.cashBalance,
    })),
    growth: rows.map((r) => ({
      period: r.period,
      revenueGrowthRate: r.revenueGrowthRate,
      expenseGrowthRate: r.expenseGrowthRate,
      revenuePerEmployee: r.revenuePerEmployee,
    })),
  };
}

export interface CalculationSummary {
  totalPeriods: number;
  startPeriod: IsoDate | null;
  endPeriod: IsoDate | null;
  totalRevenue: number;
  totalExpenses: number;
  netCashFlow: number;
  finalCashBalance: number;
  averageMonthlyRevenue: number;
  averageMonthlyExpenses: number;
  /** Mean outflow over months with negative net cash flow. */
  averageMonthlyBurn: number;
  peakEmployees: number;
  peakProjects: number;
  monthsPositive: number;
  monthsNegative: number;
}

export function getCalculationSummary(rows: readonly PeriodRow[]): CalculationSummary {
  let totalRevenue = 0;
  let totalExpenses = 0;
  let burnTotal = 0;
  let monthsPositive = 0;
  let monthsNegative = 0;
  let peakEmployees = 0;
  let peakProjects = 0;

  for (const row of rows) {
    totalRevenue += row.totalRevenue;
    totalExpenses += row.totalExpenses;
    if (row.netCashFlow > 0) monthsPositive += 1;
    if (row.netCashFlow < 0) {
      monthsNegative += 1;
      burnTotal += -row.netCashFlow;
    }
    peakEmployees = Math.max(peakEmployees, row.activeEmployees);
    peakProjects = Math.max(peakProjects, row.activeProjects);
  }

  const n = rows.length;
  const last = rows.at(-1);
  return {
    totalPeriods: n,
    startPeriod: rows[0]?.period ?? null,
    endPeriod: last?.period ?? null,
    totalRevenue,
    totalExpenses,
    netCashFlow: totalRevenue - totalExpenses,
    finalCashBalance: last?.cashBalance ?? 0,
    averageMonthlyRevenue: n > 0 ? totalRevenue / n : 0,
    averageMonthlyExpenses: n > 0 ? totalExpenses / n : 0,
    averageMonthlyBurn: monthsNegative > 0 ? burnTotal / monthsNegative : 0,
    peakEmployees,
    peakProjects,
    monthsPositive,
    monthsNegative,
  };
}
