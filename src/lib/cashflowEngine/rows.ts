/**
 * Sequential reduction from per-month totals to period rows.
 *
 * The running balance is only ever computed here, in month order, after
 * all months are gathered.
 */

import type { CategoryTotals } from "@/lib/calculatorRegistry";
import { EXPENSE_CATEGORIES, REVENUE_CATEGORIES } from "@/lib/calculatorRegistry";

import type { MonthTotals, PeriodRow } from "./types";

function percentChange(current: number, previous: number | undefined): number {
  if (previous === undefined || previous === 0) return 0;
  return ((current - previous) / previous) * 100;
}

export function sumRevenue(categories: CategoryTotals): number {
  let total = 0;
  for (const c of REVENUE_CATEGORIES) total += categories[c];
  return total;
}

export function sumExpenses(categories: CategoryTotals): number {
  let total = 0;
  for (const c of EXPENSE_CATEGORIES) total += categories[c];
  return total;
}

export function buildPeriodRows(months: readonly MonthTotals[], startingCash: number): PeriodRow[] {
  const rows: PeriodRow[] = [];
  let cumulative = 0;
  let previous: PeriodRow | undefined;

  for (const month of months) {
    const totalRevenue = sumRevenue(month.categories);
    const totalExpenses = sumExpenses(month.categories);
    const netCashFlow = totalRevenue - totalExpenses;
    cumulative += netCashFlow;

    const employees = month.activeEmployees || 1;
    const expenseBase = totalExpenses || 1;

    const row: PeriodRow = Object.freeze({
      period: month.period,
      ...month.categories,
      totalRevenue,
      totalExpenses,
      netCashFlow,
      cumulativeCashFlow: cumulative,
      cashBalance: startingCash + cumulative,
      activeEmployees: month.activeEmployees,
      activeProjects: month.activeProjects,
      revenueGrowthRate: percentChange(totalRevenue, previous?.totalRevenue),
      expenseGrowthRate: percentChange(totalExpenses, previous?.totalExpenses),
      revenuePerEmployee: totalRevenue / employees,
      costPerEmployee: month.categories.employeeCosts / employees,
      employeeCostPercentage: (month.categories.employeeCosts / expenseBase) * 100,
      facilityCostPercentage: (month.categories.facilityCosts / expenseBase) * 100,
      projectCostPercentage: (month.categories.projectCosts / expenseBase) * 100,
    });
    rows.push(row);
    previous = row;
  }

  return rows;
}
