/**
 * Cash flow rollup categories.
 *
 * A calculator may declare one category; the engine adds its numeric result
 * to that column of the period row. Calculators without a category are
 * informational (breakdowns, compensation, cap-table metrics).
 */

export const REVENUE_CATEGORIES = [
  "grantRevenue",
  "investmentRevenue",
  "salesRevenue",
  "serviceRevenue",
] as const;

export const EXPENSE_CATEGORIES = [
  "employeeCosts",
  "facilityCosts",
  "softwareCosts",
  "equipmentCosts",
  "projectCosts",
] as const;

export type RevenueCategory = (typeof REVENUE_CATEGORIES)[number];
export type ExpenseCategory = (typeof EXPENSE_CATEGORIES)[number];
export type CashFlowCategory = RevenueCategory | ExpenseCategory;

export type CategoryTotals = Record<CashFlowCategory, number>;

export function emptyCategoryTotals(): CategoryTotals {
  return {
    grantRevenue: 0,
    investmentRevenue: 0,
    salesRevenue: 0,
    serviceRevenue: 0,
    employeeCosts: 0,
    facilityCosts: 0,
    softwareCosts: 0,
    equipmentCosts: 0,
    projectCosts: 0,
  };
}

const REVENUE_SET: ReadonlySet<CashFlowCategory> = new Set<CashFlowCategory>(REVENUE_CATEGORIES);

export function isRevenueCategory(category: CashFlowCategory): category is RevenueCategory {
  return REVENUE_SET.has(category);
}
