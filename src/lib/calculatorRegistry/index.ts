export type {
  CalculatorValue,
  CalculationContext,
  CalculatorFn,
  CalculatorOptions,
  CalculatorMetadata,
  CalculatorDiagnostic,
  CalculateAllResult,
} from "./types";
export type { CashFlowCategory, RevenueCategory, ExpenseCategory, CategoryTotals } from "./categories";
export {
  REVENUE_CATEGORIES,
  EXPENSE_CATEGORIES,
  emptyCategoryTotals,
  isRevenueCategory,
} from "./categories";
export type { ContextInit } from "./context";
export { createCalculationContext, withDependencies, dependencyValue, paramValue } from "./context";
export { resolveCalculatorOrder } from "./resolver";
export type { DependencyNode } from "./resolver";
export { CalculatorRegistry, createCalculatorRegistry } from "./registry";
