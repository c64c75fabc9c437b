export type {
  PeriodRow,
  MonthTotals,
  PeriodDiagnostic,
  CashFlowResult,
  DetailedCashFlowResult,
  CalculatePeriodOptions,
  ParallelOptions,
  CashFlowEngineOptions,
} from "./types";
export { CashFlowEngine, DEFAULT_MAX_WORKERS, DEFAULT_SCENARIO } from "./engine";
export { computeMonthTotals } from "./periodTotals";
export { buildPeriodRows, sumRevenue, sumExpenses } from "./rows";
export type {
  CategoryAggregation,
  CalculationSummary,
  RevenueView,
  ExpenseView,
  SummaryView,
  GrowthView,
} from "./aggregation";
export { aggregateByCategory, getCalculationSummary } from "./aggregation";
