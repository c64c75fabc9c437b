import type { CalculatorDiagnostic, CategoryTotals } from "@/lib/calculatorRegistry";
import type { IsoDate } from "@/lib/dates";

/** One calendar month of the forecast. */
export interface PeriodRow extends CategoryTotals {
  readonly period: IsoDate;
  readonly totalRevenue: number;
  readonly totalExpenses: number;
  readonly netCashFlow: number;
  readonly cumulativeCashFlow: number;
  readonly cashBalance: number;
  readonly activeEmployees: number;
  readonly activeProjects: number;
  /** Percent change against the previous month; 0 when that month had none. */
  readonly revenueGrowthRate: number;
  readonly expenseGrowthRate: number;
  readonly revenuePerEmployee: number;
  readonly costPerEmployee: number;
  readonly employeeCostPercentage: number;
  readonly facilityCostPercentage: number;
  readonly projectCostPercentage: number;
}

/** Per-month result of the fan-out step, before the sequential reduction. */
export interface MonthTotals {
  period: IsoDate;
  categories: CategoryTotals;
  activeEmployees: number;
  activeProjects: number;
  diagnostics: CalculatorDiagnostic[];
}

export interface PeriodDiagnostic extends CalculatorDiagnostic {
  period: IsoDate;
}

export interface CashFlowResult {
  rows: readonly PeriodRow[];
  diagnostics: readonly PeriodDiagnostic[];
}

export interface DetailedCashFlowResult extends CashFlowResult {
  fromCache: boolean;
}

export interface CalculatePeriodOptions {
  scenario?: string;
  /** Calculator parameters (scenario assumptions, share_price, ...). */
  params?: Readonly<Record<string, number>>;
}

export interface ParallelOptions extends CalculatePeriodOptions {
  maxWorkers?: number;
}

export interface CashFlowEngineOptions {
  startingCash?: number;
  maxWorkers?: number;
  defaultScenario?: string;
}
