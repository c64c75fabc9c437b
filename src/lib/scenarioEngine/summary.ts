import type { PeriodRow } from "@/lib/cashflowEngine";
import { getCalculationSummary } from "@/lib/cashflowEngine";
import type { IsoDate } from "@/lib/dates";

export interface ScenarioSummaryRow {
  scenario: string;
  totalRevenue: number;
  totalExpenses: number;
  netCashFlow: number;
  finalCashBalance: number;
  minCashBalance: number;
  monthsNegative: number;
  /** First month with positive net cash flow, if any. */
  breakevenPeriod: IsoDate | null;
}

export function createScenarioSummary(
  results: Readonly<Record<string, readonly PeriodRow[]>>,
): ScenarioSummaryRow[] {
  return Object.entries(results).map(([scenario, rows]) => {
    const summary = getCalculationSummary(rows);
    return {
      scenario,
      totalRevenue: summary.totalRevenue,
      totalExpenses: summary.totalExpenses,
      netCashFlow: summary.netCashFlow,
      finalCashBalance: summary.finalCashBalance,
      minCashBalance: rows.length === 0 ? 0 : Math.min(...rows.map((r) => r.cashBalance)),
      monthsNegative: summary.monthsNegative,
      breakevenPeriod: rows.find((r) => r.netCashFlow > 0)?.period ?? null,
    };
  });
}
