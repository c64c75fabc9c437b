/**
 * KPI Calculator
 *
 * Pure functions of a period table and a starting balance. Ratios go
 * through safeDivide so callers never see NaN; runway and breakeven use
 * Infinity to mean "never".
 */

import type { PeriodRow } from "@/lib/cashflowEngine";

import { linearSlope, mean, safeDivide, sampleStd, sum } from "./math";
import type {
  EfficiencyKpis,
  FinancialKpis,
  GrowthKpis,
  KpiOptions,
  KpiReport,
  OperationalKpis,
  RiskKpis,
} from "./types";

export const DEFAULT_BURN_WINDOW_MONTHS = 3;

function column(rows: readonly PeriodRow[], pick: (row: PeriodRow) => number): number[] {
  return rows.map(pick);
}

function revenueSources(rows: readonly PeriodRow[]): number[] {
  return [
    sum(column(rows, (r) => r.grantRevenue)),
    sum(column(rows, (r) => r.investmentRevenue)),
    sum(column(rows, (r) => r.salesRevenue)),
    sum(column(rows, (r) => r.serviceRevenue)),
  ];
}

function trailing(rows: readonly PeriodRow[], months: number): readonly PeriodRow[] {
  return rows.slice(Math.max(rows.length - months, 0));
}

// ---------------------------------------------------------------------------
// Financial
// ---------------------------------------------------------------------------

/**
 * Months until cash runs out. If the table itself crosses zero, the crossing
 * month is interpolated; otherwise the final balance is divided by the
 * trailing average burn.
 */
export function calculateRunway(rows: readonly PeriodRow[], startingCash: number, windowMonths: number): number {
  if (rows.length === 0) return 0;

  let cash = startingCash;
  for (let i = 0; i < rows.length; i++) {
    const before = cash;
    const net = rows[i].netCashFlow;
    cash += net;
    if (cash <= 0) {
      return net < 0 ? Math.max(0, i + before / -net) : i;
    }
  }

  const burn = -mean(column(trailing(rows, windowMonths), (r) => r.netCashFlow));
  if (burn <= 0) return Number.POSITIVE_INFINITY;
  return cash / burn;
}

/**
 * Months until cumulative flow is back to zero: the 1-based month where that
 * happens, else the remaining deficit extrapolated at the trailing three-month
 * average. Infinity when that average is not positive.
 */
export function calculateMonthsToBreakeven(rows: readonly PeriodRow[]): number {
  const reached = rows.findIndex((r) => r.cumulativeCashFlow >= 0);
  if (reached !== -1) return reached + 1;
  if (rows.length < 2) return Number.POSITIVE_INFINITY;

  const recent = mean(column(trailing(rows, 3), (r) => r.netCashFlow));
  if (recent <= 0) return Number.POSITIVE_INFINITY;
  const deficit = Math.abs(rows[rows.length - 1].cumulativeCashFlow);
  return rows.length + deficit / recent;
}

/** Compound per-period growth in percent; 0 without a positive start. */
export function compoundGrowthRate(series: readonly number[]): number {
  if (series.length < 2) return 0;
  const start = series[0];
  const end = series[series.length - 1];
  if (start <= 0 || end < 0) return 0;
  const rate = ((end / start) ** (1 / (series.length - 1)) - 1) * 100;
  return Number.isFinite(rate) ? rate : 0;
}

export function calculateBurnRate(rows: readonly PeriodRow[], windowMonths: number): number {
  const outflows = trailing(rows, windowMonths)
    .map((r) => r.netCashFlow)
    .filter((net) => net < 0);
  return outflows.length === 0 ? 0 : -mean(outflows);
}

export function calculateFinancialKpis(
  rows: readonly PeriodRow[],
  startingCash: number,
  windowMonths: number,
): FinancialKpis {
  const nets = column(rows, (r) => r.netCashFlow);
  const lastNet = nets.at(-1) ?? 0;
  const consumed = -sum(nets.filter((n) => n < 0));

  return {
    runwayMonths: calculateRunway(rows, startingCash, windowMonths),
    burnRate: calculateBurnRate(rows, windowMonths),
    currentBurnRate: lastNet < 0 ? -lastNet : 0,
    cashEfficiency: safeDivide(sum(column(rows, (r) => r.totalRevenue)), consumed),
    monthsToBreakeven: calculateMonthsToBreakeven(rows),
    cashFlowVolatility: sampleStd(nets),
    workingCapital: startingCash + sum(nets),
  };
}

// ---------------------------------------------------------------------------
// Growth
// ---------------------------------------------------------------------------

export function calculateGrowthKpis(rows: readonly PeriodRow[]): GrowthKpis {
  const revenue = column(rows, (r) => r.totalRevenue);
  const n = revenue.length;
  const previous = n >= 2 ? revenue[n - 2] : 0;
  const latest = n >= 1 ? revenue[n - 1] : 0;

  const sales = sum(column(rows, (r) => r.salesRevenue));
  const sources = revenueSources(rows);
  const total = sum(sources);
  const herfindahl = sum(sources.map((s) => safeDivide(s, total) ** 2));

  return {
    revenueGrowthRate: safeDivide(latest - previous, previous) * 100,
    revenueTrend: linearSlope(revenue),
    // Sales spread over every month of the table, not just months with a sale.
    averageDealSize: sales > 0 ? sales / n : 0,
    revenueDiversification: total === 0 ? 0 : 1 - herfindahl,
  };
}

// ---------------------------------------------------------------------------
// Operational
// ---------------------------------------------------------------------------

export function calculateOperationalKpis(rows: readonly PeriodRow[]): OperationalKpis {
  const team = column(rows, (r) => r.activeEmployees);
  const projects = column(rows, (r) => r.activeProjects);
  const expenses = sum(column(rows, (r) => r.totalExpenses));

  return {
    averageTeamSize: mean(team),
    peakTeamSize: team.length === 0 ? 0 : Math.max(...team),
    teamGrowthRate: compoundGrowthRate(team),
    averageActiveProjects: mean(projects),
    peakActiveProjects: projects.length === 0 ? 0 : Math.max(...projects),
    rdPercentage: safeDivide(sum(column(rows, (r) => r.projectCosts)), expenses) * 100,
    facilityCostPercentage: safeDivide(sum(column(rows, (r) => r.facilityCosts)), expenses) * 100,
    technologyCostPercentage:
      safeDivide(sum(column(rows, (r) => r.softwareCosts + r.equipmentCosts)), expenses) * 100,
  };
}

// ---------------------------------------------------------------------------
// Efficiency
// ---------------------------------------------------------------------------

export function calculateEfficiencyKpis(rows: readonly PeriodRow[]): EfficiencyKpis {
  const revenue = sum(column(rows, (r) => r.totalRevenue));
  const expenses = sum(column(rows, (r) => r.totalExpenses));
  const later = rows.slice(1);

  return {
    revenuePerEmployee: mean(column(rows, (r) => r.revenuePerEmployee)),
    costPerEmployee: mean(column(rows, (r) => r.costPerEmployee)),
    employeeCostEfficiency: safeDivide(revenue, sum(column(rows, (r) => r.employeeCosts))),
    projectCostRatio: safeDivide(sum(column(rows, (r) => r.projectCosts)), expenses),
    // Average revenue growth per unit of average expense growth.
    operatingLeverage: safeDivide(
      mean(column(later, (r) => r.revenueGrowthRate)),
      mean(column(later, (r) => r.expenseGrowthRate)),
    ),
  };
}

// ---------------------------------------------------------------------------
// Risk
// ---------------------------------------------------------------------------

export function calculateRiskKpis(rows: readonly PeriodRow[]): RiskKpis {
  const nets = column(rows, (r) => r.netCashFlow);
  const sources = revenueSources(rows);
  const revenue = sum(sources);
  const expenses = sum(column(rows, (r) => r.totalExpenses));
  const flexible = sum(column(rows, (r) => r.projectCosts + r.softwareCosts + r.equipmentCosts));

  return {
    cashFlowRisk: safeDivide(sampleStd(nets), Math.abs(mean(nets))),
    revenueConcentrationRisk: revenue === 0 ? 0 : Math.max(...sources.map((s) => s / revenue)),
    costFlexibility: safeDivide(flexible, expenses),
    fundingDependency: safeDivide(sources[0] + sources[1], revenue),
  };
}

// ---------------------------------------------------------------------------
// All
// ---------------------------------------------------------------------------

export function calculateAllKpis(
  rows: readonly PeriodRow[],
  startingCash: number,
  options: KpiOptions = {},
): KpiReport {
  const windowMonths = options.burnWindowMonths ?? DEFAULT_BURN_WINDOW_MONTHS;
  return {
    ...calculateFinancialKpis(rows, startingCash, windowMonths),
    ...calculateGrowthKpis(rows),
    ...calculateOperationalKpis(rows),
    ...calculateEfficiencyKpis(rows),
    ...calculateRiskKpis(rows),
  };
}
