export interface FinancialKpis {
  /** Infinity when the trailing burn is not positive. */
  runwayMonths: number;
  burnRate: number;
  currentBurnRate: number;
  cashEfficiency: number;
  /** Months until the first cash-positive month; Infinity if none. */
  monthsToBreakeven: number;
  cashFlowVolatility: number;
  workingCapital: number;
}

export interface GrowthKpis {
  revenueGrowthRate: number;
  revenueTrend: number;
  averageDealSize: number;
  revenueDiversification: number;
}

export interface OperationalKpis {
  averageTeamSize: number;
  peakTeamSize: number;
  teamGrowthRate: number;
  averageActiveProjects: number;
  peakActiveProjects: number;
  rdPercentage: number;
  facilityCostPercentage: number;
  technologyCostPercentage: number;
}

export interface EfficiencyKpis {
  revenuePerEmployee: number;
  costPerEmployee: number;
  employeeCostEfficiency: number;
  projectCostRatio: number;
  operatingLeverage: number;
}

export interface RiskKpis {
  cashFlowRisk: number;
  revenueConcentrationRisk: number;
  costFlexibility: number;
  fundingDependency: number;
}

export type KpiReport = FinancialKpis & GrowthKpis & OperationalKpis & EfficiencyKpis & RiskKpis;

export type KpiName = keyof KpiReport;

export interface KpiOptions {
  /** Trailing months used for burn rate and runway. */
  burnWindowMonths?: number;
}

export type AlertLevel = "critical" | "warning" | "info";

export interface KpiAlert {
  level: AlertLevel;
  metric: KpiName;
  message: string;
  recommendation: string;
}

export interface AlertThresholds {
  runwayCriticalMonths: number;
  runwayWarningMonths: number;
  burnRateWarning: number;
  revenueConcentrationWarning: number;
  cashFlowRiskInfo: number;
}

export interface KpiTrendPoint {
  period: string;
  revenue: number;
  expenses: number;
  netCashFlow: number;
  burnRate: number;
  /** Percent change of rolling revenue against the previous point. */
  revenueMomentum: number;
}
