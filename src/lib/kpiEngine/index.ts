export type {
  FinancialKpis,
  GrowthKpis,
  OperationalKpis,
  EfficiencyKpis,
  RiskKpis,
  KpiReport,
  KpiName,
  KpiOptions,
  KpiAlert,
  AlertLevel,
  AlertThresholds,
  KpiTrendPoint,
} from "./types";
export {
  DEFAULT_BURN_WINDOW_MONTHS,
  calculateAllKpis,
  calculateRunway,
  calculateBurnRate,
  calculateMonthsToBreakeven,
  compoundGrowthRate,
  calculateFinancialKpis,
  calculateGrowthKpis,
  calculateOperationalKpis,
  calculateEfficiencyKpis,
  calculateRiskKpis,
} from "./kpis";
export { DEFAULT_ALERT_THRESHOLDS, getKpiAlerts } from "./alerts";
export { calculateKpiTrends } from "./trends";
export { safeDivide, mean, sampleStd, linearSlope } from "./math";
