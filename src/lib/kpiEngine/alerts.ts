/**
 * Threshold-based advisories derived from a KPI report.
 */

import type { AlertThresholds, KpiAlert, KpiReport } from "./types";

export const DEFAULT_ALERT_THRESHOLDS: AlertThresholds = {
  runwayCriticalMonths: 3,
  runwayWarningMonths: 6,
  burnRateWarning: 100_000,
  revenueConcentrationWarning: 0.8,
  cashFlowRiskInfo: 2,
};

const usd = new Intl.NumberFormat("en-US", {
  style: "currency",
  currency: "USD",
  minimumFractionDigits: 0,
  maximumFractionDigits: 0,
});

export function getKpiAlerts(
  kpis: KpiReport,
  thresholds: AlertThresholds = DEFAULT_ALERT_THRESHOLDS,
): KpiAlert[] {
  const alerts: KpiAlert[] = [];
  const runway = kpis.runwayMonths;

  if (runway < thresholds.runwayCriticalMonths) {
    alerts.push({
      level: "critical",
      metric: "runwayMonths",
      message: `Only ${runway.toFixed(1)} months of runway remaining`,
      recommendation: "Secure funding or cut expenses immediately",
    });
  } else if (runway < thresholds.runwayWarningMonths) {
    alerts.push({
      level: "warning",
      metric: "runwayMonths",
      message: `Runway is ${runway.toFixed(1)} months`,
      recommendation: "Start fundraising or plan cost reductions",
    });
  }

  if (kpis.burnRate > thresholds.burnRateWarning) {
    alerts.push({
      level: "warning",
      metric: "burnRate",
      message: `High burn rate: ${usd.format(kpis.burnRate)}/month`,
      recommendation: "Review the largest expense categories",
    });
  }

  if (kpis.revenueConcentrationRisk > thresholds.revenueConcentrationWarning) {
    alerts.push({
      level: "warning",
      metric: "revenueConcentrationRisk",
      message: `${(kpis.revenueConcentrationRisk * 100).toFixed(1)}% of revenue comes from one source`,
      recommendation: "Diversify revenue streams",
    });
  }

  if (kpis.cashFlowRisk > thresholds.cashFlowRiskInfo) {
    alerts.push({
      level: "info",
      metric: "cashFlowRisk",
      message: `Cash flow is volatile (risk ratio ${kpis.cashFlowRisk.toFixed(2)})`,
      recommendation: "Smooth timing of large payments where possible",
    });
  }

  return alerts;
}
