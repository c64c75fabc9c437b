/**
 * KPI Calculator tests.
 *
 * Tables are built straight from month totals so the KPIs are checked
 * independently of the engine that normally produces them.
 *
 * Run: node --import tsx --test src/lib/kpiEngine/__tests__/kpiEngine.test.ts
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { emptyCategoryTotals } from "@/lib/calculatorRegistry";
import type { MonthTotals } from "@/lib/cashflowEngine";
import { buildPeriodRows } from "@/lib/cashflowEngine";
import {
  calculateAllKpis,
  calculateKpiTrends,
  calculateMonthsToBreakeven,
  calculateRunway,
  compoundGrowthRate,
  getKpiAlerts,
} from "../index";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

function month(period: string, patch: Partial<MonthTotals["categories"]>, employees: number): MonthTotals {
  return {
    period,
    categories: { ...emptyCategoryTotals(), ...patch },
    activeEmployees: employees,
    activeProjects: 0,
    diagnostics: [],
  };
}

/** Three months burning 20000 each. */
const BURNING = buildPeriodRows(
  [
    month("2024-01-01", { employeeCosts: 20_000, facilityCosts: 5000, salesRevenue: 5000 }, 2),
    month("2024-02-01", { employeeCosts: 20_000, facilityCosts: 5000, salesRevenue: 5000 }, 2),
    month("2024-03-01", { employeeCosts: 20_000, facilityCosts: 5000, projectCosts: 5000, grantRevenue: 10_000 }, 4),
  ],
  0,
);

const PROFITABLE = buildPeriodRows(
  [
    month("2024-01-01", { employeeCosts: 10_000, serviceRevenue: 15_000 }, 1),
    month("2024-02-01", { employeeCosts: 10_000, serviceRevenue: 8000, salesRevenue: 8000 }, 1),
  ],
  0,
);

function approx(actual: number, expected: number): void {
  assert.ok(Math.abs(actual - expected) < 1e-9, `${actual} != ${expected}`);
}

// ---------------------------------------------------------------------------
// KPIs
// ---------------------------------------------------------------------------

describe("calculateAllKpis", () => {
  const kpis = calculateAllKpis(BURNING, 100_000);

  it("computes financial KPIs", () => {
    assert.equal(kpis.runwayMonths, 2);
    assert.equal(kpis.burnRate, 20_000);
    assert.equal(kpis.currentBurnRate, 20_000);
    assert.equal(kpis.cashEfficiency, 20_000 / 60_000);
    assert.equal(kpis.monthsToBreakeven, Number.POSITIVE_INFINITY);
    assert.equal(kpis.cashFlowVolatility, 0);
    assert.equal(kpis.workingCapital, 40_000);
  });

  it("computes growth KPIs", () => {
    assert.equal(kpis.revenueGrowthRate, 100);
    approx(kpis.revenueTrend, 2500);
    assert.equal(kpis.averageDealSize, 10_000 / 3);
    assert.equal(kpis.revenueDiversification, 0.5);
  });

  it("computes operational KPIs", () => {
    assert.equal(kpis.averageTeamSize, 8 / 3);
    assert.equal(kpis.peakTeamSize, 4);
    assert.equal(kpis.teamGrowthRate, ((4 / 2) ** (1 / 2) - 1) * 100);
    assert.equal(kpis.rdPercentage, 6.25);
    assert.equal(kpis.facilityCostPercentage, 18.75);
    assert.equal(kpis.technologyCostPercentage, 0);
  });

  it("computes efficiency KPIs", () => {
    assert.equal(kpis.revenuePerEmployee, 2500);
    assert.equal(kpis.costPerEmployee, 25_000 / 3);
    assert.equal(kpis.employeeCostEfficiency, 20_000 / 60_000);
    assert.equal(kpis.projectCostRatio, 0.0625);
    assert.equal(kpis.operatingLeverage, 5);
  });

  it("computes risk KPIs", () => {
    assert.equal(kpis.cashFlowRisk, 0);
    assert.equal(kpis.revenueConcentrationRisk, 0.5);
    assert.equal(kpis.costFlexibility, 0.0625);
    assert.equal(kpis.fundingDependency, 0.5);
  });

  it("reports infinite runway and no burn when cash-positive", () => {
    const positive = calculateAllKpis(PROFITABLE, 10_000);
    assert.equal(positive.runwayMonths, Number.POSITIVE_INFINITY);
    assert.equal(positive.burnRate, 0);
    assert.equal(positive.monthsToBreakeven, 1);
    assert.equal(positive.cashEfficiency, 0);
  });

  it("never returns NaN, even for an empty table", () => {
    const empty = calculateAllKpis([], 1000);
    for (const [name, value] of Object.entries(empty)) {
      assert.equal(Number.isNaN(value), false, name);
    }
    assert.equal(empty.runwayMonths, 0);
    assert.equal(empty.workingCapital, 1000);
  });

  it("limits burn rate to the trailing window", () => {
    const rows = buildPeriodRows(
      [
        month("2024-01-01", { employeeCosts: 90_000 }, 1),
        month("2024-02-01", { employeeCosts: 10_000 }, 1),
      ],
      0,
    );
    assert.equal(calculateAllKpis(rows, 1_000_000, { burnWindowMonths: 1 }).burnRate, 10_000);
    assert.equal(calculateAllKpis(rows, 1_000_000).burnRate, 50_000);
  });
});

describe("calculateMonthsToBreakeven", () => {
  it("returns the 1-based month where cumulative flow reaches zero", () => {
    const rows = buildPeriodRows(
      [
        month("2024-01-01", { employeeCosts: 10_000 }, 1),
        month("2024-02-01", { salesRevenue: 10_000 }, 1),
      ],
      0,
    );
    assert.equal(calculateMonthsToBreakeven(rows), 2);
  });

  it("extrapolates the remaining deficit at the trailing average", () => {
    const rows = buildPeriodRows(
      [
        month("2024-01-01", { employeeCosts: 30_000 }, 1),
        month("2024-02-01", { salesRevenue: 5000 }, 1),
        month("2024-03-01", { salesRevenue: 5000 }, 1),
        month("2024-04-01", { salesRevenue: 5000 }, 1),
      ],
      0,
    );
    assert.equal(calculateMonthsToBreakeven(rows), 7);
  });

  it("is infinite while the trailing average still burns", () => {
    assert.equal(calculateMonthsToBreakeven(BURNING), Number.POSITIVE_INFINITY);
    assert.equal(calculateMonthsToBreakeven(BURNING.slice(0, 1)), Number.POSITIVE_INFINITY);
  });
});

describe("compoundGrowthRate", () => {
  it("compounds over the number of periods", () => {
    assert.equal(compoundGrowthRate([2, 3, 8]), 100);
    assert.equal(compoundGrowthRate([4, 4]), 0);
  });

  it("is 0 without a positive starting value", () => {
    assert.equal(compoundGrowthRate([0, 5, 10]), 0);
    assert.equal(compoundGrowthRate([7]), 0);
  });
});

describe("average deal size", () => {
  it("spreads sales over every month of the table", () => {
    const rows = buildPeriodRows(
      [
        month("2024-01-01", { salesRevenue: 9000 }, 1),
        month("2024-02-01", {}, 1),
        month("2024-03-01", { salesRevenue: 3000 }, 1),
      ],
      0,
    );
    assert.equal(calculateAllKpis(rows, 0).averageDealSize, 4000);
  });
});

describe("calculateRunway", () => {
  it("interpolates the month in which cash crosses zero", () => {
    assert.equal(calculateRunway(BURNING, 30_000, 3), 1.5);
  });

  it("is zero when starting cash is already exhausted", () => {
    assert.equal(calculateRunway(BURNING, -5000, 3), 0);
  });
});

// ---------------------------------------------------------------------------
// Alerts
// ---------------------------------------------------------------------------

describe("getKpiAlerts", () => {
  it("raises a critical alert for runway under three months", () => {
    assert.deepEqual(getKpiAlerts(calculateAllKpis(BURNING, 100_000)), [
      {
        level: "critical",
        metric: "runwayMonths",
        message: "Only 2.0 months of runway remaining",
        recommendation: "Secure funding or cut expenses immediately",
      },
    ]);
  });

  it("raises warnings and info by threshold", () => {
    const kpis = {
      ...calculateAllKpis(BURNING, 100_000),
      runwayMonths: 4.5,
      burnRate: 150_000,
      revenueConcentrationRisk: 0.9,
      cashFlowRisk: 2.5,
    };
    assert.deepEqual(
      getKpiAlerts(kpis).map((a) => [a.level, a.message]),
      [
        ["warning", "Runway is 4.5 months"],
        ["warning", "High burn rate: $150,000/month"],
        ["warning", "90.0% of revenue comes from one source"],
        ["info", "Cash flow is volatile (risk ratio 2.50)"],
      ],
    );
  });

  it("is silent for a healthy business", () => {
    assert.deepEqual(getKpiAlerts(calculateAllKpis(PROFITABLE, 10_000)), []);
  });
});

// ---------------------------------------------------------------------------
// Trends
// ---------------------------------------------------------------------------

describe("calculateKpiTrends", () => {
  it("emits rolling means from the first full window", () => {
    assert.deepEqual(calculateKpiTrends(BURNING, 2), [
      {
        period: "2024-02-01",
        revenue: 5000,
        expenses: 25_000,
        netCashFlow: -20_000,
        burnRate: 20_000,
        revenueMomentum: 0,
      },
      {
        period: "2024-03-01",
        revenue: 7500,
        expenses: 27_500,
        netCashFlow: -20_000,
        burnRate: 20_000,
        revenueMomentum: 50,
      },
    ]);
  });

  it("is empty when the table is shorter than the window", () => {
    assert.deepEqual(calculateKpiTrends(PROFITABLE, 3), []);
  });
});
