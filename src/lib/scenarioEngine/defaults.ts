/**
 * Built-in scenarios. Every ScenarioManager starts with these unless given
 * its own list.
 */

import type { Scenario } from "./schema";
import { defineScenario } from "./schema";

export const BASELINE_SCENARIO: Scenario = defineScenario({
  name: "baseline",
  description: "Current plan with standard overhead",
  assumptions: { revenueGrowthRate: 0.1, overheadMultiplier: 1.3, hiringDelayMonths: 0 },
});

export const OPTIMISTIC_SCENARIO: Scenario = defineScenario({
  name: "optimistic",
  description: "Stronger sales, leaner overhead, hiring a month early",
  assumptions: { revenueGrowthRate: 0.25, overheadMultiplier: 1.2, hiringDelayMonths: -1 },
  entityOverrides: [
    { entityType: "sale", field: "amount", multiplier: 1.5 },
    { entityType: "service", field: "monthlyAmount", multiplier: 1.2 },
  ],
});

export const CONSERVATIVE_SCENARIO: Scenario = defineScenario({
  name: "conservative",
  description: "Weaker revenue, heavier overhead, hiring two months late",
  assumptions: { revenueGrowthRate: 0.05, overheadMultiplier: 1.4, hiringDelayMonths: 2 },
  entityOverrides: [
    { entityType: "sale", field: "amount", multiplier: 0.8 },
    { entityType: "grant", field: "amount", multiplier: 0.9 },
  ],
});

export const CASH_PRESERVATION_SCENARIO: Scenario = defineScenario({
  name: "cash_preservation",
  description: "Cut non-essential spend, freeze bonuses, delay hiring six months",
  assumptions: { overheadMultiplier: 1.1, hiringDelayMonths: 6 },
  entityFilters: {
    excludeTags: ["non_essential"],
    excludePatterns: ["bonus", "stipend"],
  },
  entityOverrides: [
    { entityType: "employee", field: "bonusPerformanceMax", value: 0 },
    { entityType: "facility", field: "monthlyCost", multiplier: 0.9 },
  ],
});

export const DEFAULT_SCENARIOS: readonly Scenario[] = [
  BASELINE_SCENARIO,
  OPTIMISTIC_SCENARIO,
  CONSERVATIVE_SCENARIO,
  CASH_PRESERVATION_SCENARIO,
];
