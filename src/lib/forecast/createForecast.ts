/**
 * Composition root: one registry, one engine and one scenario manager per
 * entity store, configured from the environment.
 */

import type { CapTableSummary, SummaryOptions } from "@/lib/capTable";
import { generateCapTableSummary, registerCapTableCalculators } from "@/lib/capTable";
import type { CalculatorRegistry } from "@/lib/calculatorRegistry";
import { createCalculatorRegistry } from "@/lib/calculatorRegistry";
import { registerBuiltinCalculators } from "@/lib/calculators";
import type { CalculatePeriodOptions, PeriodRow } from "@/lib/cashflowEngine";
import { CashFlowEngine } from "@/lib/cashflowEngine";
import type { IsoDate } from "@/lib/dates";
import type { EntityStore } from "@/lib/entityStore";
import type { ForecastConfig } from "@/lib/env";
import { forecastConfig } from "@/lib/env";
import { ForecastConfigError } from "@/lib/errors";
import type { KpiAlert, KpiReport } from "@/lib/kpiEngine";
import { calculateAllKpis, getKpiAlerts } from "@/lib/kpiEngine";
import { ScenarioManager } from "@/lib/scenarioEngine";

export interface ForecastKpis {
  rows: readonly PeriodRow[];
  kpis: KpiReport;
  alerts: KpiAlert[];
}

export interface Forecast {
  readonly config: ForecastConfig;
  readonly registry: CalculatorRegistry;
  readonly engine: CashFlowEngine;
  readonly scenarios: ScenarioManager;
  kpis(start: IsoDate, end: IsoDate, options?: CalculatePeriodOptions): ForecastKpis;
  capTable(asOfDate?: IsoDate, options?: SummaryOptions): CapTableSummary;
}

export function createForecastRegistry(): CalculatorRegistry {
  return registerCapTableCalculators(registerBuiltinCalculators(createCalculatorRegistry()));
}

export async function createForecast(
  store: EntityStore,
  config: ForecastConfig = forecastConfig(),
): Promise<Forecast> {
  const registry = createForecastRegistry();
  const engine = new CashFlowEngine(store, registry, {
    startingCash: config.startingCash,
    maxWorkers: config.maxWorkers,
    defaultScenario: config.defaultScenario,
  });
  const scenarios = new ScenarioManager(engine);

  if (config.scenariosDir !== null) {
    const loaded = await scenarios.loadScenariosFromDirectory(config.scenariosDir);
    console.info("[forecast] loaded scenario files", { dir: config.scenariosDir, scenarios: loaded });
  }

  if (scenarios.getScenario(config.defaultScenario) === null) {
    throw new ForecastConfigError(
      "UNKNOWN_SCENARIO",
      `default scenario "${config.defaultScenario}" is not defined`,
    );
  }

  return {
    config,
    registry,
    engine,
    scenarios,
    kpis(start, end, options) {
      const rows = engine.calculatePeriod(start, end, options);
      const kpis = calculateAllKpis(rows, config.startingCash, {
        burnWindowMonths: config.burnWindowMonths,
      });
      return { rows, kpis, alerts: getKpiAlerts(kpis) };
    },
    capTable(asOfDate, options) {
      return generateCapTableSummary(store.query(), asOfDate === undefined ? {} : { asOfDate }, options);
    },
  };
}
