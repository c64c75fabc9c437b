/**
 * Scenario Manager
 *
 * Holds named scenarios and runs them through the cash flow engine over a
 * scenario-scoped copy of the entity set. No forecasting arithmetic lives
 * here.
 */

import type { CashFlowEngine, PeriodRow } from "@/lib/cashflowEngine";
import type { IsoDate } from "@/lib/dates";
import type { Entity } from "@/lib/entities";
import { InMemoryEntityStore } from "@/lib/entityStore";
import { ForecastConfigError } from "@/lib/errors";

import { DEFAULT_SCENARIOS } from "./defaults";
import { loadScenarioFile, loadScenariosFromDirectory } from "./loader";
import { applyScenarioToEntities } from "./scenario";
import type { Scenario, ScenarioInput } from "./schema";
import { ScenarioSchema } from "./schema";
import type { ScenarioSummaryRow } from "./summary";
import { createScenarioSummary } from "./summary";

export interface ScenarioComparison {
  results: Record<string, readonly PeriodRow[]>;
  summary: ScenarioSummaryRow[];
}

export class ScenarioManager {
  private readonly scenarios = new Map<string, Scenario>();

  constructor(
    private readonly engine: CashFlowEngine,
    scenarios: readonly Scenario[] = DEFAULT_SCENARIOS,
  ) {
    for (const scenario of scenarios) this.scenarios.set(scenario.name, scenario);
  }

  /** Validate and register; replaces a scenario of the same name. */
  addScenario(input: ScenarioInput): Scenario {
    const scenario = ScenarioSchema.parse(input);
    this.scenarios.set(scenario.name, scenario);
    return scenario;
  }

  getScenario(name: string): Scenario | null {
    return this.scenarios.get(name) ?? null;
  }

  listScenarios(): string[] {
    return [...this.scenarios.keys()];
  }

  private requireScenario(name: string): Scenario {
    const scenario = this.scenarios.get(name);
    if (!scenario) {
      throw new ForecastConfigError(
        "UNKNOWN_SCENARIO",
        `"${name}" is not defined (known: ${this.listScenarios().join(", ")})`,
      );
    }
    return scenario;
  }

  /** Filtered and transformed entities; defaults to the engine's store. */
  applyScenario(name: string, entities: readonly Entity[] = this.engine.store.query()): Entity[] {
    return applyScenarioToEntities(this.requireScenario(name), entities);
  }

  calculateScenario(name: string, start: IsoDate, end: IsoDate): readonly PeriodRow[] {
    const scenario = this.requireScenario(name);
    const scoped = this.engine.forStore(new InMemoryEntityStore(this.applyScenario(name)));
    return scoped.calculatePeriod(start, end, { scenario: name, params: scenario.assumptions });
  }

  compareScenarios(names: readonly string[], start: IsoDate, end: IsoDate): ScenarioComparison {
    const results: Record<string, readonly PeriodRow[]> = {};
    for (const name of names) results[name] = this.calculateScenario(name, start, end);
    return { results, summary: createScenarioSummary(results) };
  }

  async loadScenarioFile(filePath: string): Promise<Scenario> {
    const scenario = await loadScenarioFile(filePath);
    this.scenarios.set(scenario.name, scenario);
    return scenario;
  }

  /** Register every valid scenario file in `dir`; returns their names. */
  async loadScenariosFromDirectory(dir: string): Promise<string[]> {
    const loaded = await loadScenariosFromDirectory(dir);
    for (const scenario of loaded) this.scenarios.set(scenario.name, scenario);
    return loaded.map((s) => s.name);
  }
}
