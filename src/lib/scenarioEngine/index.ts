export type { Scenario, ScenarioInput, EntityFilters, EntityOverride } from "./schema";
export { ScenarioSchema, EntityFiltersSchema, EntityOverrideSchema, defineScenario } from "./schema";
export {
  DAYS_PER_HIRING_MONTH,
  shouldIncludeEntity,
  overrideMatches,
  applyToEntity,
  applyScenarioToEntities,
} from "./scenario";
export {
  BASELINE_SCENARIO,
  OPTIMISTIC_SCENARIO,
  CONSERVATIVE_SCENARIO,
  CASH_PRESERVATION_SCENARIO,
  DEFAULT_SCENARIOS,
} from "./defaults";
export { loadScenarioFile, loadScenariosFromDirectory } from "./loader";
export type { ScenarioSummaryRow } from "./summary";
export { createScenarioSummary } from "./summary";
export type { ScenarioComparison } from "./manager";
export { ScenarioManager } from "./manager";
