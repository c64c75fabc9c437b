export * from "./errors";
export * from "./dates";
export * from "./entities";
export * from "./entityStore";
export * from "./calculatorRegistry";
export * from "./calculators";
export * from "./cashflowEngine";
export * from "./kpiEngine";
export * from "./scenarioEngine";
export * from "./capTable";
export * from "./env";
export * from "./forecast";

// Both the store and the scenario layer define entity filters.
export type { EntityFilters } from "./entityStore";
export type { EntityFilters as ScenarioEntityFilters } from "./scenarioEngine";
