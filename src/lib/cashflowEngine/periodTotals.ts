/**
 * Per-month aggregation.
 *
 * Pure given the month's active entities, which is what lets months fan
 * out independently. Entities are visited in store order so every execution
 * strategy adds the same numbers in the same sequence.
 */

import type { CalculatorRegistry } from "@/lib/calculatorRegistry";
import { createCalculationContext, emptyCategoryTotals } from "@/lib/calculatorRegistry";
import type { IsoDate } from "@/lib/dates";
import type { Entity } from "@/lib/entities";

import type { MonthTotals } from "./types";

export function computeMonthTotals(
  registry: CalculatorRegistry,
  period: IsoDate,
  entities: readonly Entity[],
  scenario: string,
  params: Readonly<Record<string, number>>,
): MonthTotals {
  const context = createCalculationContext({ asOfDate: period, scenario, allEntities: entities, params });
  const categories = emptyCategoryTotals();
  const totals: MonthTotals = {
    period,
    categories,
    activeEmployees: 0,
    activeProjects: 0,
    diagnostics: [],
  };

  for (const entity of entities) {
    if (entity.type === "employee") totals.activeEmployees += 1;
    if (entity.type === "project") totals.activeProjects += 1;

    const { values, diagnostics } = registry.calculateAll(entity, context);
    totals.diagnostics.push(...diagnostics);

    for (const [name, value] of Object.entries(values)) {
      if (typeof value !== "number") continue;
      const rollup = registry.getMetadata(entity.type, name)?.rollup;
      if (rollup) categories[rollup] += value;
    }
  }

  return totals;
}
