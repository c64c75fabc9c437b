/**
 * Calculation context construction.
 *
 * Contexts are frozen so calculators cannot mutate shared per-period state.
 */

import type { IsoDate } from "@/lib/dates";
import { monthEnd, monthStart } from "@/lib/dates";
import type { Entity } from "@/lib/entities";

import type { CalculationContext, CalculatorValue } from "./types";

export interface ContextInit {
  asOfDate: IsoDate;
  periodStart?: IsoDate;
  periodEnd?: IsoDate;
  scenario?: string;
  allEntities?: readonly Entity[];
  params?: Readonly<Record<string, number>>;
}

export function createCalculationContext(init: ContextInit): CalculationContext {
  return Object.freeze({
    asOfDate: init.asOfDate,
    periodStart: init.periodStart ?? monthStart(init.asOfDate),
    periodEnd: init.periodEnd ?? monthEnd(init.asOfDate),
    scenario: init.scenario ?? "baseline",
    allEntities: Object.freeze([...(init.allEntities ?? [])]),
    params: Object.freeze({ ...(init.params ?? {}) }),
    dependencies: Object.freeze({}),
  });
}

/** Derive a context carrying dependency results; the input context is untouched. */
export function withDependencies(
  context: CalculationContext,
  dependencies: Readonly<Record<string, CalculatorValue>>,
): CalculationContext {
  return Object.freeze({ ...context, dependencies: Object.freeze({ ...dependencies }) });
}

/** Numeric dependency value; structured or absent results read as 0. */
export function dependencyValue(context: CalculationContext, name: string): number {
  const value = context.dependencies[name];
  return typeof value === "number" ? value : 0;
}

export function paramValue(context: CalculationContext, name: string, fallback: number): number {
  const value = context.params[name];
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}
