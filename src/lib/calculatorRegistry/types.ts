import type { IsoDate } from "@/lib/dates";
import type { Entity, EntityType } from "@/lib/entities";

import type { CashFlowCategory } from "./categories";

/** A calculator produces a number or a small structured breakdown. */
export type CalculatorValue = number | Readonly<Record<string, number>>;

/**
 * Immutable per-period bag handed to every calculator.
 * `dependencies` holds the values of the calculator's declared dependencies.
 */
export interface CalculationContext {
  readonly asOfDate: IsoDate;
  readonly periodStart: IsoDate;
  readonly periodEnd: IsoDate;
  readonly scenario: string;
  readonly allEntities: readonly Entity[];
  readonly params: Readonly<Record<string, number>>;
  readonly dependencies: Readonly<Record<string, CalculatorValue>>;
}

export type CalculatorFn<E extends Entity = Entity> = (
  entity: E,
  context: CalculationContext,
) => CalculatorValue;

export interface CalculatorOptions {
  description?: string;
  dependencies?: readonly string[];
  /** Period-row column this calculator's result is summed into. */
  rollup?: CashFlowCategory;
}

export interface CalculatorMetadata {
  entityType: EntityType;
  name: string;
  description: string;
  dependencies: readonly string[];
  rollup: CashFlowCategory | null;
}

export interface CalculatorDiagnostic {
  code: "CALCULATOR_FAILED" | "NON_FINITE_RESULT";
  entityType: EntityType;
  entityName: string;
  calculator: string;
  message: string;
}

export interface CalculateAllResult {
  values: Record<string, CalculatorValue>;
  diagnostics: CalculatorDiagnostic[];
}

export type CalcOutcome =
  | { ok: true; value: CalculatorValue }
  | { ok: false; diagnostic: CalculatorDiagnostic };
