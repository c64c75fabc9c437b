/**
 * Calculator Registry
 *
 * Maps (entity type, calculator name) to a pure calculator with declared
 * dependencies. Instances are built once at startup and handed to the
 * engine; there is no global registry.
 *
 * Partial-failure policy: calculateAll folds a failing calculator into 0
 * plus a diagnostic and keeps going. Configuration problems (missing
 * dependencies, cycles) always throw.
 */

import type { Entity, EntityOfType, EntityType } from "@/lib/entities";
import { isEntityOfType } from "@/lib/entities";
import { ForecastConfigError, errorMessage } from "@/lib/errors";

import { withDependencies } from "./context";
import { resolveCalculatorOrder } from "./resolver";
import type {
  CalcOutcome,
  CalculateAllResult,
  CalculationContext,
  CalculatorDiagnostic,
  CalculatorFn,
  CalculatorMetadata,
  CalculatorOptions,
  CalculatorValue,
} from "./types";

interface RegisteredCalculator {
  fn: CalculatorFn;
  metadata: CalculatorMetadata;
}

function isFiniteValue(value: CalculatorValue): boolean {
  if (typeof value === "number") return Number.isFinite(value);
  return Object.values(value).every((v) => Number.isFinite(v));
}

function runCalculator(
  entry: RegisteredCalculator,
  entity: Entity,
  context: CalculationContext,
): CalcOutcome {
  const base = {
    entityType: entity.type,
    entityName: entity.name,
    calculator: entry.metadata.name,
  };

  let value: CalculatorValue;
  try {
    value = entry.fn(entity, context);
  } catch (err) {
    return { ok: false, diagnostic: { ...base, code: "CALCULATOR_FAILED", message: errorMessage(err) } };
  }

  if (!isFiniteValue(value)) {
    return {
      ok: false,
      diagnostic: { ...base, code: "NON_FINITE_RESULT", message: `non-finite result ${JSON.stringify(value)}` },
    };
  }
  return { ok: true, value };
}

export class CalculatorRegistry {
  private readonly calculators = new Map<EntityType, Map<string, RegisteredCalculator>>();
  private readonly orderCache = new Map<EntityType, string[]>();

  // -------------------------------------------------------------------------
  // Registration + lookup
  // -------------------------------------------------------------------------

  /**
   * Register a calculator for one entity variant. Re-registering the same
   * (type, name) overwrites. The stored function returns 0 for entities of
   * any other variant.
   */
  register<K extends EntityType>(
    entityType: K,
    name: string,
    fn: CalculatorFn<EntityOfType<K>>,
    options: CalculatorOptions = {},
  ): void {
    const guarded: CalculatorFn = (entity, context) =>
      isEntityOfType(entity, entityType) ? fn(entity, context) : 0;

    let byName = this.calculators.get(entityType);
    if (!byName) {
      byName = new Map();
      this.calculators.set(entityType, byName);
    }
    byName.set(name, {
      fn: guarded,
      metadata: {
        entityType,
        name,
        description: options.description ?? "",
        dependencies: [...(options.dependencies ?? [])],
        rollup: options.rollup ?? null,
      },
    });
    this.orderCache.delete(entityType);
  }

  get(entityType: EntityType, name: string): CalculatorFn | null {
    return this.calculators.get(entityType)?.get(name)?.fn ?? null;
  }

  list(entityType: EntityType): Record<string, CalculatorFn> {
    const out: Record<string, CalculatorFn> = {};
    for (const [name, entry] of this.calculators.get(entityType) ?? []) out[name] = entry.fn;
    return out;
  }

  /** Calculator names per entity type, optionally for a single type. */
  listCalculators(entityType?: EntityType): Record<string, string[]> {
    const out: Record<string, string[]> = {};
    for (const [type, byName] of this.calculators) {
      if (entityType !== undefined && type !== entityType) continue;
      out[type] = [...byName.keys()];
    }
    return out;
  }

  getMetadata(entityType: EntityType, name: string): CalculatorMetadata | null {
    return this.calculators.get(entityType)?.get(name)?.metadata ?? null;
  }

  /** Static check: declared dependencies that are not registered. */
  validateDependencies(entityType: EntityType, name: string): string[] {
    const entry = this.calculators.get(entityType)?.get(name);
    if (!entry) return [name];
    return entry.metadata.dependencies.filter((dep) => this.get(entityType, dep) === null);
  }

  /** Topological order for a type, computed once and reused until re-registration. */
  resolveOrder(entityType: EntityType): string[] {
    const cached = this.orderCache.get(entityType);
    if (cached) return cached;

    const nodes = [...(this.calculators.get(entityType)?.values() ?? [])].map((entry) => ({
      name: entry.metadata.name,
      dependencies: entry.metadata.dependencies,
    }));
    const order = resolveCalculatorOrder(entityType, nodes);
    this.orderCache.set(entityType, order);
    return order;
  }

  // -------------------------------------------------------------------------
  // Evaluation
  // -------------------------------------------------------------------------

  /**
   * Run one calculator, computing its dependencies first. Returns null when
   * the calculator is not registered for the entity's type. Calculator
   * errors propagate.
   */
  calculate(entity: Entity, name: string, context: CalculationContext): CalculatorValue | null {
    if (this.get(entity.type, name) === null) return null;
    return this.evaluate(entity, name, context, new Map(), []);
  }

  private evaluate(
    entity: Entity,
    name: string,
    context: CalculationContext,
    memo: Map<string, CalculatorValue>,
    stack: string[],
  ): CalculatorValue {
    const memoized = memo.get(name);
    if (memoized !== undefined) return memoized;

    if (stack.includes(name)) {
      throw new ForecastConfigError(
        "DEPENDENCY_CYCLE",
        `${entity.type} calculators form a cycle: ${[...stack, name].join(" -> ")}`,
      );
    }

    const entry = this.calculators.get(entity.type)?.get(name);
    if (!entry) {
      throw new ForecastConfigError(
        "MISSING_DEPENDENCY",
        `${entity.type}.${stack.at(-1) ?? "?"} depends on unregistered calculator "${name}"`,
      );
    }

    const deps: Record<string, CalculatorValue> = { ...context.dependencies };
    for (const dep of entry.metadata.dependencies) {
      deps[dep] = this.evaluate(entity, dep, context, memo, [...stack, name]);
    }

    const value = entry.fn(entity, withDependencies(context, deps));
    memo.set(name, value);
    return value;
  }

  /**
   * Run every calculator registered for the entity's type in dependency
   * order. A failing calculator contributes 0 and a diagnostic; dependents
   * then see 0 for it.
   */
  calculateAll(entity: Entity, context: CalculationContext): CalculateAllResult {
    const order = this.resolveOrder(entity.type);
    const byName = this.calculators.get(entity.type);
    const values: Record<string, CalculatorValue> = {};
    const diagnostics: CalculatorDiagnostic[] = [];

    for (const name of order) {
      const entry = byName?.get(name);
      if (!entry) continue;

      const deps: Record<string, CalculatorValue> = {};
      for (const dep of entry.metadata.dependencies) deps[dep] = values[dep] ?? 0;

      const outcome = runCalculator(entry, entity, withDependencies(context, deps));
      if (outcome.ok) {
        values[name] = outcome.value;
        continue;
      }

      values[name] = 0;
      diagnostics.push(outcome.diagnostic);
      console.warn("[calculatorRegistry] calculator failed, substituting 0", {
        entity: entity.name,
        type: entity.type,
        calculator: name,
        period: context.asOfDate,
        message: outcome.diagnostic.message,
      });
    }

    return { values, diagnostics };
  }
}

export function createCalculatorRegistry(): CalculatorRegistry {
  return new CalculatorRegistry();
}
