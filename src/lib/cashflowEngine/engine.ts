/**
 * Cash Flow Engine
 *
 * Walks calendar months over a date range, asks the store for the entities
 * active in each month, runs their calculators and rolls the results into
 * period rows with a running cash balance.
 *
 * Three strategies share one contract and produce identical rows:
 * - calculatePeriod: synchronous
 * - calculatePeriodAsync: awaits only the store query
 * - calculateParallel: fans months out through a p-limit pool, then reduces
 *   the balance sequentially
 */

import pLimit from "p-limit";

import type { CalculatorRegistry } from "@/lib/calculatorRegistry";
import type { IsoDate } from "@/lib/dates";
import { enumerateMonths, isIsoDate } from "@/lib/dates";
import type { EntityStore } from "@/lib/entityStore";
import { ForecastConfigError } from "@/lib/errors";

import { computeMonthTotals } from "./periodTotals";
import { buildPeriodRows } from "./rows";
import type {
  CalculatePeriodOptions,
  CashFlowEngineOptions,
  CashFlowResult,
  DetailedCashFlowResult,
  MonthTotals,
  ParallelOptions,
  PeriodDiagnostic,
  PeriodRow,
} from "./types";

export const DEFAULT_MAX_WORKERS = 4;
export const DEFAULT_SCENARIO = "baseline";

function assertWorkerCount(maxWorkers: number): void {
  if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
    throw new ForecastConfigError("INVALID_CONFIG", `maxWorkers must be a positive integer, got ${maxWorkers}`);
  }
}

export class CashFlowEngine {
  readonly startingCash: number;
  readonly maxWorkers: number;
  readonly defaultScenario: string;

  private readonly cache = new Map<string, CashFlowResult>();

  constructor(
    readonly store: EntityStore,
    readonly registry: CalculatorRegistry,
    options: CashFlowEngineOptions = {},
  ) {
    this.startingCash = options.startingCash ?? 0;
    this.maxWorkers = options.maxWorkers ?? DEFAULT_MAX_WORKERS;
    this.defaultScenario = options.defaultScenario ?? DEFAULT_SCENARIO;
    assertWorkerCount(this.maxWorkers);
  }

  /** Same registry and options over another store, with its own cache. */
  forStore(store: EntityStore): CashFlowEngine {
    return new CashFlowEngine(store, this.registry, {
      startingCash: this.startingCash,
      maxWorkers: this.maxWorkers,
      defaultScenario: this.defaultScenario,
    });
  }

  // -------------------------------------------------------------------------
  // Cache
  // -------------------------------------------------------------------------

  /** `start_end_scenario`, plus the params sorted by name when any are given. */
  getCacheKey(
    start: IsoDate,
    end: IsoDate,
    scenario: string = this.defaultScenario,
    params: Readonly<Record<string, number>> = {},
  ): string {
    const base = `${start}_${end}_${scenario}`;
    const entries = Object.entries(params).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    if (entries.length === 0) return base;
    return `${base}_${entries.map(([name, value]) => `${name}=${value}`).join(",")}`;
  }

  clearCache(): void {
    this.cache.clear();
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  // -------------------------------------------------------------------------
  // Strategies
  // -------------------------------------------------------------------------

  calculatePeriod(start: IsoDate, end: IsoDate, options: CalculatePeriodOptions = {}): readonly PeriodRow[] {
    return this.calculatePeriodDetailed(start, end, options).rows;
  }

  /** calculatePeriod plus the recovered calculator failures. */
  calculatePeriodDetailed(
    start: IsoDate,
    end: IsoDate,
    options: CalculatePeriodOptions = {},
  ): DetailedCashFlowResult {
    const months = this.planMonths(start, end);
    const scenario = options.scenario ?? this.defaultScenario;
    const params = options.params ?? {};
    const key = this.getCacheKey(start, end, scenario, params);

    const cached = this.cache.get(key);
    if (cached) return { ...cached, fromCache: true };

    const totals = months.map((period) =>
      computeMonthTotals(this.registry, period, this.store.query({ activeOn: period }), scenario, params),
    );
    return this.finish(key, totals);
  }

  async calculatePeriodAsync(
    start: IsoDate,
    end: IsoDate,
    options: CalculatePeriodOptions = {},
  ): Promise<readonly PeriodRow[]> {
    const months = this.planMonths(start, end);
    const scenario = options.scenario ?? this.defaultScenario;
    const params = options.params ?? {};
    const key = this.getCacheKey(start, end, scenario, params);

    const cached = this.cache.get(key);
    if (cached) return cached.rows;

    const totals: MonthTotals[] = [];
    for (const period of months) {
      const entities = await this.store.queryAsync({ activeOn: period });
      totals.push(computeMonthTotals(this.registry, period, entities, scenario, params));
    }
    return this.finish(key, totals).rows;
  }

  async calculateParallel(
    start: IsoDate,
    end: IsoDate,
    options: ParallelOptions = {},
  ): Promise<readonly PeriodRow[]> {
    const months = this.planMonths(start, end);
    const scenario = options.scenario ?? this.defaultScenario;
    const params = options.params ?? {};
    const key = this.getCacheKey(start, end, scenario, params);
    const maxWorkers = options.maxWorkers ?? this.maxWorkers;
    assertWorkerCount(maxWorkers);

    const cached = this.cache.get(key);
    if (cached) return cached.rows;

    const limiter = pLimit(maxWorkers);
    // Each task returns its own month; Promise.all keeps month order.
    const totals = await Promise.all(
      months.map((period) =>
        limiter(async () => {
          const entities = await this.store.queryAsync({ activeOn: period });
          return computeMonthTotals(this.registry, period, entities, scenario, params);
        }),
      ),
    );
    return this.finish(key, totals).rows;
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private planMonths(start: IsoDate, end: IsoDate): IsoDate[] {
    if (!isIsoDate(start) || !isIsoDate(end)) {
      throw new ForecastConfigError("INVALID_DATE_RANGE", `expected YYYY-MM-DD dates, got ${start} .. ${end}`);
    }
    if (start > end) {
      throw new ForecastConfigError("INVALID_DATE_RANGE", `start ${start} is after end ${end}`);
    }
    return enumerateMonths(start, end);
  }

  private finish(key: string, totals: readonly MonthTotals[]): DetailedCashFlowResult {
    const diagnostics: PeriodDiagnostic[] = totals.flatMap((month) =>
      month.diagnostics.map((d) => ({ ...d, period: month.period })),
    );
    const result: CashFlowResult = Object.freeze({
      rows: Object.freeze(buildPeriodRows(totals, this.startingCash)),
      diagnostics: Object.freeze(diagnostics),
    });

    if (diagnostics.length > 0) {
      console.warn("[cashflowEngine] forecast completed with recovered calculator failures", {
        key,
        failures: diagnostics.length,
      });
    }

    this.cache.set(key, result);
    return { ...result, fromCache: false };
  }
}
