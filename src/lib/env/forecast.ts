import { z } from "zod";

import { ForecastConfigError } from "@/lib/errors";

const ForecastEnvSchema = z.object({
  // Parallel fan-out width for CashFlowEngine.calculateParallel
  FORECAST_MAX_WORKERS: z.coerce.number().int().min(1).max(64).default(4),

  // Scenario used when a call names none
  FORECAST_DEFAULT_SCENARIO: z.string().min(1).default("baseline"),

  FORECAST_STARTING_CASH: z.coerce.number().finite().default(0),

  // Trailing window for burn rate and runway
  FORECAST_BURN_WINDOW_MONTHS: z.coerce.number().int().min(1).default(3),

  // Optional directory of scenario JSON files
  FORECAST_SCENARIOS_DIR: z.string().min(1).optional(),
});

export interface ForecastConfig {
  maxWorkers: number;
  defaultScenario: string;
  startingCash: number;
  burnWindowMonths: number;
  scenariosDir: string | null;
}

type Env = Readonly<Record<string, string | undefined>>;

/** Blank variables count as unset. */
function withoutBlanks(env: Env): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") out[key] = value;
  }
  return out;
}

export function forecastConfig(env: Env = process.env): ForecastConfig {
  const parsed = ForecastEnvSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const fieldErrors = parsed.error.flatten().fieldErrors;
    console.error("[env] invalid forecast configuration", fieldErrors);
    throw new ForecastConfigError(
      "INVALID_CONFIG",
      `invalid environment: ${Object.keys(fieldErrors).join(", ")}`,
    );
  }
  const data = parsed.data;
  return {
    maxWorkers: data.FORECAST_MAX_WORKERS,
    defaultScenario: data.FORECAST_DEFAULT_SCENARIO,
    startingCash: data.FORECAST_STARTING_CASH,
    burnWindowMonths: data.FORECAST_BURN_WINDOW_MONTHS,
    scenariosDir: data.FORECAST_SCENARIOS_DIR ?? null,
  };
}
