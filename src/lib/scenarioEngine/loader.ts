/**
 * Scenario files: one JSON scenario per file, validated with ScenarioSchema.
 */

import { readFile, readdir } from "node:fs/promises";
import path from "node:path";

import { ForecastConfigError, errorMessage } from "@/lib/errors";

import type { Scenario } from "./schema";
import { ScenarioSchema } from "./schema";

export async function loadScenarioFile(filePath: string): Promise<Scenario> {
  const raw = await readFile(filePath, "utf8");

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ForecastConfigError("INVALID_CONFIG", `${filePath}: ${errorMessage(err)}`);
  }

  const parsed = ScenarioSchema.safeParse(json);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new ForecastConfigError("INVALID_CONFIG", `${filePath}: ${detail}`);
  }
  return parsed.data;
}

/**
 * Load every *.json file in a directory, in name order. Invalid files are
 * logged and skipped.
 */
export async function loadScenariosFromDirectory(dir: string): Promise<Scenario[]> {
  const files = (await readdir(dir)).filter((f) => f.endsWith(".json")).sort();
  const scenarios: Scenario[] = [];

  for (const file of files) {
    const filePath = path.join(dir, file);
    try {
      scenarios.push(await loadScenarioFile(filePath));
    } catch (err) {
      console.warn("[scenarioEngine] skipping scenario file", { file: filePath, message: errorMessage(err) });
    }
  }
  return scenarios;
}
