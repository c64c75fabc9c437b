/**
 * Scenario application: filter, override, assume.
 *
 * Pure transforms. Entities are never mutated; a changed entity is rebuilt
 * through parseEntity so overrides stay subject to the entity schema.
 */

import { addDays } from "@/lib/dates";
import type { Entity, EntityRecord } from "@/lib/entities";
import { parseEntity, toEntityRecord } from "@/lib/entities";

import type { EntityOverride, Scenario } from "./schema";

/** Calendar days per month used when delaying hires. */
export const DAYS_PER_HIRING_MONTH = 30;

function matchesPattern(pattern: string, name: string): boolean {
  return new RegExp(pattern, "i").test(name);
}

// ---------------------------------------------------------------------------
// Filters
// ---------------------------------------------------------------------------

/**
 * All required tags present and no excluded tag present. A tag both
 * required and excluded therefore excludes the entity.
 */
export function shouldIncludeEntity(scenario: Scenario, entity: Entity): boolean {
  const f = scenario.entityFilters;

  if (f.includeTypes.length > 0 && !f.includeTypes.includes(entity.type)) return false;
  if (f.excludeTypes.includes(entity.type)) return false;
  if (!f.requireTags.every((tag) => entity.tags.includes(tag))) return false;
  if (f.excludeTags.some((tag) => entity.tags.includes(tag))) return false;
  if (f.includePatterns.length > 0 && !f.includePatterns.some((p) => matchesPattern(p, entity.name))) {
    return false;
  }
  if (f.excludePatterns.some((p) => matchesPattern(p, entity.name))) return false;
  return true;
}

// ---------------------------------------------------------------------------
// Overrides
// ---------------------------------------------------------------------------

/** Every selector the override sets must match; no selectors matches all. */
export function overrideMatches(override: EntityOverride, entity: Entity): boolean {
  if (override.entityType !== undefined && override.entityType !== entity.type) return false;
  if (override.entity !== undefined && override.entity !== entity.name) return false;
  if (override.namePattern !== undefined && !matchesPattern(override.namePattern, entity.name)) return false;
  if (override.tags !== undefined && !override.tags.some((tag) => entity.tags.includes(tag))) return false;
  return true;
}

function applyOverride(override: EntityOverride, record: EntityRecord): boolean {
  let changed = false;

  if (override.changes !== undefined) {
    Object.assign(record, override.changes);
    changed = true;
  }

  const field = override.field;
  if (field === undefined) return changed;

  if (override.multiplier !== undefined) {
    const current = record[field];
    if (typeof current === "number") {
      record[field] = current * override.multiplier;
      return true;
    }
    return changed;
  }

  if (override.value !== undefined) {
    record[field] = override.value;
    return true;
  }
  return changed;
}

// ---------------------------------------------------------------------------
// Assumptions
// ---------------------------------------------------------------------------

function applyAssumptions(scenario: Scenario, record: EntityRecord): boolean {
  if (record.type !== "employee") return false;
  let changed = false;

  const overhead = scenario.assumptions.overheadMultiplier;
  if (overhead !== undefined && record.overheadMultiplier === undefined) {
    record.overheadMultiplier = overhead;
    changed = true;
  }

  const delayMonths = scenario.assumptions.hiringDelayMonths;
  if (delayMonths !== undefined && delayMonths !== 0 && typeof record.startDate === "string") {
    let start = addDays(record.startDate, delayMonths * DAYS_PER_HIRING_MONTH);
    if (typeof record.endDate === "string" && start > record.endDate) start = record.endDate;
    record.startDate = start;
    changed = true;
  }

  return changed;
}

// ---------------------------------------------------------------------------
// Entry points
// ---------------------------------------------------------------------------

/**
 * A new entity with the scenario's overrides and assumptions applied.
 * Entities the scenario does not touch come back as-is.
 */
export function applyToEntity(scenario: Scenario, entity: Entity): Entity {
  const record = toEntityRecord(entity);
  let changed = false;

  for (const override of scenario.entityOverrides) {
    if (overrideMatches(override, entity) && applyOverride(override, record)) changed = true;
  }
  if (applyAssumptions(scenario, record)) changed = true;

  return changed ? parseEntity(record) : entity;
}

export function applyScenarioToEntities(scenario: Scenario, entities: readonly Entity[]): Entity[] {
  return entities
    .filter((entity) => shouldIncludeEntity(scenario, entity))
    .map((entity) => applyToEntity(scenario, entity));
}
