/**
 * Scenario definitions.
 *
 * The same schema validates built-in scenarios and scenario files on disk.
 */

import { z } from "zod";

import type { EntityType } from "@/lib/entities";
import { isEntityType } from "@/lib/entities";

function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern, "i");
    return true;
  } catch {
    return false;
  }
}

const EntityTypeSchema = z.custom<EntityType>(
  (value) => typeof value === "string" && isEntityType(value),
  { message: "unknown entity type" },
);

const PatternSchema = z.string().refine(isValidPattern, { message: "invalid regular expression" });

export const EntityFiltersSchema = z
  .object({
    /** Every listed tag must be present. */
    requireTags: z.array(z.string()).default([]),
    excludeTags: z.array(z.string()).default([]),
    includeTypes: z.array(EntityTypeSchema).default([]),
    excludeTypes: z.array(EntityTypeSchema).default([]),
    /** Case-insensitive patterns matched against the entity name. */
    includePatterns: z.array(PatternSchema).default([]),
    excludePatterns: z.array(PatternSchema).default([]),
  })
  .default({});

export const EntityOverrideSchema = z
  .object({
    entityType: EntityTypeSchema.optional(),
    entity: z.string().optional(),
    namePattern: PatternSchema.optional(),
    tags: z.array(z.string()).optional(),
    field: z.string().min(1).optional(),
    value: z.unknown().optional(),
    multiplier: z.number().optional(),
    changes: z.record(z.unknown()).optional(),
  })
  .refine((o) => o.field === undefined || o.value !== undefined || o.multiplier !== undefined, {
    message: "a field override needs a value or a multiplier",
  })
  .refine((o) => o.field !== undefined || o.changes !== undefined, {
    message: "an override needs a field or changes",
  });

export const ScenarioSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(""),
  assumptions: z.record(z.number()).default({}),
  entityFilters: EntityFiltersSchema,
  entityOverrides: z.array(EntityOverrideSchema).default([]),
});

export type Scenario = z.infer<typeof ScenarioSchema>;
export type ScenarioInput = z.input<typeof ScenarioSchema>;
export type EntityFilters = z.infer<typeof EntityFiltersSchema>;
export type EntityOverride = z.infer<typeof EntityOverrideSchema>;

export function defineScenario(input: ScenarioInput): Scenario {
  return ScenarioSchema.parse(input);
}
