/**
 * Entity model helpers.
 *
 * parseEntity is the single way raw records become typed entities. Every
 * other helper treats entities as read-only values.
 */

import type { IsoDate } from "@/lib/dates";
import { EntityValidationError } from "@/lib/errors";

import { ENTITY_SCHEMAS, EntitySchema } from "./schema";
import type { Entity, EntityOfType, EntityRecord, EntityType } from "./types";

export const ENTITY_TYPES: readonly EntityType[] = [
  "employee",
  "grant",
  "investment",
  "sale",
  "service",
  "facility",
  "software",
  "equipment",
  "project",
  "shareholder",
  "share_class",
  "funding_round",
];

export function isEntityType(value: string): value is EntityType {
  return Object.prototype.hasOwnProperty.call(ENTITY_SCHEMAS, value);
}

export function isEntityOfType<K extends EntityType>(
  entity: Entity,
  type: K,
): entity is EntityOfType<K> {
  return entity.type === type;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate a raw record into an Entity.
 * Keys the entity's schema does not declare move into `extra`.
 * Throws EntityValidationError on any schema violation.
 */
export function parseEntity(record: EntityRecord): Entity {
  const name = typeof record.name === "string" ? record.name : null;
  const type = record.type;

  if (typeof type !== "string" || !isEntityType(type)) {
    throw new EntityValidationError(name, [
      { path: "type", message: `unknown entity type "${String(type)}"` },
    ]);
  }

  const known = new Set(Object.keys(ENTITY_SCHEMAS[type].shape));
  const extra: Record<string, unknown> = isPlainRecord(record.extra) ? { ...record.extra } : {};
  const input: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(record)) {
    if (key === "extra") continue;
    if (known.has(key)) {
      input[key] = value;
    } else {
      extra[key] = value;
    }
  }
  input.extra = extra;

  const parsed = EntitySchema.safeParse(input);
  if (!parsed.success) {
    throw new EntityValidationError(
      name,
      parsed.error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
    );
  }
  return parsed.data;
}

/** Flatten an entity back to a record, `extra` keys inlined. */
export function toEntityRecord(entity: Entity): EntityRecord {
  const { extra, ...fields } = entity;
  return { ...extra, ...fields };
}

export function isActive(entity: Entity, date: IsoDate): boolean {
  if (entity.startDate > date) return false;
  return entity.endDate === null || date <= entity.endDate;
}

export function hasTag(entity: Entity, tag: string): boolean {
  return entity.tags.includes(tag);
}

/** Uniform accessor over declared fields and `extra`. */
export function getField(entity: Entity, name: string): unknown {
  if (name !== "extra" && Object.prototype.hasOwnProperty.call(entity, name)) {
    const value: unknown = Reflect.get(entity, name);
    return value;
  }
  return entity.extra[name];
}

export function getNumberField(entity: Entity, name: string, fallback = 0): number {
  const value = getField(entity, name);
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

export function sumValues(values: Readonly<Record<string, number>>): number {
  let total = 0;
  for (const v of Object.values(values)) total += v;
  return total;
}
