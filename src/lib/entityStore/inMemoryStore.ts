/**
 * In-process EntityStore.
 *
 * Backs tests, scenario-scoped forecasts and callers that already hold
 * their entities in memory.
 */

import { isActive } from "@/lib/entities";
import type { Entity } from "@/lib/entities";

import type { EntityFilters, EntityStore } from "./types";

export function matchesFilters(entity: Entity, filters: EntityFilters): boolean {
  if (filters.type !== undefined && entity.type !== filters.type) return false;
  if (filters.tags !== undefined && filters.tags.length > 0) {
    if (!filters.tags.some((tag) => entity.tags.includes(tag))) return false;
  }
  if (filters.activeOn !== undefined && !isActive(entity, filters.activeOn)) return false;
  if (filters.nameContains !== undefined) {
    if (!entity.name.toLowerCase().includes(filters.nameContains.toLowerCase())) return false;
  }
  return true;
}

export class InMemoryEntityStore implements EntityStore {
  private readonly entities: Entity[];

  constructor(entities: readonly Entity[] = []) {
    this.entities = [...entities];
  }

  add(entity: Entity): void {
    this.entities.push(entity);
  }

  get size(): number {
    return this.entities.length;
  }

  getByName(name: string): Entity | null {
    return this.entities.find((e) => e.name === name) ?? null;
  }

  query(filters: EntityFilters = {}): readonly Entity[] {
    return this.entities.filter((e) => matchesFilters(e, filters));
  }

  async queryAsync(filters: EntityFilters = {}): Promise<readonly Entity[]> {
    return this.query(filters);
  }
}
