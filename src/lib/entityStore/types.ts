import type { IsoDate } from "@/lib/dates";
import type { Entity, EntityType } from "@/lib/entities";

export interface EntityFilters {
  type?: EntityType;
  /** Matches entities carrying any of these tags. */
  tags?: readonly string[];
  activeOn?: IsoDate;
  nameContains?: string;
}

/**
 * Read-only entity source consumed by the engine.
 * Results keep the store's insertion order; the engine's sums depend on it.
 */
export interface EntityStore {
  query(filters?: EntityFilters): readonly Entity[];
  queryAsync(filters?: EntityFilters): Promise<readonly Entity[]>;
}
