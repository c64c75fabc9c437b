export type { EntityFilters, EntityStore } from "./types";
export { InMemoryEntityStore, matchesFilters } from "./inMemoryStore";
