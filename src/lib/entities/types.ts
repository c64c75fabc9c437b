import type { z } from "zod";

import type { EntitySchema } from "./schema";

/** A validated forecast entity. Closed union discriminated on `type`. */
export type Entity = z.infer<typeof EntitySchema>;

export type EntityType = Entity["type"];

export type EntityOfType<K extends EntityType> = Extract<Entity, { type: K }>;

export type Employee = EntityOfType<"employee">;
export type Grant = EntityOfType<"grant">;
export type Investment = EntityOfType<"investment">;
export type Sale = EntityOfType<"sale">;
export type Service = EntityOfType<"service">;
export type Facility = EntityOfType<"facility">;
export type Software = EntityOfType<"software">;
export type Equipment = EntityOfType<"equipment">;
export type Project = EntityOfType<"project">;
export type Shareholder = EntityOfType<"shareholder">;
export type ShareClass = EntityOfType<"share_class">;
export type FundingRound = EntityOfType<"funding_round">;

/** Loose input accepted by parseEntity before validation. */
export type EntityRecord = Record<string, unknown>;
