export type {
  Entity,
  EntityType,
  EntityOfType,
  EntityRecord,
  Employee,
  Grant,
  Investment,
  Sale,
  Service,
  Facility,
  Software,
  Equipment,
  Project,
  Shareholder,
  ShareClass,
  FundingRound,
} from "./types";
export { ENTITY_SCHEMAS, EntitySchema, IsoDateSchema, MONEY_TOLERANCE } from "./schema";
export {
  ENTITY_TYPES,
  isEntityType,
  isEntityOfType,
  parseEntity,
  toEntityRecord,
  isActive,
  hasTag,
  getField,
  getNumberField,
  sumValues,
} from "./entity";
