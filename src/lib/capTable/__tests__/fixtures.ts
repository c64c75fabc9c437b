import type { EntityOfType, EntityRecord, EntityType } from "@/lib/entities";
import { isEntityOfType, parseEntity } from "@/lib/entities";

export function parseAs<K extends EntityType>(type: K, record: EntityRecord): EntityOfType<K> {
  const entity = parseEntity({ startDate: "2024-01-01", ...record, type });
  if (!isEntityOfType(entity, type)) throw new Error(`expected ${type}`);
  return entity;
}

export function holder(name: string, totalShares: number, patch: EntityRecord = {}) {
  return parseAs("shareholder", { name, totalShares, shareholderType: "founder", ...patch });
}

export function shareClass(className: string, sharesAuthorized: number, patch: EntityRecord = {}) {
  return parseAs("share_class", { name: `${className} stock`, className, sharesAuthorized, ...patch });
}
