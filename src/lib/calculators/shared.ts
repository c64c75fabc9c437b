import type { CalculationContext } from "@/lib/calculatorRegistry";
import type { Entity } from "@/lib/entities";
import { isActive } from "@/lib/entities";
import type { IsoDate } from "@/lib/dates";
import { isSameMonth } from "@/lib/dates";

export const DAYS_PER_YEAR = 365.25;

export function activeInPeriod(entity: Entity, context: CalculationContext): boolean {
  return isActive(entity, context.asOfDate);
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/** Sum the amounts of dated items that fall in the context's month. */
export function sumInMonth<T>(
  items: readonly T[],
  context: CalculationContext,
  dateOf: (item: T) => IsoDate | undefined,
  amountOf: (item: T) => number,
): number {
  let total = 0;
  for (const item of items) {
    const date = dateOf(item);
    if (date !== undefined && isSameMonth(date, context.asOfDate)) total += amountOf(item);
  }
  return total;
}
