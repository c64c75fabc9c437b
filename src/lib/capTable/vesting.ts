import type { IsoDate } from "@/lib/dates";
import { addMonths, monthsBetween } from "@/lib/dates";
import type { Shareholder } from "@/lib/entities";

/** Completed months between two dates; a partial month does not count. */
export function elapsedMonths(from: IsoDate, to: IsoDate): number {
  if (to < from) return 0;
  const months = monthsBetween(from, to);
  return addMonths(from, months) > to ? months - 1 : months;
}

/**
 * Shares vested as of a date. An explicit `vestedShares` overrides the
 * schedule. Without a schedule everything is vested; before the cliff
 * nothing is; afterwards vesting is linear by completed month.
 */
export function calculateVestedShares(shareholder: Shareholder, asOf: IsoDate): number {
  const total = shareholder.totalShares;
  if (shareholder.vestedShares !== undefined) return Math.min(shareholder.vestedShares, total);
  if (shareholder.vestingMonths <= 0) return total;

  const months = elapsedMonths(shareholder.acquisitionDate ?? shareholder.startDate, asOf);
  if (months < shareholder.cliffMonths) return 0;
  if (months >= shareholder.vestingMonths) return total;
  return Math.floor((total * months) / shareholder.vestingMonths);
}
