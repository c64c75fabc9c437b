/**
 * Ownership, voting and dilution math over a cap table.
 *
 * Every function here returns raw fractions; rounding happens where results
 * are reported (summary, rollups, registered calculators).
 *
 * "Fully diluted" takes, per class, the larger of the shares held and the
 * shares authorized. Holdings in a class that has no ShareClass entity are
 * still counted so that a dangling reference never shrinks the denominator.
 */

import type { CalculationContext } from "@/lib/calculatorRegistry";
import type { Entity, FundingRound, ShareClass, Shareholder } from "@/lib/entities";
import { isEntityOfType } from "@/lib/entities";

import { roundPercentage } from "./rounding";
import type { CapTableEntities, DilutionImpact } from "./types";

type EntityPool = Pick<CalculationContext, "allEntities">;

/** Table-wide totals shared by every per-holder fraction of one entity pool. */
export interface CapTableSnapshot {
  table: CapTableEntities;
  classMap: ReadonlyMap<string, ShareClass>;
  sharesOutstanding: number;
  fullyDilutedShares: number;
  totalVotingPower: number;
  totalBoardSeats: number;
}

// ---------------------------------------------------------------------------
// Partitioning
// ---------------------------------------------------------------------------

export function partitionCapTable(entities: readonly Entity[]): CapTableEntities {
  const table: CapTableEntities = { shareholders: [], shareClasses: [], fundingRounds: [] };
  for (const entity of entities) {
    if (isEntityOfType(entity, "shareholder")) table.shareholders.push(entity);
    else if (isEntityOfType(entity, "share_class")) table.shareClasses.push(entity);
    else if (isEntityOfType(entity, "funding_round")) table.fundingRounds.push(entity);
  }
  return table;
}

/** First definition of a class name wins; duplicates are a validator concern. */
export function buildShareClassMap(shareClasses: readonly ShareClass[]): Map<string, ShareClass> {
  const map = new Map<string, ShareClass>();
  for (const shareClass of shareClasses) {
    if (!map.has(shareClass.className)) map.set(shareClass.className, shareClass);
  }
  return map;
}

// ---------------------------------------------------------------------------
// Share totals
// ---------------------------------------------------------------------------

export function calculateTotalSharesByClass(shareholders: readonly Shareholder[]): Record<string, number> {
  const totals: Record<string, number> = {};
  for (const holder of shareholders) {
    totals[holder.shareClass] = (totals[holder.shareClass] ?? 0) + holder.totalShares;
  }
  return totals;
}

export function calculateTotalSharesOutstanding(shareholders: readonly Shareholder[]): number {
  let total = 0;
  for (const holder of shareholders) total += holder.totalShares;
  return total;
}

export function calculateTotalSharesFullyDiluted(
  shareholders: readonly Shareholder[],
  shareClasses: readonly ShareClass[],
): number {
  const held = calculateTotalSharesByClass(shareholders);
  const classes = buildShareClassMap(shareClasses);

  let total = 0;
  for (const [className, shareClass] of classes) {
    total += Math.max(held[className] ?? 0, shareClass.sharesAuthorized);
  }
  for (const [className, shares] of Object.entries(held)) {
    if (!classes.has(className)) total += shares;
  }
  return total;
}

// ---------------------------------------------------------------------------
// Per-shareholder fractions
// ---------------------------------------------------------------------------

export function calculateFullyDilutedOwnership(
  shareholder: Shareholder,
  shareholders: readonly Shareholder[],
  shareClasses: readonly ShareClass[],
): number {
  return fractionOf(shareholder.totalShares, calculateTotalSharesFullyDiluted(shareholders, shareClasses));
}

export function calculateBasicOwnership(shareholder: Shareholder, totalIssued: number): number {
  return fractionOf(shareholder.totalShares, totalIssued);
}

/** Votes carried by a holding; an unknown class carries none. */
export function votingPower(shareholder: Shareholder, classMap: ReadonlyMap<string, ShareClass>): number {
  const shareClass = classMap.get(shareholder.shareClass);
  return shareClass ? shareholder.totalShares * shareClass.votingRightsPerShare : 0;
}

export function calculateTotalVotingPower(
  shareholders: readonly Shareholder[],
  classMap: ReadonlyMap<string, ShareClass>,
): number {
  let total = 0;
  for (const holder of shareholders) total += votingPower(holder, classMap);
  return total;
}

export function calculateVotingPercentage(
  shareholder: Shareholder,
  classMap: ReadonlyMap<string, ShareClass>,
  allShareholders: readonly Shareholder[],
): number {
  return fractionOf(votingPower(shareholder, classMap), calculateTotalVotingPower(allShareholders, classMap));
}

export function calculateTotalBoardSeats(shareholders: readonly Shareholder[]): number {
  let total = 0;
  for (const holder of shareholders) total += holder.boardSeats;
  return total;
}

export function calculateBoardControlPercentage(shareholder: Shareholder, context: EntityPool): number {
  return fractionOf(shareholder.boardSeats, capTableSnapshot(context.allEntities).totalBoardSeats);
}

export function calculateShareClassUtilization(shareClass: ShareClass): number {
  return fractionOf(shareClass.sharesIssued, shareClass.sharesAuthorized);
}

/** Dilution of everyone already on the table when the round's shares are issued. */
export function calculateDilutionImpact(round: FundingRound, context: EntityPool): DilutionImpact {
  const preRoundShares = capTableSnapshot(context.allEntities).sharesOutstanding;
  const postRoundShares = preRoundShares + round.sharesIssued;
  const fraction = fractionOf(round.sharesIssued, postRoundShares);
  return {
    dilutionPercentage: fraction,
    newInvestorOwnership: fraction,
    preRoundShares,
    postRoundShares,
  };
}

// ---------------------------------------------------------------------------
// Per-pool snapshot
// ---------------------------------------------------------------------------

// Keyed on the pool array itself: the engine builds one frozen context per
// month and every calculator of that month sees the same allEntities.
const snapshots = new WeakMap<readonly Entity[], CapTableSnapshot>();

export function capTableSnapshot(entities: readonly Entity[]): CapTableSnapshot {
  const cached = snapshots.get(entities);
  if (cached) return cached;

  const table = partitionCapTable(entities);
  const classMap = buildShareClassMap(table.shareClasses);
  const snapshot: CapTableSnapshot = {
    table,
    classMap,
    sharesOutstanding: calculateTotalSharesOutstanding(table.shareholders),
    fullyDilutedShares: calculateTotalSharesFullyDiluted(table.shareholders, table.shareClasses),
    totalVotingPower: calculateTotalVotingPower(table.shareholders, classMap),
    totalBoardSeats: calculateTotalBoardSeats(table.shareholders),
  };
  snapshots.set(entities, snapshot);
  return snapshot;
}

// ---------------------------------------------------------------------------
// Holder-type rollups (reported, rounded)
// ---------------------------------------------------------------------------

const EMPLOYEE_POOL_TYPES: ReadonlySet<Shareholder["shareholderType"]> = new Set(["employee", "other"]);

function rollup(table: CapTableEntities, matches: (holder: Shareholder) => boolean): number {
  let shares = 0;
  for (const holder of table.shareholders) {
    if (matches(holder)) shares += holder.totalShares;
  }
  return roundPercentage(
    fractionOf(shares, calculateTotalSharesFullyDiluted(table.shareholders, table.shareClasses)),
  );
}

export function getFounderOwnershipPercentage(table: CapTableEntities): number {
  return rollup(table, (h) => h.shareholderType === "founder");
}

/** Employees plus the unallocated pool, which is recorded as "other". */
export function getEmployeeOwnershipPercentage(table: CapTableEntities): number {
  return rollup(table, (h) => EMPLOYEE_POOL_TYPES.has(h.shareholderType));
}

export function getInvestorOwnershipPercentage(table: CapTableEntities): number {
  return rollup(table, (h) => h.shareholderType === "investor");
}

export function fractionOf(part: number, whole: number): number {
  return whole > 0 ? part / whole : 0;
}
