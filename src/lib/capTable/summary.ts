/**
 * Consolidated ownership summary.
 *
 * Share totals, voting power and board seats are reduced once and reused
 * for every shareholder, so the summary stays linear in table size.
 */

import type { IsoDate } from "@/lib/dates";
import type { Entity, FundingRound } from "@/lib/entities";
import { isActive } from "@/lib/entities";
import { CapTableReferenceError } from "@/lib/errors";

import {
  buildShareClassMap,
  calculateTotalBoardSeats,
  calculateTotalSharesByClass,
  calculateTotalSharesFullyDiluted,
  calculateTotalSharesOutstanding,
  calculateTotalVotingPower,
  fractionOf,
  getEmployeeOwnershipPercentage,
  getFounderOwnershipPercentage,
  getInvestorOwnershipPercentage,
  partitionCapTable,
  votingPower,
} from "./ownership";
import { roundPercentage } from "./rounding";
import type { CapTableSummary, ShareClassBreakdown, SummaryOptions, ValuationMetrics } from "./types";
import { validateCapTable } from "./validator";

export interface SummaryContext {
  /** Only entities active on this date take part. */
  asOfDate?: IsoDate;
}

export function emptyCapTableSummary(): CapTableSummary {
  return {
    totalSharesOutstanding: 0,
    totalSharesAuthorized: 0,
    fullyDilutedShares: 0,
    ownershipByShareholder: {},
    ownershipByClass: {},
    votingControl: {},
    boardControl: {},
    shareClassBreakdown: {},
    founderOwnership: 0,
    employeeOwnership: 0,
    investorOwnership: 0,
    liquidationPreferenceOverhang: 0,
    valuation: null,
    diagnostics: [],
  };
}

function roundAll(raw: Map<string, number>): Record<string, number> {
  const out: Record<string, number> = {};
  for (const [key, value] of raw) out[key] = roundPercentage(value);
  return out;
}

function addTo(map: Map<string, number>, key: string, value: number): void {
  map.set(key, (map.get(key) ?? 0) + value);
}

/** Most recent round by start date; later input wins a tie. */
function latestRound(rounds: readonly FundingRound[]): FundingRound | null {
  let latest: FundingRound | null = null;
  for (const round of rounds) {
    if (latest === null || round.startDate >= latest.startDate) latest = round;
  }
  return latest;
}

function valuationOf(round: FundingRound, fullyDilutedShares: number): ValuationMetrics {
  const postMoney =
    round.postMoneyValuation ??
    (round.preMoneyValuation !== undefined ? round.preMoneyValuation + round.amountRaised : null);
  const preMoney =
    round.preMoneyValuation ?? (postMoney !== null ? postMoney - round.amountRaised : null);
  return {
    roundName: round.name,
    roundType: round.roundType,
    closedOn: round.startDate,
    preMoneyValuation: preMoney,
    postMoneyValuation: postMoney,
    pricePerShare: round.pricePerShare ?? null,
    valuePerFullyDilutedShare:
      postMoney !== null && fullyDilutedShares > 0
        ? roundPercentage(postMoney / fullyDilutedShares)
        : null,
  };
}

export function generateCapTableSummary(
  entities: readonly Entity[],
  context: SummaryContext = {},
  options: SummaryOptions = {},
): CapTableSummary {
  const { asOfDate } = context;
  const pool = asOfDate === undefined ? entities : entities.filter((e) => isActive(e, asOfDate));
  const table = partitionCapTable(pool);
  const { shareholders, shareClasses, fundingRounds } = table;
  if (shareholders.length + shareClasses.length + fundingRounds.length === 0) {
    return emptyCapTableSummary();
  }

  const report = validateCapTable(pool);
  const dangling = report.errors.filter((i) => i.code === "DANGLING_SHARE_CLASS").map((i) => i.entity);
  if (dangling.length > 0) {
    if (options.strict) throw new CapTableReferenceError(dangling);
    console.warn("[capTable] unknown share class references count as zero votes", {
      shareholders: dangling,
    });
  }

  const classMap = buildShareClassMap(shareClasses);
  const heldByClass = calculateTotalSharesByClass(shareholders);
  const outstanding = calculateTotalSharesOutstanding(shareholders);
  const fullyDiluted = calculateTotalSharesFullyDiluted(shareholders, shareClasses);
  const totalVotes = calculateTotalVotingPower(shareholders, classMap);
  const totalSeats = calculateTotalBoardSeats(shareholders);

  const ownership = new Map<string, number>();
  const voting = new Map<string, number>();
  const board = new Map<string, number>();
  for (const holder of shareholders) {
    addTo(ownership, holder.name, fractionOf(holder.totalShares, fullyDiluted));
    addTo(voting, holder.name, fractionOf(votingPower(holder, classMap), totalVotes));
    addTo(board, holder.name, fractionOf(holder.boardSeats, totalSeats));
  }

  const byClass = new Map<string, number>();
  for (const [className, shares] of Object.entries(heldByClass)) {
    byClass.set(className, fractionOf(shares, fullyDiluted));
  }

  let totalAuthorized = 0;
  const breakdown: Record<string, ShareClassBreakdown> = {};
  for (const [className, shareClass] of classMap) {
    totalAuthorized += shareClass.sharesAuthorized;
    const held = heldByClass[className] ?? 0;
    breakdown[className] = {
      sharesAuthorized: shareClass.sharesAuthorized,
      sharesIssued: shareClass.sharesIssued,
      sharesHeld: held,
      utilization: roundPercentage(fractionOf(held, shareClass.sharesAuthorized)),
      liquidationPreference: shareClass.liquidationPreference,
      votingRightsPerShare: shareClass.votingRightsPerShare,
    };
  }

  // Preference owed on the shares actually held, at par.
  let overhang = 0;
  for (const [className, shareClass] of classMap) {
    overhang += (heldByClass[className] ?? 0) * shareClass.liquidationPreference * shareClass.parValue;
  }

  const latest = latestRound(fundingRounds);

  return {
    totalSharesOutstanding: outstanding,
    totalSharesAuthorized: totalAuthorized,
    fullyDilutedShares: fullyDiluted,
    ownershipByShareholder: roundAll(ownership),
    ownershipByClass: roundAll(byClass),
    votingControl: roundAll(voting),
    boardControl: roundAll(board),
    shareClassBreakdown: breakdown,
    founderOwnership: getFounderOwnershipPercentage(table),
    employeeOwnership: getEmployeeOwnershipPercentage(table),
    investorOwnership: getInvestorOwnershipPercentage(table),
    liquidationPreferenceOverhang: overhang,
    valuation: latest ? valuationOf(latest, fullyDiluted) : null,
    diagnostics: [...report.errors, ...report.warnings],
  };
}
