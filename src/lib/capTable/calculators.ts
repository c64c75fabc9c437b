/**
 * Cap-table calculators. They read the rest of the table from
 * `context.allEntities` and report rounded fractions. None of them roll
 * up into a cash flow category.
 *
 * Table-wide totals come from `capTableSnapshot`, which is built once per
 * pool, so a month with N holders costs O(N) rather than O(N^2).
 *
 * The holder-type rollups describe the whole table. The registry is keyed
 * by entity type, so they hang off `share_class` and every class reports
 * the same figure.
 */

import type { CalculatorRegistry } from "@/lib/calculatorRegistry";
import { isActive } from "@/lib/entities";

import {
  calculateBoardControlPercentage,
  calculateDilutionImpact,
  calculateShareClassUtilization,
  capTableSnapshot,
  fractionOf,
  getEmployeeOwnershipPercentage,
  getFounderOwnershipPercentage,
  getInvestorOwnershipPercentage,
  votingPower,
} from "./ownership";
import { roundPercentage } from "./rounding";
import { calculateVestedShares } from "./vesting";

export function registerCapTableCalculators(registry: CalculatorRegistry): CalculatorRegistry {
  registry.register(
    "shareholder",
    "ownership_percentage",
    (holder, ctx) => {
      if (!isActive(holder, ctx.asOfDate)) return 0;
      const { fullyDilutedShares } = capTableSnapshot(ctx.allEntities);
      return roundPercentage(fractionOf(holder.totalShares, fullyDilutedShares));
    },
    { description: "Fully diluted ownership fraction" },
  );

  registry.register(
    "shareholder",
    "voting_control",
    (holder, ctx) => {
      if (!isActive(holder, ctx.asOfDate)) return 0;
      const { classMap, totalVotingPower } = capTableSnapshot(ctx.allEntities);
      return roundPercentage(fractionOf(votingPower(holder, classMap), totalVotingPower));
    },
    { description: "Share of total voting power" },
  );

  registry.register(
    "shareholder",
    "board_control",
    (holder, ctx) =>
      isActive(holder, ctx.asOfDate) ? roundPercentage(calculateBoardControlPercentage(holder, ctx)) : 0,
    { description: "Share of board seats" },
  );

  registry.register(
    "shareholder",
    "vested_shares",
    (holder, ctx) => (isActive(holder, ctx.asOfDate) ? calculateVestedShares(holder, ctx.asOfDate) : 0),
    { description: "Shares vested as of the period date" },
  );

  registry.register(
    "share_class",
    "utilization_rate",
    (shareClass, ctx) =>
      isActive(shareClass, ctx.asOfDate) ? roundPercentage(calculateShareClassUtilization(shareClass)) : 0,
    { description: "Issued over authorized shares" },
  );

  const rollups = [
    ["founder_ownership", getFounderOwnershipPercentage, "Founders' fully diluted ownership"],
    ["employee_ownership", getEmployeeOwnershipPercentage, "Employees' and pool fully diluted ownership"],
    ["investor_ownership", getInvestorOwnershipPercentage, "Investors' fully diluted ownership"],
  ] as const;
  for (const [name, rollupOf, description] of rollups) {
    registry.register(
      "share_class",
      name,
      (shareClass, ctx) =>
        isActive(shareClass, ctx.asOfDate) ? rollupOf(capTableSnapshot(ctx.allEntities).table) : 0,
      { description },
    );
  }

  registry.register(
    "funding_round",
    "dilution_impact",
    (round, ctx) => {
      if (!isActive(round, ctx.asOfDate)) return 0;
      const impact = calculateDilutionImpact(round, ctx);
      return {
        dilutionPercentage: roundPercentage(impact.dilutionPercentage),
        newInvestorOwnership: roundPercentage(impact.newInvestorOwnership),
        preRoundShares: impact.preRoundShares,
        postRoundShares: impact.postRoundShares,
      };
    },
    { description: "Dilution caused by the round's new shares" },
  );

  return registry;
}
