/**
 * Cap-table ownership math.
 *
 * Run: node --import tsx --test src/lib/capTable/__tests__/ownership.test.ts
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { createCalculationContext, createCalculatorRegistry } from "@/lib/calculatorRegistry";
import { registerBuiltinCalculators } from "@/lib/calculators";
import { CashFlowEngine } from "@/lib/cashflowEngine";
import { parseEntity } from "@/lib/entities";
import { InMemoryEntityStore } from "@/lib/entityStore";
import {
  buildShareClassMap,
  calculateBasicOwnership,
  calculateBoardControlPercentage,
  calculateDilutionImpact,
  calculateFullyDilutedOwnership,
  calculateShareClassUtilization,
  calculateTotalSharesByClass,
  calculateTotalSharesFullyDiluted,
  calculateVestedShares,
  calculateVotingPercentage,
  capTableSnapshot,
  elapsedMonths,
  getEmployeeOwnershipPercentage,
  getFounderOwnershipPercentage,
  getInvestorOwnershipPercentage,
  registerCapTableCalculators,
  roundPercentage,
} from "../index";
import { holder, parseAs, shareClass } from "./fixtures";

const ALICE = holder("Alice", 4_000_000);
const BOB = holder("Bob", 4_000_000);
const COMMON = shareClass("common", 15_000_000, { sharesIssued: 9_000_000 });

// ---------------------------------------------------------------------------
// Rounding
// ---------------------------------------------------------------------------

describe("roundPercentage", () => {
  it("rounds half away from zero at four places", () => {
    assert.equal(roundPercentage(0.26665), 0.2667);
    assert.equal(roundPercentage(-0.00005), -0.0001);
    assert.equal(roundPercentage(4_000_000 / 15_000_000), 0.2667);
  });

  it("ignores binary representation noise", () => {
    assert.equal(roundPercentage(1.005, 2), 1.01);
  });

  it("maps non-finite input to 0", () => {
    assert.equal(roundPercentage(Number.NaN), 0);
    assert.equal(roundPercentage(Number.POSITIVE_INFINITY), 0);
  });
});

// ---------------------------------------------------------------------------
// Totals
// ---------------------------------------------------------------------------

describe("share totals", () => {
  it("sums holdings per class", () => {
    const carol = holder("Carol", 1_000_000, { shareClass: "preferred" });
    assert.deepEqual(calculateTotalSharesByClass([ALICE, BOB, carol]), {
      common: 8_000_000,
      preferred: 1_000_000,
    });
  });

  it("uses authorized shares when they exceed holdings", () => {
    assert.equal(calculateTotalSharesFullyDiluted([ALICE, BOB], [COMMON]), 15_000_000);
  });

  it("uses holdings when they exceed authorized shares", () => {
    const small = shareClass("common", 5_000_000);
    assert.equal(calculateTotalSharesFullyDiluted([ALICE, BOB], [small]), 8_000_000);
  });

  it("still counts holdings in a class with no definition", () => {
    const carol = holder("Carol", 1_000_000, { shareClass: "series_a" });
    assert.equal(calculateTotalSharesFullyDiluted([ALICE, BOB, carol], [COMMON]), 16_000_000);
  });
});

// ---------------------------------------------------------------------------
// Per-shareholder fractions
// ---------------------------------------------------------------------------

describe("ownership fractions", () => {
  it("computes fully diluted ownership against the authorized pool", () => {
    assert.equal(calculateFullyDilutedOwnership(ALICE, [ALICE, BOB], [COMMON]), 4_000_000 / 15_000_000);
  });

  it("returns 0 for an empty denominator", () => {
    const nobody = holder("Nobody", 0);
    assert.equal(calculateFullyDilutedOwnership(nobody, [nobody], []), 0);
    assert.equal(calculateBasicOwnership(ALICE, 0), 0);
  });

  it("conserves basic ownership across a fully allocated class", () => {
    const holders = [holder("A", 3_000_000), holder("B", 3_000_000), holder("C", 4_000_000)];
    const total = holders.reduce((acc, h) => acc + h.totalShares, 0);
    const sum = holders.reduce((acc, h) => acc + calculateBasicOwnership(h, total), 0);
    assert.ok(Math.abs(sum - 1) < 1e-9);
  });

  it("gives an unknown class zero voting power", () => {
    const carol = holder("Carol", 1_000_000, { shareClass: "series_a" });
    const classMap = buildShareClassMap([COMMON]);
    assert.equal(calculateVotingPercentage(ALICE, classMap, [ALICE, carol]), 1);
    assert.equal(calculateVotingPercentage(carol, classMap, [ALICE, carol]), 0);
  });

  it("weights votes by the class's voting rights", () => {
    const preferred = shareClass("preferred", 2_000_000, { votingRightsPerShare: 2 });
    const fund = holder("Fund", 2_000_000, { shareClass: "preferred", shareholderType: "investor" });
    const classMap = buildShareClassMap([COMMON, preferred]);
    assert.equal(calculateVotingPercentage(fund, classMap, [ALICE, fund]), 0.5);
  });

  it("splits board control by seats", () => {
    const seated = [holder("A", 1, { boardSeats: 2 }), holder("B", 1, { boardSeats: 1 }), holder("C", 1)];
    const context = { allEntities: [...seated, COMMON] };
    assert.equal(calculateBoardControlPercentage(seated[0], context), 2 / 3);
    assert.equal(calculateBoardControlPercentage(seated[2], context), 0);
    assert.equal(calculateBoardControlPercentage(ALICE, { allEntities: [ALICE, BOB] }), 0);
  });

  it("measures class utilization from issued shares", () => {
    assert.equal(calculateShareClassUtilization(COMMON), 0.6);
  });
});

// ---------------------------------------------------------------------------
// Dilution
// ---------------------------------------------------------------------------

describe("calculateDilutionImpact", () => {
  it("dilutes by exactly S / (P + S)", () => {
    const round = parseAs("funding_round", {
      name: "Seed",
      roundType: "seed",
      amountRaised: 1_500_000,
      sharesIssued: 3_000_000,
    });
    const impact = calculateDilutionImpact(round, { allEntities: [ALICE, BOB, COMMON, round] });
    assert.deepEqual(impact, {
      dilutionPercentage: 3_000_000 / (8_000_000 + 3_000_000),
      newInvestorOwnership: 3_000_000 / 11_000_000,
      preRoundShares: 8_000_000,
      postRoundShares: 11_000_000,
    });
  });
});

// ---------------------------------------------------------------------------
// Rollups
// ---------------------------------------------------------------------------

describe("holder-type rollups", () => {
  const table = {
    shareholders: [
      ALICE,
      BOB,
      holder("Erin", 1_000_000, { shareholderType: "employee" }),
      holder("Pool", 1_000_000, { shareholderType: "other" }),
      holder("Fund", 2_000_000, { shareholderType: "investor", shareClass: "preferred" }),
    ],
    shareClasses: [COMMON, shareClass("preferred", 2_000_000)],
    fundingRounds: [],
  };

  it("divides by fully diluted shares and rounds", () => {
    assert.equal(getFounderOwnershipPercentage(table), 0.4706);
    assert.equal(getEmployeeOwnershipPercentage(table), 0.1176);
    assert.equal(getInvestorOwnershipPercentage(table), 0.1176);
  });
});

// ---------------------------------------------------------------------------
// Vesting
// ---------------------------------------------------------------------------

describe("calculateVestedShares", () => {
  const grantee = holder("Erin", 4800, {
    shareholderType: "employee",
    acquisitionDate: "2024-01-15",
    cliffMonths: 12,
    vestingMonths: 48,
  });

  it("counts completed months only", () => {
    assert.equal(elapsedMonths("2024-01-15", "2025-01-14"), 11);
    assert.equal(elapsedMonths("2024-01-15", "2025-01-15"), 12);
    assert.equal(elapsedMonths("2024-01-15", "2023-12-01"), 0);
  });

  it("vests nothing before the cliff", () => {
    assert.equal(calculateVestedShares(grantee, "2025-01-14"), 0);
  });

  it("vests linearly after the cliff", () => {
    assert.equal(calculateVestedShares(grantee, "2025-01-15"), 1200);
    assert.equal(calculateVestedShares(grantee, "2026-07-20"), 3000);
    assert.equal(calculateVestedShares(grantee, "2029-01-01"), 4800);
  });

  it("prefers an explicit vested count, capped at the total", () => {
    assert.equal(calculateVestedShares(holder("X", 100, { vestedShares: 40 }), "2024-02-01"), 40);
    assert.equal(calculateVestedShares(holder("Y", 100, { vestedShares: 400 }), "2024-02-01"), 100);
  });

  it("treats holdings without a schedule as vested", () => {
    assert.equal(calculateVestedShares(ALICE, "2024-01-01"), 4_000_000);
  });
});

// ---------------------------------------------------------------------------
// Registered calculators
// ---------------------------------------------------------------------------

describe("registerCapTableCalculators", () => {
  const registry = registerCapTableCalculators(createCalculatorRegistry());
  const round = parseAs("funding_round", {
    name: "Seed",
    roundType: "seed",
    amountRaised: 1_000_000,
    sharesIssued: 2_000_000,
  });
  const context = createCalculationContext({
    asOfDate: "2024-06-01",
    allEntities: [ALICE, BOB, COMMON, round],
  });

  it("lists the cap-table calculators by entity type", () => {
    assert.deepEqual(registry.listCalculators("shareholder"), {
      shareholder: ["ownership_percentage", "voting_control", "board_control", "vested_shares"],
    });
    assert.deepEqual(registry.listCalculators("share_class"), {
      share_class: ["utilization_rate", "founder_ownership", "employee_ownership", "investor_ownership"],
    });
  });

  it("reports holder-type rollups for the whole table", () => {
    const erin = holder("Erin", 3_000_000, { shareholderType: "employee" });
    const withStaff = createCalculationContext({
      asOfDate: "2024-06-01",
      allEntities: [ALICE, BOB, erin, COMMON],
    });
    // founders 8M and staff 3M over 15M fully diluted
    assert.equal(registry.calculate(COMMON, "founder_ownership", withStaff), 0.5333);
    assert.equal(registry.calculate(COMMON, "employee_ownership", withStaff), 0.2);
    assert.equal(registry.calculate(COMMON, "investor_ownership", withStaff), 0);
  });

  it("reports rounded fractions", () => {
    assert.equal(registry.calculate(ALICE, "ownership_percentage", context), 0.2667);
    assert.equal(registry.calculate(ALICE, "voting_control", context), 0.5);
    assert.equal(registry.calculate(COMMON, "utilization_rate", context), 0.6);
  });

  it("returns a structured dilution result", () => {
    assert.deepEqual(registry.calculate(round, "dilution_impact", context), {
      dilutionPercentage: 0.2,
      newInvestorOwnership: 0.2,
      preRoundShares: 8_000_000,
      postRoundShares: 10_000_000,
    });
  });

  it("returns 0 for a shareholder that has left", () => {
    const departed = holder("Dee", 1_000_000, { endDate: "2024-03-31" });
    const later = createCalculationContext({ asOfDate: "2024-06-01", allEntities: [departed, COMMON] });
    assert.equal(registry.calculate(departed, "ownership_percentage", later), 0);
  });
});

// ---------------------------------------------------------------------------
// Table-wide totals per period
// ---------------------------------------------------------------------------

describe("capTableSnapshot", () => {
  it("reduces the table once per entity pool", () => {
    const pool = [ALICE, BOB, COMMON];
    const snapshot = capTableSnapshot(pool);
    assert.equal(capTableSnapshot(pool), snapshot);
    assert.notEqual(capTableSnapshot([...pool]), snapshot);
    assert.equal(snapshot.sharesOutstanding, 8_000_000);
    assert.equal(snapshot.fullyDilutedShares, 15_000_000);
    assert.equal(snapshot.totalVotingPower, 8_000_000);
    assert.equal(snapshot.totalBoardSeats, 0);
  });

  it("forecasts a year over a thousand shareholders quickly", () => {
    const holders = Array.from({ length: 1200 }, (_, i) =>
      holder(`Holder ${i}`, 1000, {
        shareholderType: i % 2 === 0 ? "employee" : "investor",
        boardSeats: i % 100 === 0 ? 1 : 0,
      }),
    );
    const office = parseEntity({ type: "facility", name: "Office", startDate: "2024-01-01", monthlyCost: 5000 });
    const store = new InMemoryEntityStore([shareClass("common", 2_000_000), office, ...holders]);
    const registry = registerCapTableCalculators(registerBuiltinCalculators(createCalculatorRegistry()));
    const engine = new CashFlowEngine(store, registry);

    const started = performance.now();
    const rows = engine.calculatePeriod("2024-01-01", "2024-12-31");
    const elapsed = performance.now() - started;

    assert.ok(elapsed < 1000, `forecast took ${elapsed.toFixed(0)}ms`);
    assert.equal(rows.length, 12);
    assert.equal(rows[11]?.cashBalance, -60_000);

    const [first] = holders;
    const hundredth = holders[100];
    assert.ok(first && hundredth);
    const context = createCalculationContext({ asOfDate: "2024-06-01", allEntities: store.query() });
    assert.equal(registry.calculate(first, "ownership_percentage", context), 0.0005);
    assert.equal(registry.calculate(hundredth, "board_control", context), 0.0833);
  });
});
