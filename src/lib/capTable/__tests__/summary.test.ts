/**
 * Cap-table summary and validation.
 *
 * Run: node --import tsx --test src/lib/capTable/__tests__/summary.test.ts
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { CapTableReferenceError } from "@/lib/errors";
import { emptyCapTableSummary, generateCapTableSummary, validateCapTable } from "../index";
import { holder, parseAs, shareClass } from "./fixtures";

const COMMON = shareClass("common", 15_000_000, { sharesIssued: 8_000_000, parValue: 0.25 });
const PREFERRED = shareClass("preferred", 3_000_000, {
  sharesIssued: 2_000_000,
  parValue: 0.5,
  liquidationPreference: 1.5,
  votingRightsPerShare: 2,
});
const ALICE = holder("Alice", 4_000_000, { boardSeats: 2 });
const BOB = holder("Bob", 4_000_000, { boardSeats: 1 });
const FUND = holder("Fund", 2_000_000, {
  shareholderType: "investor",
  shareClass: "preferred",
  boardSeats: 1,
});
const SEED = parseAs("funding_round", {
  name: "Seed",
  startDate: "2024-06-01",
  roundType: "seed",
  amountRaised: 2_000_000,
  preMoneyValuation: 8_000_000,
  postMoneyValuation: 10_000_000,
  sharesIssued: 2_000_000,
  pricePerShare: 1,
  shareClass: "preferred",
});

const TABLE = [COMMON, PREFERRED, ALICE, BOB, FUND, SEED];

describe("generateCapTableSummary", () => {
  it("gives each of two founders 4M of 15M authorized", () => {
    const summary = generateCapTableSummary([
      shareClass("common", 15_000_000),
      holder("Alice", 4_000_000),
      holder("Bob", 4_000_000),
    ]);
    assert.equal(summary.ownershipByShareholder.Alice, 0.2667);
    assert.equal(summary.fullyDilutedShares, 15_000_000);
    assert.equal(summary.totalSharesOutstanding, 8_000_000);
  });

  it("summarises shares, control and classes", () => {
    const summary = generateCapTableSummary(TABLE);

    assert.equal(summary.totalSharesOutstanding, 10_000_000);
    assert.equal(summary.totalSharesAuthorized, 18_000_000);
    assert.equal(summary.fullyDilutedShares, 18_000_000);
    assert.deepEqual(summary.ownershipByShareholder, { Alice: 0.2222, Bob: 0.2222, Fund: 0.1111 });
    assert.deepEqual(summary.ownershipByClass, { common: 0.4444, preferred: 0.1111 });
    assert.deepEqual(summary.votingControl, { Alice: 0.3333, Bob: 0.3333, Fund: 0.3333 });
    assert.deepEqual(summary.boardControl, { Alice: 0.5, Bob: 0.25, Fund: 0.25 });
    assert.deepEqual(summary.shareClassBreakdown.preferred, {
      sharesAuthorized: 3_000_000,
      sharesIssued: 2_000_000,
      sharesHeld: 2_000_000,
      utilization: 0.6667,
      liquidationPreference: 1.5,
      votingRightsPerShare: 2,
    });
    assert.equal(summary.shareClassBreakdown.common?.utilization, 0.5333);
  });

  it("measures breakdown utilization from shares actually held", () => {
    const options = shareClass("options", 1000, { sharesIssued: 800 });
    const summary = generateCapTableSummary([options, holder("Gail", 500, { shareClass: "options" })]);
    assert.deepEqual(summary.shareClassBreakdown.options, {
      sharesAuthorized: 1000,
      sharesIssued: 800,
      sharesHeld: 500,
      utilization: 0.5,
      liquidationPreference: 1,
      votingRightsPerShare: 1,
    });
  });

  it("reports holder-type rollups and the preference overhang", () => {
    const summary = generateCapTableSummary(TABLE);
    assert.equal(summary.founderOwnership, 0.4444);
    assert.equal(summary.employeeOwnership, 0);
    assert.equal(summary.investorOwnership, 0.1111);
    // common 8M x 1 x 0.25 + preferred 2M x 1.5 x 0.5
    assert.equal(summary.liquidationPreferenceOverhang, 3_500_000);
    assert.deepEqual(summary.diagnostics, []);
  });

  it("derives valuation metrics from the latest round", () => {
    const seriesA = parseAs("funding_round", {
      name: "Series A",
      startDate: "2025-03-01",
      roundType: "series_a",
      amountRaised: 5_000_000,
      preMoneyValuation: 20_000_000,
    });

    assert.deepEqual(generateCapTableSummary(TABLE).valuation, {
      roundName: "Seed",
      roundType: "seed",
      closedOn: "2024-06-01",
      preMoneyValuation: 8_000_000,
      postMoneyValuation: 10_000_000,
      pricePerShare: 1,
      valuePerFullyDilutedShare: 0.5556,
    });

    const later = generateCapTableSummary([...TABLE, seriesA]).valuation;
    assert.equal(later?.roundName, "Series A");
    assert.equal(later?.postMoneyValuation, 25_000_000);
    assert.equal(later?.pricePerShare, null);

    const asOf = generateCapTableSummary([...TABLE, seriesA], { asOfDate: "2024-12-31" }).valuation;
    assert.equal(asOf?.roundName, "Seed");
  });

  it("returns an all-zero summary for an empty table", () => {
    assert.deepEqual(generateCapTableSummary([]), emptyCapTableSummary());
    const office = parseAs("facility", { name: "Office", monthlyCost: 1000 });
    assert.deepEqual(generateCapTableSummary([office]), emptyCapTableSummary());
  });

  it("counts a dangling class reference as zero votes", () => {
    const carol = holder("Carol", 1_000_000, { shareClass: "series_z" });
    const summary = generateCapTableSummary([COMMON, ALICE, carol]);
    assert.equal(summary.votingControl.Carol, 0);
    assert.equal(summary.votingControl.Alice, 1);
    assert.equal(summary.fullyDilutedShares, 16_000_000);
    assert.deepEqual(
      summary.diagnostics.map((d) => d.code),
      ["DANGLING_SHARE_CLASS"],
    );
  });

  it("throws on a dangling reference in strict mode", () => {
    const carol = holder("Carol", 1_000_000, { shareClass: "series_z" });
    assert.throws(
      () => generateCapTableSummary([COMMON, ALICE, carol], {}, { strict: true }),
      (err: unknown) =>
        err instanceof CapTableReferenceError &&
        err.message === "DANGLING_SHARE_CLASS: unknown share class referenced by Carol",
    );
  });

  it("summarises a thousand shareholders quickly", () => {
    const holders = Array.from({ length: 1200 }, (_, i) =>
      holder(`Holder ${i}`, 1000, {
        shareholderType: i % 2 === 0 ? "employee" : "investor",
        boardSeats: i % 100 === 0 ? 1 : 0,
      }),
    );
    const started = performance.now();
    const summary = generateCapTableSummary([shareClass("common", 2_000_000), ...holders]);
    const elapsed = performance.now() - started;

    assert.ok(elapsed < 1000, `summary took ${elapsed.toFixed(0)}ms`);
    assert.equal(summary.totalSharesOutstanding, 1_200_000);
    assert.equal(summary.ownershipByShareholder["Holder 0"], 0.0005);
    assert.equal(summary.boardControl["Holder 100"], 0.0833);
  });
});

describe("validateCapTable", () => {
  it("reports every kind of reference and count problem", () => {
    const report = validateCapTable([
      COMMON,
      shareClass("common", 1000, { name: "Common again" }),
      shareClass("tiny", 10),
      holder("Dan", 100, { shareClass: "ghost" }),
      holder("Eve", 100, { vestedShares: 200 }),
      holder("Finn", 50, { shareClass: "tiny" }),
      parseAs("funding_round", {
        name: "Bridge",
        roundType: "bridge",
        amountRaised: 100,
        sharesIssued: 10,
        shareClass: "series_b",
      }),
    ]);

    assert.equal(report.valid, false);
    assert.deepEqual(
      report.errors.map((i) => [i.code, i.entity]),
      [
        ["DUPLICATE_SHARE_CLASS", "Common again"],
        ["DANGLING_SHARE_CLASS", "Dan"],
        ["VESTED_EXCEEDS_TOTAL", "Eve"],
      ],
    );
    assert.deepEqual(
      report.warnings.map((i) => [i.code, i.entity]),
      [
        ["SHARES_EXCEED_AUTHORIZED", "tiny stock"],
        ["UNKNOWN_ROUND_CLASS", "Bridge"],
      ],
    );
    assert.equal(report.warnings[0]?.message, "50 shares held against 10 authorized");
  });

  it("accepts a consistent table", () => {
    assert.deepEqual(validateCapTable(TABLE), { valid: true, errors: [], warnings: [] });
  });
});
