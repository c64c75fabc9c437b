/**
 * Calendar helper tests.
 *
 * Run: node --import tsx --test src/lib/dates/__tests__/isoDate.test.ts
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
  addDays,
  addMonths,
  daysBetween,
  enumerateMonths,
  isIsoDate,
  isSameMonth,
  monthEnd,
  monthStart,
  monthsBetween,
} from "../isoDate";

describe("isIsoDate", () => {
  it("accepts real calendar dates", () => {
    assert.equal(isIsoDate("2024-02-29"), true);
  });

  it("rejects impossible days and other formats", () => {
    assert.equal(isIsoDate("2023-02-29"), false);
    assert.equal(isIsoDate("2024-13-01"), false);
    assert.equal(isIsoDate("2024/01/01"), false);
  });
});

describe("month arithmetic", () => {
  it("computes month boundaries", () => {
    assert.equal(monthStart("2024-03-17"), "2024-03-01");
    assert.equal(monthEnd("2024-02-10"), "2024-02-29");
    assert.equal(monthEnd("2023-12-05"), "2023-12-31");
  });

  it("counts calendar months ignoring the day", () => {
    assert.equal(monthsBetween("2024-01-01", "2025-01-01"), 12);
    assert.equal(monthsBetween("2024-01-31", "2024-02-01"), 1);
    assert.equal(monthsBetween("2024-05-01", "2024-03-01"), -2);
  });

  it("clamps the day when adding months", () => {
    assert.equal(addMonths("2024-01-31", 1), "2024-02-29");
    assert.equal(addMonths("2024-11-15", 3), "2025-02-15");
    assert.equal(addMonths("2024-01-15", -1), "2023-12-15");
  });

  it("adds and measures days in UTC", () => {
    assert.equal(addDays("2024-01-01", 180), "2024-06-29");
    assert.equal(daysBetween("2024-01-01", "2025-01-01"), 366);
  });

  it("compares months", () => {
    assert.equal(isSameMonth("2024-06-01", "2024-06-30"), true);
    assert.equal(isSameMonth("2024-06-30", "2024-07-01"), false);
  });
});

describe("enumerateMonths", () => {
  it("returns one month start per calendar month inclusive", () => {
    assert.deepEqual(enumerateMonths("2024-11-20", "2025-02-03"), [
      "2024-11-01",
      "2024-12-01",
      "2025-01-01",
      "2025-02-01",
    ]);
  });

  it("is empty when the end month precedes the start month", () => {
    assert.deepEqual(enumerateMonths("2024-05-01", "2024-04-30"), []);
  });
});
