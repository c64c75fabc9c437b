/**
 * Cap-table validation collaborator. The calculation side treats broken
 * references as zero; this surfaces them so callers can decide whether
 * the numbers are trustworthy.
 */

import type { Entity } from "@/lib/entities";

import { calculateTotalSharesByClass, partitionCapTable } from "./ownership";
import type { CapTableIssue, CapTableValidationReport } from "./types";

export function validateCapTable(entities: readonly Entity[]): CapTableValidationReport {
  const { shareholders, shareClasses, fundingRounds } = partitionCapTable(entities);
  const issues: CapTableIssue[] = [];

  const known = new Set<string>();
  for (const shareClass of shareClasses) {
    if (known.has(shareClass.className)) {
      issues.push({
        code: "DUPLICATE_SHARE_CLASS",
        severity: "error",
        entity: shareClass.name,
        message: `share class "${shareClass.className}" is defined more than once`,
      });
    }
    known.add(shareClass.className);
  }

  for (const holder of shareholders) {
    if (!known.has(holder.shareClass)) {
      issues.push({
        code: "DANGLING_SHARE_CLASS",
        severity: "error",
        entity: holder.name,
        message: `references unknown share class "${holder.shareClass}"`,
      });
    }
    if (holder.vestedShares !== undefined && holder.vestedShares > holder.totalShares) {
      issues.push({
        code: "VESTED_EXCEEDS_TOTAL",
        severity: "error",
        entity: holder.name,
        message: `vested shares ${holder.vestedShares} exceed total shares ${holder.totalShares}`,
      });
    }
  }

  const held = calculateTotalSharesByClass(shareholders);
  const reported = new Set<string>();
  for (const shareClass of shareClasses) {
    const shares = held[shareClass.className] ?? 0;
    if (reported.has(shareClass.className) || shares <= shareClass.sharesAuthorized) continue;
    reported.add(shareClass.className);
    issues.push({
      code: "SHARES_EXCEED_AUTHORIZED",
      severity: "warning",
      entity: shareClass.name,
      message: `${shares} shares held against ${shareClass.sharesAuthorized} authorized`,
    });
  }

  for (const round of fundingRounds) {
    if (round.sharesIssued > 0 && !known.has(round.shareClass)) {
      issues.push({
        code: "UNKNOWN_ROUND_CLASS",
        severity: "warning",
        entity: round.name,
        message: `issues shares in unknown share class "${round.shareClass}"`,
      });
    }
  }

  const errors = issues.filter((i) => i.severity === "error");
  const warnings = issues.filter((i) => i.severity === "warning");
  return { valid: errors.length === 0, errors, warnings };
}
