export type {
  CapTableEntities,
  CapTableIssue,
  CapTableIssueCode,
  CapTableSummary,
  CapTableValidationReport,
  DilutionImpact,
  ShareClassBreakdown,
  SummaryOptions,
  ValuationMetrics,
} from "./types";
export type { CapTableSnapshot } from "./ownership";
export { PERCENTAGE_PLACES, roundPercentage } from "./rounding";
export {
  partitionCapTable,
  buildShareClassMap,
  calculateTotalSharesByClass,
  calculateTotalSharesOutstanding,
  calculateTotalSharesFullyDiluted,
  calculateFullyDilutedOwnership,
  calculateBasicOwnership,
  votingPower,
  calculateTotalVotingPower,
  calculateVotingPercentage,
  calculateTotalBoardSeats,
  calculateBoardControlPercentage,
  calculateShareClassUtilization,
  calculateDilutionImpact,
  capTableSnapshot,
  getFounderOwnershipPercentage,
  getEmployeeOwnershipPercentage,
  getInvestorOwnershipPercentage,
} from "./ownership";
export { elapsedMonths, calculateVestedShares } from "./vesting";
export { validateCapTable } from "./validator";
export type { SummaryContext } from "./summary";
export { generateCapTableSummary, emptyCapTableSummary } from "./summary";
export { registerCapTableCalculators } from "./calculators";
