import type { IsoDate } from "@/lib/dates";
import type { FundingRound, ShareClass, Shareholder } from "@/lib/entities";

export interface CapTableEntities {
  shareholders: Shareholder[];
  shareClasses: ShareClass[];
  fundingRounds: FundingRound[];
}

export interface DilutionImpact {
  dilutionPercentage: number;
  newInvestorOwnership: number;
  preRoundShares: number;
  postRoundShares: number;
}

export interface ShareClassBreakdown {
  sharesAuthorized: number;
  /** As recorded on the class entity. */
  sharesIssued: number;
  /** Summed over the shareholders of the class. */
  sharesHeld: number;
  /**
   * Held over authorized. The `utilization_rate` calculator reads the
   * class's own `sharesIssued` instead; the two differ when holdings are
   * missing from the table.
   */
  utilization: number;
  liquidationPreference: number;
  votingRightsPerShare: number;
}

export interface ValuationMetrics {
  roundName: string;
  roundType: string;
  closedOn: IsoDate;
  preMoneyValuation: number | null;
  postMoneyValuation: number | null;
  pricePerShare: number | null;
  /** Post-money divided by fully diluted shares. */
  valuePerFullyDilutedShare: number | null;
}

export type CapTableIssueCode =
  | "DANGLING_SHARE_CLASS"
  | "DUPLICATE_SHARE_CLASS"
  | "SHARES_EXCEED_AUTHORIZED"
  | "VESTED_EXCEEDS_TOTAL"
  | "UNKNOWN_ROUND_CLASS";

export interface CapTableIssue {
  code: CapTableIssueCode;
  severity: "error" | "warning";
  entity: string;
  message: string;
}

export interface CapTableValidationReport {
  valid: boolean;
  errors: CapTableIssue[];
  warnings: CapTableIssue[];
}

/** Reported values; percentages are fractions rounded to four places. */
export interface CapTableSummary {
  totalSharesOutstanding: number;
  totalSharesAuthorized: number;
  fullyDilutedShares: number;
  ownershipByShareholder: Record<string, number>;
  ownershipByClass: Record<string, number>;
  votingControl: Record<string, number>;
  boardControl: Record<string, number>;
  shareClassBreakdown: Record<string, ShareClassBreakdown>;
  founderOwnership: number;
  employeeOwnership: number;
  investorOwnership: number;
  /** Sum over classes of shares held x liquidation preference x par value. */
  liquidationPreferenceOverhang: number;
  valuation: ValuationMetrics | null;
  diagnostics: CapTableIssue[];
}

export interface SummaryOptions {
  /** Throw CapTableReferenceError on dangling share-class references. */
  strict?: boolean;
}
