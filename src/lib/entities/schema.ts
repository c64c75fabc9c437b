/**
 * Entity schemas.
 *
 * One zod object per entity kind, joined into a discriminated union on
 * `type`. Attributes that no schema declares are carried in `extra` so that
 * scenario overrides and custom calculators can still reach them.
 */

import { z } from "zod";

import { isIsoDate } from "@/lib/dates";

export const IsoDateSchema = z
  .string()
  .refine(isIsoDate, { message: "expected a calendar date (YYYY-MM-DD)" });

const DatedAmountSchema = z.object({
  date: IsoDateSchema,
  amount: z.number().nonnegative(),
});

const BaseEntitySchema = z.object({
  name: z.string().min(1),
  startDate: IsoDateSchema,
  endDate: IsoDateSchema.nullable().default(null),
  tags: z.array(z.string()).default([]),
  notes: z.string().optional(),
  extra: z.record(z.unknown()).default({}),
});

// ---------------------------------------------------------------------------
// Operating entities
// ---------------------------------------------------------------------------

export const EmployeeSchema = BaseEntitySchema.extend({
  type: z.literal("employee"),
  salary: z.number().positive(),
  position: z.string().optional(),
  department: z.string().optional(),
  payFrequency: z.enum(["monthly", "biweekly", "weekly", "annual"]).default("monthly"),
  // Left undefined when not set so scenario assumptions can supply it.
  overheadMultiplier: z.number().min(1).max(5).optional(),
  benefits: z.record(z.number()).default({}),
  allowances: z.record(z.number()).default({}),
  equityEligible: z.boolean().default(false),
  equityShares: z.number().int().nonnegative().default(0),
  equityStartDate: IsoDateSchema.optional(),
  equityVestYears: z.number().positive().default(4),
  bonusPerformanceMax: z.number().min(0).max(1).default(0),
  bonusMilestonesMax: z.number().min(0).max(1).default(0),
});

export const GrantSchema = BaseEntitySchema.extend({
  type: z.literal("grant"),
  amount: z.number().positive(),
  agency: z.string().optional(),
  program: z.string().optional(),
  grantNumber: z.string().optional(),
  indirectCostRate: z.number().min(0).max(1).default(0),
  paymentSchedule: z.array(DatedAmountSchema).default([]),
  milestones: z
    .array(
      z.object({
        name: z.string(),
        dueDate: IsoDateSchema.optional(),
        amount: z.number().nonnegative().optional(),
      }),
    )
    .default([]),
});

export const InvestmentSchema = BaseEntitySchema.extend({
  type: z.literal("investment"),
  amount: z.number().positive(),
  investor: z.string().optional(),
  roundName: z.string().optional(),
  valuation: z.number().positive().optional(),
  disbursementSchedule: z.array(DatedAmountSchema).default([]),
});

export const SaleSchema = BaseEntitySchema.extend({
  type: z.literal("sale"),
  amount: z.number().positive(),
  customer: z.string().optional(),
  product: z.string().optional(),
  quantity: z.number().int().positive().optional(),
  unitPrice: z.number().nonnegative().optional(),
  deliveryDate: IsoDateSchema.optional(),
});

export const ServiceSchema = BaseEntitySchema.extend({
  type: z.literal("service"),
  customer: z.string().optional(),
  serviceType: z.string().optional(),
  monthlyAmount: z.number().nonnegative().optional(),
  hourlyRate: z.number().nonnegative().optional(),
  hoursPerMonth: z.number().nonnegative().optional(),
  contractValue: z.number().nonnegative().optional(),
});

export const FacilitySchema = BaseEntitySchema.extend({
  type: z.literal("facility"),
  monthlyCost: z.number().positive(),
  location: z.string().optional(),
  squareFootage: z.number().positive().optional(),
  paymentFrequency: z.enum(["monthly", "quarterly", "annual"]).default("monthly"),
  utilitiesMonthly: z.number().nonnegative().default(0),
  insuranceAnnual: z.number().nonnegative().default(0),
  securityMonthly: z.number().nonnegative().default(0),
  maintenanceMonthly: z.number().nonnegative().default(0),
});

export const SoftwareSchema = BaseEntitySchema.extend({
  type: z.literal("software"),
  vendor: z.string().optional(),
  monthlyCost: z.number().nonnegative().optional(),
  annualCost: z.number().nonnegative().optional(),
  licenseCount: z.number().int().positive().optional(),
});

export const EquipmentSchema = BaseEntitySchema.extend({
  type: z.literal("equipment"),
  category: z.string().optional(),
  cost: z.number().nonnegative().default(0),
  purchaseDate: IsoDateSchema.optional(),
  purchasePrice: z.number().nonnegative().optional(),
  usefulLifeYears: z.number().positive().optional(),
  salvageValue: z.number().nonnegative().default(0),
  maintenancePercentage: z.number().min(0).max(1).default(0),
  maintenanceCost: z.number().nonnegative().optional(),
});

export const ProjectSchema = BaseEntitySchema.extend({
  type: z.literal("project"),
  totalBudget: z.number().positive(),
  status: z.enum(["planned", "active", "completed", "cancelled"]).default("planned"),
  milestones: z
    .array(
      z.object({
        name: z.string(),
        plannedDate: IsoDateSchema,
        budget: z.number().nonnegative().default(0),
        status: z.string().default("planned"),
      }),
    )
    .default([]),
});

// ---------------------------------------------------------------------------
// Cap-table entities
// ---------------------------------------------------------------------------

export const ShareholderSchema = BaseEntitySchema.extend({
  type: z.literal("shareholder"),
  shareholderType: z.enum(["founder", "employee", "investor", "advisor", "consultant", "other"]),
  totalShares: z.number().int().nonnegative(),
  shareClass: z.string().min(1).default("common"),
  boardSeats: z.number().int().nonnegative().default(0),
  email: z.string().optional(),
  acquisitionDate: IsoDateSchema.optional(),
  cliffMonths: z.number().int().nonnegative().default(0),
  vestingMonths: z.number().int().nonnegative().default(0),
  vestedShares: z.number().int().nonnegative().optional(),
});

export const ShareClassSchema = BaseEntitySchema.extend({
  type: z.literal("share_class"),
  className: z.string().min(1),
  sharesAuthorized: z.number().int().positive(),
  sharesIssued: z.number().int().nonnegative().default(0),
  parValue: z.number().nonnegative().default(0.001),
  liquidationPreference: z.number().min(0).max(10).default(1),
  participating: z.boolean().default(false),
  participationCap: z.number().positive().optional(),
  votingRightsPerShare: z.number().min(0).max(100).default(1),
  seniorityRank: z.number().int().nonnegative().default(0),
});

export const FundingRoundSchema = BaseEntitySchema.extend({
  type: z.literal("funding_round"),
  roundType: z.string().min(1),
  amountRaised: z.number().positive(),
  preMoneyValuation: z.number().nonnegative().optional(),
  postMoneyValuation: z.number().nonnegative().optional(),
  sharesIssued: z.number().int().nonnegative().default(0),
  pricePerShare: z.number().nonnegative().optional(),
  shareClass: z.string().min(1).default("preferred"),
  leadInvestor: z.string().optional(),
});

// ---------------------------------------------------------------------------
// Union
// ---------------------------------------------------------------------------

export const ENTITY_SCHEMAS = {
  employee: EmployeeSchema,
  grant: GrantSchema,
  investment: InvestmentSchema,
  sale: SaleSchema,
  service: ServiceSchema,
  facility: FacilitySchema,
  software: SoftwareSchema,
  equipment: EquipmentSchema,
  project: ProjectSchema,
  shareholder: ShareholderSchema,
  share_class: ShareClassSchema,
  funding_round: FundingRoundSchema,
} as const;

/** Tolerance for the valuation and price identities on funding rounds. */
export const MONEY_TOLERANCE = 0.01;

export const EntitySchema = z
  .discriminatedUnion("type", [
    EmployeeSchema,
    GrantSchema,
    InvestmentSchema,
    SaleSchema,
    ServiceSchema,
    FacilitySchema,
    SoftwareSchema,
    EquipmentSchema,
    ProjectSchema,
    ShareholderSchema,
    ShareClassSchema,
    FundingRoundSchema,
  ])
  .superRefine((entity, ctx) => {
    if (entity.endDate !== null && entity.endDate < entity.startDate) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["endDate"],
        message: "endDate must not be before startDate",
      });
    }

    if (entity.type !== "funding_round") return;

    const { preMoneyValuation, postMoneyValuation, amountRaised, pricePerShare, sharesIssued } = entity;
    if (
      preMoneyValuation !== undefined &&
      postMoneyValuation !== undefined &&
      Math.abs(postMoneyValuation - (preMoneyValuation + amountRaised)) > MONEY_TOLERANCE
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["postMoneyValuation"],
        message: "postMoneyValuation must equal preMoneyValuation + amountRaised",
      });
    }
    if (
      pricePerShare !== undefined &&
      sharesIssued > 0 &&
      // Share counts are whole, so allow up to one share's worth of rounding.
      Math.abs(pricePerShare * sharesIssued - amountRaised) > Math.max(pricePerShare, MONEY_TOLERANCE)
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["pricePerShare"],
        message: "pricePerShare * sharesIssued must match amountRaised",
      });
    }
  });
