import { z } from "zod";

import { filingStatuses } from "../domain/rulesets/types.js";
import type { Taxpayer } from "../domain/tax/types.js";
import { logger } from "../infrastructure/logger.js";
import { ValidationError } from "../shared/errors.js";

const amount = z.number().nonnegative();

export const incomeFormKinds = ["W2", "1099_NEC", "1099_INT", "1099_DIV", "SCHEDULE_C"] as const;

export const incomeFormSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("W2"),
    employerEin: z.string().min(1).max(20),
    wages: amount,
    federalWithheld: amount.default(0),
    stateWithheld: amount.default(0)
  }),
  z.object({
    kind: z.literal("1099_NEC"),
    payerTin: z.string().min(1).max(20),
    nonemployeeComp: amount
  }),
  z.object({
    kind: z.literal("1099_INT"),
    payerTin: z.string().min(1).max(20),
    interestIncome: amount
  }),
  z.object({
    kind: z.literal("1099_DIV"),
    payerTin: z.string().min(1).max(20),
    ordinaryDividends: amount
  }),
  z.object({
    kind: z.literal("SCHEDULE_C"),
    businessName: z.string().min(1).max(255).optional(),
    grossReceipts: amount,
    expenses: amount
  })
]);

function isKnownFormKind(kind: string): boolean {
  return incomeFormKinds.some((known) => known === kind);
}

function isUnknownForm(value: unknown): boolean {
  if (typeof value !== "object" || value === null || !("kind" in value) || typeof value.kind !== "string") {
    return false;
  }

  if (isKnownFormKind(value.kind)) {
    return false;
  }

  logger.debug({ kind: value.kind }, "unsupported income form dropped");
  return true;
}

// Forms of a kind this engine does not model are dropped, not rejected.
const incomeFormsSchema = z.preprocess(
  (value) => (Array.isArray(value) ? value.filter((item) => !isUnknownForm(item)) : value),
  z.array(incomeFormSchema)
);

export const assetSchema = z
  .object({
    description: z.string().max(255).optional(),
    cost: z.number().positive(),
    recoveryPeriod: z.union([z.literal(3), z.literal(5), z.literal(7), z.literal(10), z.literal(15), z.literal(20)]),
    placedInServiceQuarter: z.union([z.literal(1), z.literal(2), z.literal(3), z.literal(4)]),
    section179: amount.default(0),
    useAds: z.boolean().default(false)
  })
  .refine((asset) => asset.section179 <= asset.cost, {
    message: "Section 179 election cannot exceed asset cost",
    path: ["section179"]
  });

export const taxpayerSchema = z.object({
  taxpayerId: z.string().min(1).max(120),
  filingStatus: z.enum(filingStatuses),
  forms: incomeFormsSchema.default([]),
  assets: z.array(assetSchema).default([]),
  itemizedDeductions: amount.default(0),
  priorYearDepreciation: amount.nullable().default(null),
  qualifyingChildren: z.number().int().min(0).default(0)
});

export function parseTaxpayer(input: unknown): Taxpayer {
  const parsed = taxpayerSchema.safeParse(input);
  if (!parsed.success) {
    const { formErrors, fieldErrors } = parsed.error.flatten();
    throw new ValidationError("Taxpayer input is invalid.", { formErrors, fieldErrors });
  }

  return parsed.data;
}

const pipelineConfigInputSchema = z
  .object({
    tax: z
      .object({
        bonusRate: z.number().optional(),
        stateBonusRate: z.number().optional()
      })
      .optional(),
    audit: z
      .object({
        section179SoftLimit: z.number().optional()
      })
      .optional()
  })
  .optional();

export const computeReturnSchema = z.object({
  taxpayer: z.unknown(),
  config: pipelineConfigInputSchema
});

export const reviewReturnSchema = computeReturnSchema.extend({
  priorYearDeductions: amount.default(0),
  narrative: z.string().max(10_000).optional(),
  safetyContext: z
    .object({
      jurisdiction: z.string().min(2).max(10).optional(),
      personalFields: z.array(z.string()).optional()
    })
    .optional()
});

export const scenarioRequestSchema = computeReturnSchema.extend({
  riskCeiling: z.number().min(0).max(100).optional()
});

export const itemizedDetailSchema = z.object({
  medicalExpenses: z.number().default(0),
  stateLocalTaxes: z.number().default(0),
  mortgageInterest: z.number().default(0),
  charitableContributions: z.number().default(0),
  casualtyLosses: z.number().default(0)
});

export const federalEstimateSchema = z.object({
  filingStatus: z.string().min(1),
  grossIncome: z.number(),
  earnedIncome: z.number().optional(),
  qualifyingChildren: z.number().int().min(0).default(0),
  itemized: itemizedDetailSchema.optional(),
  credits: amount.default(0)
});

export const rulesetListQuerySchema = z.object({
  taxYear: z.coerce.number().int().min(2000).max(2100).optional()
});

export const rulesetParamsSchema = z.object({
  id: z.string().min(1).max(64)
});
