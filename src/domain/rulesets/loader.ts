import { readFileSync } from "node:fs";
import path from "node:path";

import { z } from "zod";

import { env } from "../../config/env.js";
import { filingStatuses } from "./types.js";
import type { FederalRuleset, RulesetMeta } from "./types.js";

const RULESET_ROOT = path.resolve(process.cwd(), "rulesets");

const filingStatusSchema = z.enum(filingStatuses);

const bracketSchema = z.object({
  min: z.number().nonnegative(),
  max: z.number().positive().nullable(),
  rate: z.number().min(0).max(1)
});

const federalRulesetSchema = z.object({
  id: z.string().min(1),
  jurisdiction: z.literal("federal"),
  taxYear: z.number().int(),
  effectiveFrom: z.string(),
  status: z.enum(["validated", "stale", "draft"]),
  source: z.array(z.object({ name: z.string(), url: z.string() })),
  validatedAt: z.string(),
  changelog: z.array(z.string()),
  standardDeduction: z.record(filingStatusSchema, z.number().nonnegative()),
  brackets: z.record(filingStatusSchema, z.array(bracketSchema).min(1)),
  selfEmploymentTax: z.object({
    netEarningsFactor: z.number().positive(),
    combinedRate: z.number().positive()
  }),
  itemizedDeductions: z.object({
    medicalAgiFloorRate: z.number().min(0).max(1),
    saltCap: z.number().nonnegative()
  }),
  depreciation: z.object({
    midQuarterThreshold: z.number().min(0).max(1),
    section179AnnualLimit: z.number().positive(),
    macrsHalfYear: z.record(z.string().regex(/^\d+$/), z.array(z.number().positive()).min(1))
  }),
  childTaxCredit: z.object({
    perChild: z.number().nonnegative(),
    refundablePerChild: z.number().nonnegative(),
    phaseoutStep: z.number().positive(),
    phaseoutPerStep: z.number().nonnegative(),
    phaseoutThresholds: z.record(filingStatusSchema, z.number().nonnegative())
  }),
  earnedIncomeCredit: z.object({
    maxQualifyingChildren: z.number().int().nonnegative(),
    rules: z
      .array(
        z.object({
          qualifyingChildren: z.number().int().nonnegative(),
          maxCredit: z.number().nonnegative(),
          phaseInRate: z.number().nonnegative(),
          phaseOutRate: z.number().nonnegative(),
          phaseOutStart: z.number().nonnegative()
        })
      )
      .min(1)
  }),
  qbi: z.object({
    rate: z.number().min(0).max(1),
    incomeLimits: z.record(filingStatusSchema, z.number().nonnegative())
  }),
  notes: z.array(z.string())
});

const rulesetMetaSchema = z.object({
  active: z.object({ federal: z.string() }),
  activeByTaxYear: z.record(z.string(), z.object({ federal: z.string() })).optional(),
  versions: z.array(
    z.object({
      id: z.string(),
      jurisdiction: z.string(),
      path: z.string(),
      effectiveFrom: z.string(),
      status: z.string(),
      approvedBy: z.string(),
      approvedAt: z.string(),
      validatedAt: z.string()
    })
  )
});

function readJsonFile(filePath: string): unknown {
  const absolutePath = path.resolve(RULESET_ROOT, filePath);
  const contents = readFileSync(absolutePath, "utf8");
  return JSON.parse(contents);
}

function createRulesetInvalidError(rulesetId: string, issues: string): Error & { code: string } {
  return Object.assign(new Error(`Ruleset ${rulesetId} failed validation: ${issues}`), {
    code: "RULESET_INVALID"
  });
}

export function loadRulesetMeta(): RulesetMeta {
  return rulesetMetaSchema.parse(readJsonFile("meta.json"));
}

export function loadFederalRuleset(version = env.DEFAULT_RULESET_IRS): FederalRuleset {
  const meta = loadRulesetMeta();
  const entry = meta.versions.find((item) => item.id === version);

  if (!entry) {
    throw new Error(`Federal ruleset ${version} not found`);
  }

  const parsed = federalRulesetSchema.safeParse(
    readJsonFile(path.relative(RULESET_ROOT, path.resolve(process.cwd(), entry.path)))
  );
  if (!parsed.success) {
    throw createRulesetInvalidError(version, parsed.error.message);
  }

  return parsed.data;
}

export function resolveActiveRulesetForTaxYear(taxYear: number): string {
  const meta = loadRulesetMeta();
  return meta.activeByTaxYear?.[String(taxYear)]?.federal ?? meta.active.federal;
}
