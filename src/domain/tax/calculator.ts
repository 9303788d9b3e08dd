import { logger } from "../../infrastructure/logger.js";
import { roundCurrency, sumCurrency } from "../../shared/money.js";
import { runAudit } from "../review/audit-rules.js";
import type { FederalRuleset } from "../rulesets/types.js";
import { computeBracketBreakdown } from "./brackets.js";
import { buildBusinessProfile, computeSelfEmploymentTax } from "./business.js";
import type { PipelineConfig } from "./config.js";
import { applyCredits, calculateChildTaxCredit, calculateEarnedIncomeCredit } from "./credits.js";
import { calculateBestDeduction } from "./deductions.js";
import { depreciatePool } from "./depreciation.js";
import { earnedIncome, summarizeIncome } from "./income.js";
import type { ComputedReturn, Taxpayer } from "./types.js";

export interface ComputationContext {
  ruleset: FederalRuleset;
  config: PipelineConfig;
}

/**
 * Computes a full federal return in fixed stages. Each stage reads only the
 * outputs of earlier stages; any stage error aborts the run.
 */
export function computeReturn(taxpayer: Taxpayer, context: ComputationContext): ComputedReturn {
  const { ruleset, config } = context;
  const log = logger.child({ taxpayerId: taxpayer.taxpayerId, rulesetId: ruleset.id });
  const status = taxpayer.filingStatus;

  const income = summarizeIncome(taxpayer.forms);
  log.debug({ totalIncome: income.totalIncome }, "income normalized");

  const deductions = calculateBestDeduction(ruleset, status, taxpayer.itemizedDeductions);
  log.debug({ method: deductions.method, deductionTaken: deductions.deductionTaken }, "deduction selected");

  const depreciation = depreciatePool(ruleset, { assets: taxpayer.assets }, config.tax);
  log.debug(
    { assets: taxpayer.assets.length, midQuarterRequired: depreciation.midQuarterRequired },
    "depreciation scheduled"
  );

  const selfEmploymentTax = computeSelfEmploymentTax(ruleset, income.selfEmployment + income.businessIncome);

  const taxableIncome = Math.max(0, roundCurrency(income.totalIncome - deductions.deductionTaken));
  const bracketBreakdown = computeBracketBreakdown(taxableIncome, ruleset.brackets[status]);
  const incomeTax = sumCurrency(bracketBreakdown.map((slice) => slice.tax));
  log.debug({ taxableIncome, incomeTax }, "bracket tax computed");

  const adjustedGrossIncome = Math.max(0, income.totalIncome);
  const credits = applyCredits(
    incomeTax,
    calculateChildTaxCredit(ruleset, status, adjustedGrossIncome, taxpayer.qualifyingChildren),
    calculateEarnedIncomeCredit(ruleset, earnedIncome(income), adjustedGrossIncome, taxpayer.qualifyingChildren)
  );

  const incomeTaxAfterCredits = roundCurrency(incomeTax - credits.nonrefundableApplied);
  const totalTax = roundCurrency(incomeTaxAfterCredits + selfEmploymentTax.tax);
  const totalPayments = roundCurrency(income.withholdingFederal + credits.refundable);
  const balanceDue = roundCurrency(totalTax - totalPayments);

  const business = buildBusinessProfile(ruleset, status, taxpayer.forms, income.selfEmployment, taxableIncome);

  const audit = runAudit({
    federal: depreciation.federal,
    state: depreciation.state,
    priorYearDepreciation: taxpayer.priorYearDepreciation,
    config: config.audit
  });
  log.debug({ totalTax, balanceDue, auditScore: audit.totalScore }, "return computed");

  return {
    taxpayerId: taxpayer.taxpayerId,
    filingStatus: status,
    taxYear: ruleset.taxYear,
    rulesetVersion: ruleset.id,
    income,
    deductions,
    depreciation,
    selfEmploymentTax,
    taxableIncome,
    bracketBreakdown,
    incomeTax,
    credits,
    incomeTaxAfterCredits,
    totalTax,
    totalPayments,
    balanceDue,
    business,
    audit
  };
}
