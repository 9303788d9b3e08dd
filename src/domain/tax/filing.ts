import { ValidationError } from "../../shared/errors.js";
import { roundCurrency, sumCurrency } from "../../shared/money.js";
import { isFilingStatus } from "../rulesets/types.js";
import type { FederalRuleset, FilingStatusCode } from "../rulesets/types.js";
import { computeBracketBreakdown, computeMarginalRate } from "./brackets.js";
import { applyCredits, calculateChildTaxCredit, calculateEarnedIncomeCredit } from "./credits.js";
import { calculateBestDeduction, calculateItemizedDeductions } from "./deductions.js";
import type { BracketSlice, CreditSummary, DeductionMethod, ItemizedDeductionDetail } from "./types.js";

export interface FederalEstimateInput {
  filingStatus: string;
  grossIncome: number;
  earnedIncome: number;
  qualifyingChildren?: number;
  itemized?: ItemizedDeductionDetail;
  /** Additional nonrefundable credits claimed by the caller. */
  credits?: number;
}

export interface FederalEstimate {
  filingStatus: FilingStatusCode;
  adjustedGrossIncome: number;
  deductionMethod: DeductionMethod;
  deductionUsed: number;
  taxableIncome: number;
  bracketBreakdown: BracketSlice[];
  baseTax: number;
  credits: CreditSummary;
  taxAfterCredits: number;
  /** Negative when refundable credits exceed the remaining tax. */
  netTax: number;
  effectiveRate: number;
  marginalRate: number;
}

// Simple filing calculator: no adjustments, so AGI equals gross income.
export function estimateFederalTax(ruleset: FederalRuleset, input: FederalEstimateInput): FederalEstimate {
  const { filingStatus } = input;
  if (!isFilingStatus(filingStatus)) {
    throw new ValidationError(`Invalid filing status: ${filingStatus}`, { filingStatus });
  }

  if (input.grossIncome < 0 || input.earnedIncome < 0) {
    throw new ValidationError("Income values cannot be negative", {
      grossIncome: input.grossIncome,
      earnedIncome: input.earnedIncome
    });
  }

  const adjustedGrossIncome = roundCurrency(input.grossIncome);
  const itemizedTotal = input.itemized
    ? calculateItemizedDeductions(ruleset, input.itemized, adjustedGrossIncome)
    : 0;
  const deduction = calculateBestDeduction(ruleset, filingStatus, itemizedTotal);

  const taxableIncome = Math.max(0, roundCurrency(adjustedGrossIncome - deduction.deductionTaken));
  const brackets = ruleset.brackets[filingStatus];
  const bracketBreakdown = computeBracketBreakdown(taxableIncome, brackets);
  const baseTax = sumCurrency(bracketBreakdown.map((slice) => slice.tax));

  const children = input.qualifyingChildren ?? 0;
  const credits = applyCredits(
    baseTax,
    calculateChildTaxCredit(ruleset, filingStatus, adjustedGrossIncome, children),
    calculateEarnedIncomeCredit(ruleset, input.earnedIncome, adjustedGrossIncome, children),
    input.credits ?? 0
  );

  const taxAfterCredits = roundCurrency(baseTax - credits.nonrefundableApplied);
  const netTax = roundCurrency(taxAfterCredits - credits.refundable);

  return {
    filingStatus,
    adjustedGrossIncome,
    deductionMethod: deduction.method,
    deductionUsed: deduction.deductionTaken,
    taxableIncome,
    bracketBreakdown,
    baseTax,
    credits,
    taxAfterCredits,
    netTax,
    effectiveRate:
      adjustedGrossIncome > 0 ? Math.round((Math.max(0, netTax) / adjustedGrossIncome) * 10_000) / 10_000 : 0,
    marginalRate: computeMarginalRate(taxableIncome, brackets)
  };
}
