import { ValidationError } from "../../shared/errors.js";
import { roundCurrency } from "../../shared/money.js";
import { isFilingStatus } from "../rulesets/types.js";
import type { FederalRuleset } from "../rulesets/types.js";
import type { DeductionSummary, ItemizedDeductionDetail } from "./types.js";

export function getStandardDeduction(ruleset: FederalRuleset, filingStatus: string): number {
  if (!isFilingStatus(filingStatus)) {
    throw new ValidationError(`Invalid filing status: ${filingStatus}`, { filingStatus });
  }

  return ruleset.standardDeduction[filingStatus];
}

/**
 * Medical expenses count above the AGI floor, SALT is capped, and the remaining
 * categories are taken in full. Negative entries never reduce the total.
 */
export function calculateItemizedDeductions(
  ruleset: FederalRuleset,
  detail: ItemizedDeductionDetail,
  adjustedGrossIncome: number
): number {
  if (adjustedGrossIncome < 0) {
    throw new ValidationError("Adjusted gross income cannot be negative", { adjustedGrossIncome });
  }

  const rules = ruleset.itemizedDeductions;
  const medicalFloor = roundCurrency(adjustedGrossIncome * rules.medicalAgiFloorRate);
  const allowableMedical = Math.max(0, roundCurrency(detail.medicalExpenses - medicalFloor));
  const allowableSalt = Math.max(0, Math.min(detail.stateLocalTaxes, rules.saltCap));

  return roundCurrency(
    allowableMedical +
      allowableSalt +
      Math.max(0, detail.mortgageInterest) +
      Math.max(0, detail.charitableContributions) +
      Math.max(0, detail.casualtyLosses)
  );
}

// Always the greater of the two; there is no forced-itemize mode.
export function calculateBestDeduction(
  ruleset: FederalRuleset,
  filingStatus: string,
  itemizedTotal: number
): DeductionSummary {
  const standardDeduction = getStandardDeduction(ruleset, filingStatus);
  const itemizedDeductions = roundCurrency(Math.max(0, itemizedTotal));
  const method = itemizedDeductions > standardDeduction ? "ITEMIZED" : "STANDARD";

  return {
    standardDeduction,
    itemizedDeductions,
    deductionTaken: Math.max(standardDeduction, itemizedDeductions),
    method
  };
}
