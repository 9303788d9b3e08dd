import { ValidationError } from "../../shared/errors.js";
import { roundCurrency } from "../../shared/money.js";
import { isFilingStatus } from "../rulesets/types.js";
import type { EarnedIncomeCreditRule, FederalRuleset } from "../rulesets/types.js";
import type { ChildTaxCredit, CreditSummary } from "./types.js";

export function calculateChildTaxCredit(
  ruleset: FederalRuleset,
  filingStatus: string,
  agi: number,
  qualifyingChildren: number
): ChildTaxCredit {
  if (qualifyingChildren <= 0) {
    return { total: 0, refundable: 0, nonrefundable: 0 };
  }

  if (!isFilingStatus(filingStatus)) {
    throw new ValidationError(`Invalid filing status: ${filingStatus}`, { filingStatus });
  }

  const rules = ruleset.childTaxCredit;
  const threshold = rules.phaseoutThresholds[filingStatus];
  let credit = qualifyingChildren * rules.perChild;

  // Reduced for each full step of AGI over the threshold.
  if (agi > threshold) {
    const steps = Math.floor((agi - threshold) / rules.phaseoutStep);
    credit = Math.max(0, credit - steps * rules.phaseoutPerStep);
  }

  const refundable = Math.min(credit, qualifyingChildren * rules.refundablePerChild);

  return {
    total: roundCurrency(credit),
    refundable: roundCurrency(refundable),
    nonrefundable: roundCurrency(credit - refundable)
  };
}

function findEarnedIncomeRule(ruleset: FederalRuleset, qualifyingChildren: number): EarnedIncomeCreditRule {
  const rules = ruleset.earnedIncomeCredit;
  const children = Math.min(Math.max(0, qualifyingChildren), rules.maxQualifyingChildren);
  const rule = rules.rules.find((item) => item.qualifyingChildren === children);

  if (!rule) {
    throw new ValidationError(`No earned income credit rule for ${children} qualifying children`, {
      rulesetId: ruleset.id,
      qualifyingChildren: children
    });
  }

  return rule;
}

export function calculateEarnedIncomeCredit(
  ruleset: FederalRuleset,
  earnedIncome: number,
  agi: number,
  qualifyingChildren: number
): number {
  const rule = findEarnedIncomeRule(ruleset, qualifyingChildren);
  const income = Math.max(0, Math.min(earnedIncome, agi));

  let credit = Math.min(rule.maxCredit, income * rule.phaseInRate);
  if (income > rule.phaseOutStart) {
    credit = Math.max(0, credit - (income - rule.phaseOutStart) * rule.phaseOutRate);
  }

  return roundCurrency(credit);
}

/**
 * Nonrefundable credits are limited to the income tax; the refundable CTC portion and
 * the EITC are paid out in full even when no tax is owed.
 */
export function applyCredits(
  incomeTax: number,
  childTaxCredit: ChildTaxCredit,
  earnedIncomeCredit: number,
  otherNonrefundable = 0
): CreditSummary {
  const nonrefundableClaimed = roundCurrency(childTaxCredit.nonrefundable + Math.max(0, otherNonrefundable));
  const nonrefundableApplied = Math.min(nonrefundableClaimed, Math.max(0, incomeTax));
  const refundable = roundCurrency(childTaxCredit.refundable + earnedIncomeCredit);

  return {
    childTaxCredit,
    earnedIncomeCredit,
    nonrefundableApplied,
    refundable,
    total: roundCurrency(nonrefundableApplied + refundable)
  };
}
