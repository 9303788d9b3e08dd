import { ValidationError } from "../../shared/errors.js";
import { roundCurrency, sumCurrency } from "../../shared/money.js";
import type { FederalRuleset, FilingStatusCode } from "../rulesets/types.js";
import type { BusinessProfile, IncomeForm, ScheduleCForm, ScheduleCSummary, SelfEmploymentTax } from "./types.js";

export function summarizeScheduleC(schedule: ScheduleCForm, position: number): ScheduleCSummary {
  if (schedule.grossReceipts < 0) {
    throw new ValidationError("Gross receipts cannot be negative", {
      businessName: schedule.businessName ?? null,
      grossReceipts: schedule.grossReceipts
    });
  }

  const grossReceipts = roundCurrency(schedule.grossReceipts);
  const totalExpenses = roundCurrency(schedule.expenses);

  return {
    businessName: schedule.businessName ?? `Business ${position + 1}`,
    grossReceipts,
    totalExpenses,
    netProfit: roundCurrency(grossReceipts - totalExpenses)
  };
}

/**
 * Flat combined OASDI + Medicare rate on 92.35% of net earnings. No wage-base cap:
 * this is the single formula shared by the return and the Schedule SE reconciliation.
 */
export function computeSelfEmploymentTax(ruleset: FederalRuleset, netEarnings: number): SelfEmploymentTax {
  const rules = ruleset.selfEmploymentTax;
  if (netEarnings <= 0) {
    return { netEarnings: roundCurrency(netEarnings), taxableBase: 0, tax: 0 };
  }

  const base = netEarnings * rules.netEarningsFactor;
  return {
    netEarnings: roundCurrency(netEarnings),
    taxableBase: roundCurrency(base),
    tax: roundCurrency(base * rules.combinedRate)
  };
}

// Simplified QBI: no SSTB or W-2 wage limits, and no partial phase-out above the income limit.
export function calculateQbiDeduction(
  ruleset: FederalRuleset,
  filingStatus: FilingStatusCode,
  qualifiedBusinessIncome: number,
  taxableIncomeBeforeQbi: number
): number {
  if (qualifiedBusinessIncome <= 0) {
    return 0;
  }

  if (taxableIncomeBeforeQbi > ruleset.qbi.incomeLimits[filingStatus]) {
    return 0;
  }

  return roundCurrency(
    Math.min(qualifiedBusinessIncome * ruleset.qbi.rate, Math.max(0, taxableIncomeBeforeQbi) * ruleset.qbi.rate)
  );
}

export function buildBusinessProfile(
  ruleset: FederalRuleset,
  filingStatus: FilingStatusCode,
  forms: readonly IncomeForm[],
  selfEmploymentIncome: number,
  taxableIncomeBeforeQbi: number
): BusinessProfile {
  const schedules = forms
    .filter((form): form is ScheduleCForm => form.kind === "SCHEDULE_C")
    .map((form, position) => summarizeScheduleC(form, position));
  const totalNetProfit = sumCurrency(schedules.map((schedule) => schedule.netProfit));
  const qualifiedBusinessIncome = roundCurrency(totalNetProfit + selfEmploymentIncome);

  return {
    schedules,
    totalNetProfit,
    qualifiedBusinessIncome,
    qbiDeduction: calculateQbiDeduction(ruleset, filingStatus, qualifiedBusinessIncome, taxableIncomeBeforeQbi)
  };
}
