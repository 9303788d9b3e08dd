import { roundCurrency } from "../../shared/money.js";
import type { IncomeBuckets, IncomeForm, IncomeSummary } from "./types.js";

function emptyBuckets(): IncomeBuckets {
  return {
    wages: 0,
    selfEmployment: 0,
    interest: 0,
    dividends: 0,
    businessIncome: 0,
    withholdingFederal: 0,
    withholdingState: 0
  };
}

function assertNever(value: never): never {
  throw new Error(`Unhandled income form: ${JSON.stringify(value)}`);
}

function addForm(buckets: IncomeBuckets, form: IncomeForm): IncomeBuckets {
  switch (form.kind) {
    case "W2":
      return {
        ...buckets,
        wages: roundCurrency(buckets.wages + form.wages),
        withholdingFederal: roundCurrency(buckets.withholdingFederal + form.federalWithheld),
        withholdingState: roundCurrency(buckets.withholdingState + form.stateWithheld)
      };
    case "1099_NEC":
      return { ...buckets, selfEmployment: roundCurrency(buckets.selfEmployment + form.nonemployeeComp) };
    case "1099_INT":
      return { ...buckets, interest: roundCurrency(buckets.interest + form.interestIncome) };
    case "1099_DIV":
      return { ...buckets, dividends: roundCurrency(buckets.dividends + form.ordinaryDividends) };
    case "SCHEDULE_C":
      return {
        ...buckets,
        businessIncome: roundCurrency(buckets.businessIncome + roundCurrency(form.grossReceipts - form.expenses))
      };
    default:
      return assertNever(form);
  }
}

export function normalizeIncome(forms: readonly IncomeForm[]): IncomeBuckets {
  return forms.reduce(addForm, emptyBuckets());
}

// Interest and dividends are ordinary income in this model; no qualified/capital-gain split.
export function summarizeIncome(forms: readonly IncomeForm[]): IncomeSummary {
  const buckets = normalizeIncome(forms);
  return {
    ...buckets,
    totalIncome: roundCurrency(
      buckets.wages + buckets.selfEmployment + buckets.businessIncome + buckets.interest + buckets.dividends
    )
  };
}

export function earnedIncome(income: IncomeBuckets): number {
  return roundCurrency(Math.max(0, income.wages + income.selfEmployment + income.businessIncome));
}
