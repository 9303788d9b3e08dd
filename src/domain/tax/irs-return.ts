import { roundCurrency, sumCurrency } from "../../shared/money.js";
import type { Form1040View, Form4562View, IrsFormView, IrsReturnView, ScheduleCView } from "../review/types.js";
import type { ComputedReturn } from "./types.js";

function form1040(computed: ComputedReturn): Form1040View {
  const { income, credits } = computed;

  return {
    Form: "1040",
    "Line 9": income.totalIncome,
    "Line 12": computed.deductions.deductionTaken,
    "Line 15": computed.taxableIncome,
    "Line 16": computed.incomeTax,
    "Line 22": computed.incomeTaxAfterCredits,
    "Line 23": computed.selfEmploymentTax.tax,
    "Line 24": computed.totalTax,
    "Line 25d": income.withholdingFederal,
    "Line 27": credits.earnedIncomeCredit,
    "Line 28": credits.childTaxCredit.refundable,
    "Line 33": computed.totalPayments,
    "Line 34": Math.max(0, roundCurrency(-computed.balanceDue)),
    "Line 37": Math.max(0, computed.balanceDue)
  };
}

// Nonemployee compensation is reported as Schedule C receipts with no expenses.
function scheduleC(computed: ComputedReturn): ScheduleCView | null {
  const { income, business } = computed;
  if (business.schedules.length === 0 && income.selfEmployment === 0) {
    return null;
  }

  return {
    Form: "Schedule C",
    "Gross Receipts": sumCurrency([income.selfEmployment, ...business.schedules.map((item) => item.grossReceipts)]),
    "Total Expenses": sumCurrency(business.schedules.map((item) => item.totalExpenses)),
    "Net Profit": roundCurrency(income.selfEmployment + income.businessIncome)
  };
}

function form4562(computed: ComputedReturn): Form4562View | null {
  const { federal, midQuarterRequired } = computed.depreciation;
  if (federal.length === 0) {
    return null;
  }

  return {
    Form: "4562",
    "Part I Section 179": sumCurrency(federal.map((entry) => entry.section179)),
    "Part II Bonus Depreciation": sumCurrency(federal.map((entry) => entry.bonus)),
    "Line 17 MACRS": sumCurrency(federal.map((entry) => entry.schedule[0] ?? 0)),
    "Mid-Quarter Convention Required": midQuarterRequired
  };
}

/** Renders a computed return as IRS form line items for the compliance and risk engines. */
export function buildIrsReturn(computed: ComputedReturn): IrsReturnView {
  const forms: IrsFormView[] = [form1040(computed)];

  const businessSchedule = scheduleC(computed);
  if (businessSchedule) {
    forms.push(businessSchedule);
  }

  if (computed.selfEmploymentTax.tax > 0) {
    forms.push({ Form: "Schedule SE", "Line 12": computed.selfEmploymentTax.tax });
  }

  const depreciation = form4562(computed);
  if (depreciation) {
    forms.push(depreciation);
  }

  return { Forms: forms };
}
