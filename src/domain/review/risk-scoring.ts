import { toCents } from "../../shared/money.js";
import { createScoredRuleEngine } from "./rule-engine.js";
import type { ScoredRule } from "./rule-engine.js";
import { indexIrsForms } from "./types.js";
import type { IrsFormIndex, IrsReturnView, ScoredAssessment } from "./types.js";

export interface DeductionRiskContext {
  forms: IrsFormIndex;
  totalIncome: number;
  deductions: number;
  priorYearDeductions: number;
}

const deductionRiskRules: ReadonlyArray<ScoredRule<DeductionRiskContext>> = [
  {
    name: "high-section179-ratio",
    evaluate: ({ forms, totalIncome }) => {
      const section179 = forms.form4562?.["Part I Section 179"] ?? 0;
      return forms.form4562 && totalIncome > 0 && section179 / totalIncome > 0.5
        ? {
            code: "R179_RATIO_HIGH",
            description: "Section 179 exceeds 50% of total income",
            severity: 9,
            scoreImpact: 25
          }
        : null;
    }
  },
  {
    name: "bonus-depreciation-used",
    evaluate: ({ forms }) =>
      (forms.form4562?.["Part II Bonus Depreciation"] ?? 0) > 0
        ? {
            code: "BONUS_USED",
            description: "Bonus depreciation claimed",
            severity: 5,
            scoreImpact: 10
          }
        : null
  },
  {
    name: "schedule-c-loss",
    evaluate: ({ forms }) =>
      (forms.scheduleC?.["Net Profit"] ?? 0) < 0
        ? {
            code: "SC_LOSS",
            description: "Schedule C net loss reported",
            severity: 7,
            scoreImpact: 18
          }
        : null
  },
  {
    name: "round-number-net-profit",
    evaluate: ({ forms }) => {
      const netProfitCents = toCents(forms.scheduleC?.["Net Profit"] ?? 0);
      return netProfitCents !== 0 && netProfitCents % 100_000 === 0
        ? {
            code: "SC_ROUND_NUM",
            description: "Schedule C net profit is a round number",
            severity: 4,
            scoreImpact: 8
          }
        : null;
    }
  },
  {
    name: "deductions-exceed-income",
    evaluate: ({ totalIncome, deductions }) =>
      totalIncome > 0 && deductions > totalIncome
        ? {
            code: "DED_GT_INCOME",
            description: "Total deductions exceed total income",
            severity: 10,
            scoreImpact: 30
          }
        : null
  },
  {
    name: "year-over-year-deduction-change",
    evaluate: ({ deductions, priorYearDeductions }) =>
      priorYearDeductions > 0 && deductions / priorYearDeductions > 3
        ? {
            code: "YOY_DED_SPIKE",
            description: "Large year-over-year change in deductions",
            severity: 8,
            scoreImpact: 20
          }
        : null
  }
];

const deductionRiskEngine = createScoredRuleEngine<DeductionRiskContext>({
  name: "deduction-risk",
  rules: deductionRiskRules
});

/** Scores deduction-to-income anomalies on an IRS form-shaped return. */
export function runRiskScoring(irsReturn: IrsReturnView, priorYearDeductions = 0): ScoredAssessment {
  const forms = indexIrsForms(irsReturn.Forms);

  return deductionRiskEngine.evaluate({
    forms,
    totalIncome: forms.form1040?.["Line 9"] ?? 0,
    deductions: forms.form1040?.["Line 12"] ?? 0,
    priorYearDeductions
  });
}
