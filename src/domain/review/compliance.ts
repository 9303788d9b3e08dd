import { logger } from "../../infrastructure/logger.js";
import { ComplianceError } from "../../shared/errors.js";
import { roundCurrency } from "../../shared/money.js";
import type { FederalRuleset } from "../rulesets/types.js";
import { indexIrsForms } from "./types.js";
import type {
  ComplianceIssue,
  ComplianceResult,
  ExcludedRule,
  IrsFormIndex,
  IrsFormView,
  IrsReturnView
} from "./types.js";

export interface ComplianceLimits {
  section179AnnualLimit: number;
  seNetEarningsFactor: number;
  seCombinedRate: number;
  /** Allowed gap in dollars between Schedule SE and the tax implied by Schedule C. */
  seTolerance: number;
}

export const defaultComplianceLimits: ComplianceLimits = {
  section179AnnualLimit: 1_220_000,
  seNetEarningsFactor: 0.9235,
  seCombinedRate: 0.153,
  seTolerance: 5
};

export function complianceLimitsFromRuleset(ruleset: FederalRuleset): ComplianceLimits {
  return {
    section179AnnualLimit: ruleset.depreciation.section179AnnualLimit,
    seNetEarningsFactor: ruleset.selfEmploymentTax.netEarningsFactor,
    seCombinedRate: ruleset.selfEmploymentTax.combinedRate,
    seTolerance: defaultComplianceLimits.seTolerance
  };
}

interface ComplianceValidator {
  name: string;
  validate: (forms: IrsFormIndex, allForms: readonly IrsFormView[], limits: ComplianceLimits) => ComplianceIssue[];
}

const validators: ComplianceValidator[] = [
  {
    name: "required-forms",
    validate: (_forms, allForms) => {
      const names = new Set(allForms.map((form) => form.Form));
      const issues: ComplianceIssue[] = [];

      if (names.has("4562") && !names.has("Schedule C")) {
        issues.push({
          code: "FORM_DEP_MISSING_SC",
          message: "Form 4562 present without Schedule C",
          severity: "ERROR"
        });
      }

      if (names.has("Schedule SE") && !names.has("Schedule C")) {
        issues.push({
          code: "FORM_SE_MISSING_SC",
          message: "Schedule SE requires Schedule C",
          severity: "ERROR"
        });
      }

      return issues;
    }
  },
  {
    name: "section179",
    validate: ({ form4562 }, _allForms, limits) => {
      if (!form4562) {
        return [];
      }

      const section179 = form4562["Part I Section 179"];
      const issues: ComplianceIssue[] = [];
      if (section179 < 0) {
        issues.push({
          code: "179_NEGATIVE",
          message: "Section 179 deduction cannot be negative",
          severity: "ERROR"
        });
      }

      if (section179 > limits.section179AnnualLimit) {
        issues.push({
          code: "179_LIMIT_EXCEEDED",
          message: "Section 179 exceeds IRS annual limit",
          severity: "ERROR"
        });
      }

      return issues;
    }
  },
  {
    name: "bonus-depreciation",
    validate: ({ form4562 }) =>
      form4562 && form4562["Part II Bonus Depreciation"] < 0
        ? [
            {
              code: "BONUS_NEGATIVE",
              message: "Bonus depreciation cannot be negative",
              severity: "ERROR"
            }
          ]
        : []
  },
  {
    name: "mid-quarter-convention",
    validate: ({ form4562 }) =>
      form4562?.["Mid-Quarter Convention Required"] === true
        ? [
            {
              code: "MID_QUARTER_NOT_APPLIED",
              message: "Over 40% of asset cost was placed in service in Q4; schedules use the half-year convention",
              severity: "WARNING"
            }
          ]
        : []
  },
  {
    name: "schedule-c",
    validate: ({ scheduleC }) =>
      scheduleC && scheduleC["Net Profit"] < 0
        ? [
            {
              code: "SC_NEGATIVE_PROFIT",
              message: "Schedule C net loss detected (allowed, flagged)",
              severity: "INFO"
            }
          ]
        : []
  },
  {
    name: "schedule-se-reconciliation",
    validate: ({ scheduleC, scheduleSE }, _allForms, limits) => {
      if (!scheduleC || !scheduleSE) {
        return [];
      }

      const expectedBase = Math.max(0, scheduleC["Net Profit"] * limits.seNetEarningsFactor);
      const expectedTax = roundCurrency(expectedBase * limits.seCombinedRate);

      return Math.abs(scheduleSE["Line 12"] - expectedTax) > limits.seTolerance
        ? [
            {
              code: "SE_TAX_MISMATCH",
              message: "Schedule SE tax does not match Schedule C income",
              severity: "ERROR"
            }
          ]
        : [];
    }
  },
  {
    name: "form-1040",
    validate: ({ form1040 }) => {
      if (!form1040) {
        return [];
      }

      const totalIncome = form1040["Line 9"];
      const taxableIncome = form1040["Line 15"];
      const issues: ComplianceIssue[] = [];

      if (totalIncome < 0) {
        issues.push({
          code: "1040_NEG_INCOME",
          message: "Total income cannot be negative",
          severity: "ERROR"
        });
      }

      if (taxableIncome < 0) {
        issues.push({
          code: "1040_NEG_TAXABLE",
          message: "Taxable income cannot be negative",
          severity: "ERROR"
        });
      }

      if (taxableIncome > totalIncome) {
        issues.push({
          code: "1040_INVALID_TAXABLE",
          message: "Taxable income exceeds total income",
          severity: "ERROR"
        });
      }

      return issues;
    }
  }
];

/**
 * Structural validation of an IRS form-shaped return. Independent of the risk engines:
 * only ERROR issues make a return non-compliant.
 */
export function runComplianceCheck(
  irsReturn: IrsReturnView,
  limits: ComplianceLimits = defaultComplianceLimits
): ComplianceResult {
  const forms = indexIrsForms(irsReturn.Forms);
  const issues: ComplianceIssue[] = [];
  const excludedRules: ExcludedRule[] = [];

  for (const validator of validators) {
    try {
      issues.push(...validator.validate(forms, irsReturn.Forms, limits));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      excludedRules.push({ rule: validator.name, reason });
      logger.warn({ validator: validator.name, error: reason }, "compliance validator excluded");
    }
  }

  return {
    compliant: !issues.some((issue) => issue.severity === "ERROR"),
    issues,
    excludedRules
  };
}

export function assertCompliant(result: ComplianceResult): void {
  if (result.compliant) {
    return;
  }

  throw new ComplianceError("Return failed structural compliance validation.", {
    issues: result.issues.filter((issue) => issue.severity === "ERROR")
  });
}
