import { assertCompliant, complianceLimitsFromRuleset, runComplianceCheck } from "../domain/review/compliance.js";
import { evaluateForEscalation } from "../domain/review/escalation.js";
import { runRiskScoring } from "../domain/review/risk-scoring.js";
import { safetyGate } from "../domain/review/safety-gate.js";
import type {
  ComplianceResult,
  EscalationResult,
  IrsReturnView,
  RiskLevel,
  SafetyContext,
  SafetyResult,
  ScoredAssessment
} from "../domain/review/types.js";
import { loadFederalRuleset } from "../domain/rulesets/loader.js";
import type { FederalRuleset } from "../domain/rulesets/types.js";
import { computeReturn } from "../domain/tax/calculator.js";
import { defaultPipelineConfig, resolvePipelineConfig } from "../domain/tax/config.js";
import type { PipelineConfig } from "../domain/tax/config.js";
import { buildIrsReturn } from "../domain/tax/irs-return.js";
import type { ComputedReturn, Taxpayer } from "../domain/tax/types.js";
import { logger } from "../infrastructure/logger.js";

export type ReviewAction = "HUMAN_REVIEW_REQUIRED" | "NO_IMMEDIATE_REVIEW";

export interface ReviewOptions {
  priorYearDeductions?: number;
  /** Generated explanatory text to gate; a neutral description of the return is used when absent. */
  narrative?: string;
  safetyContext?: SafetyContext;
}

export interface ReviewSummary {
  totalTax: number;
  balanceDue: number;
  auditRiskLevel: RiskLevel;
  deductionRiskLevel: RiskLevel;
  complianceErrors: number;
  escalationCases: number;
}

export interface ReturnReview {
  computed: ComputedReturn;
  irsReturn: IrsReturnView;
  compliance: ComplianceResult;
  deductionRisk: ScoredAssessment;
  safety: SafetyResult;
  escalation: EscalationResult;
  action: ReviewAction;
  summary: ReviewSummary;
}

export interface FilingCheck {
  computed: ComputedReturn;
  irsReturn: IrsReturnView;
  compliance: ComplianceResult;
}

export interface ReturnPipeline {
  ruleset: FederalRuleset;
  config: PipelineConfig;
  computeReturn: (taxpayer: Taxpayer) => ComputedReturn;
  reviewReturn: (taxpayer: Taxpayer, options?: ReviewOptions) => ReturnReview;
  checkFiling: (taxpayer: Taxpayer) => FilingCheck;
}

export interface ReturnPipelineOptions {
  ruleset?: FederalRuleset;
  config?: unknown;
}

export function describeReturn(computed: ComputedReturn): string {
  return [
    "The tax code provides a progressive rate schedule applied to taxable income.",
    `Taxable income of ${computed.taxableIncome.toFixed(2)} produces income tax of ${computed.incomeTax.toFixed(2)}`,
    `and total tax of ${computed.totalTax.toFixed(2)} after credits and self-employment tax.`
  ].join(" ");
}

export function createReturnPipeline(options: ReturnPipelineOptions = {}): ReturnPipeline {
  const ruleset = options.ruleset ?? loadFederalRuleset();
  const config = options.config === undefined ? defaultPipelineConfig() : resolvePipelineConfig(options.config);
  const complianceLimits = complianceLimitsFromRuleset(ruleset);

  const compute = (taxpayer: Taxpayer): ComputedReturn => computeReturn(taxpayer, { ruleset, config });

  const checkFiling = (taxpayer: Taxpayer): FilingCheck => {
    const computed = compute(taxpayer);
    const irsReturn = buildIrsReturn(computed);
    const compliance = runComplianceCheck(irsReturn, complianceLimits);
    assertCompliant(compliance);
    return { computed, irsReturn, compliance };
  };

  const reviewReturn = (taxpayer: Taxpayer, reviewOptions: ReviewOptions = {}): ReturnReview => {
    const computed = compute(taxpayer);
    const irsReturn = buildIrsReturn(computed);
    const compliance = runComplianceCheck(irsReturn, complianceLimits);
    const deductionRisk = runRiskScoring(irsReturn, reviewOptions.priorYearDeductions ?? 0);
    const safety = safetyGate(reviewOptions.narrative ?? describeReturn(computed), reviewOptions.safetyContext);

    const escalation = evaluateForEscalation(taxpayer.taxpayerId, {
      compliance,
      riskAssessments: [
        { source: "deduction", assessment: deductionRisk },
        { source: "depreciation audit", assessment: computed.audit }
      ],
      safety
    });

    const action: ReviewAction = escalation.needsEscalation ? "HUMAN_REVIEW_REQUIRED" : "NO_IMMEDIATE_REVIEW";
    logger.info(
      {
        taxpayerId: taxpayer.taxpayerId,
        action,
        compliant: compliance.compliant,
        cases: escalation.cases.length
      },
      "return reviewed"
    );

    return {
      computed,
      irsReturn,
      compliance,
      deductionRisk,
      safety,
      escalation,
      action,
      summary: {
        totalTax: computed.totalTax,
        balanceDue: computed.balanceDue,
        auditRiskLevel: computed.audit.riskLevel,
        deductionRiskLevel: deductionRisk.riskLevel,
        complianceErrors: compliance.issues.filter((issue) => issue.severity === "ERROR").length,
        escalationCases: escalation.cases.length
      }
    };
  };

  return {
    ruleset,
    config,
    computeReturn: compute,
    reviewReturn,
    checkFiling
  };
}
