import { describe, expect, it } from "vitest";

import { REQUIRED_DISCLAIMER } from "../src/domain/review/safety-gate.js";
import { loadFederalRuleset } from "../src/domain/rulesets/loader.js";
import { createReturnPipeline, describeReturn } from "../src/services/return-service.js";
import { enforceRiskCeiling, simulateScenarios } from "../src/services/scenario-service.js";
import type { ScenarioOutcome } from "../src/services/scenario-service.js";
import { ComplianceError, RiskThresholdError, ScenarioError, ValidationError } from "../src/shared/errors.js";
import { employeeWithAsset, salariedFiler, soleProprietor } from "./fixtures.js";

describe("return review pipeline", () => {
  const ruleset = loadFederalRuleset();
  const pipeline = createReturnPipeline({ ruleset, config: { tax: { bonusRate: 0.6 } } });

  it("resolves configuration defaults once", () => {
    expect(pipeline.config).toEqual({
      tax: { bonusRate: 0.6, stateBonusRate: 0 },
      audit: { section179SoftLimit: 1_000_000 }
    });
  });

  it("rejects invalid configuration", () => {
    expect(() => createReturnPipeline({ ruleset, config: { tax: { bonusRate: 1.5 } } })).toThrow(ValidationError);
  });

  it("flags deductions above income for a low-wage filer", () => {
    const review = pipeline.reviewReturn({
      ...salariedFiler,
      forms: [{ kind: "W2", employerEin: "12-3456789", wages: 10000, federalWithheld: 0, stateWithheld: 0 }]
    });

    expect(review.computed.taxableIncome).toBe(0);
    expect(review.deductionRisk.flags).toEqual([
      {
        code: "DED_GT_INCOME",
        description: "Total deductions exceed total income",
        severity: 10,
        scoreImpact: 30
      }
    ]);
    expect(review.deductionRisk.totalScore).toBe(30);
    expect(review.deductionRisk.riskLevel).toBe("MODERATE");
  });

  it("reviews a sole proprietor without escalation", () => {
    const review = pipeline.reviewReturn(soleProprietor);

    expect(review.compliance).toEqual({ compliant: true, issues: [], excludedRules: [] });
    expect(review.deductionRisk.flags.map((flag) => flag.code)).toEqual(["BONUS_USED", "SC_ROUND_NUM"]);
    expect(review.safety.allowed).toBe(true);
    expect(review.safety.sanitizedResponse).toBe(`${describeReturn(review.computed)}\n\n${REQUIRED_DISCLAIMER}`);
    expect(review.action).toBe("NO_IMMEDIATE_REVIEW");
    expect(review.summary).toEqual({
      totalTax: 13693.73,
      balanceDue: 13693.73,
      auditRiskLevel: "LOW",
      deductionRiskLevel: "LOW",
      complianceErrors: 0,
      escalationCases: 0
    });
  });

  it("escalates when the narrative fails the safety gate", () => {
    const review = pipeline.reviewReturn(salariedFiler, { narrative: "Move the savings offshore." });

    expect(review.safety.allowed).toBe(false);
    expect(review.action).toBe("HUMAN_REVIEW_REQUIRED");
    expect(review.escalation.cases.map((item) => item.reason)).toEqual(["Safety gate triggered"]);
  });

  it("scores a year-over-year deduction spike", () => {
    const review = pipeline.reviewReturn(salariedFiler, { priorYearDeductions: 4000 });

    expect(review.deductionRisk.flags.map((flag) => flag.code)).toEqual(["YOY_DED_SPIKE"]);
    expect(review.action).toBe("NO_IMMEDIATE_REVIEW");
  });

  it("escalates a structurally invalid return and blocks filing", () => {
    const review = pipeline.reviewReturn(employeeWithAsset);

    expect(review.compliance.issues.map((issue) => issue.code)).toEqual(["FORM_DEP_MISSING_SC"]);
    expect(review.escalation.cases[0].severity).toBe("CRITICAL");
    expect(review.action).toBe("HUMAN_REVIEW_REQUIRED");
    expect(() => pipeline.checkFiling(employeeWithAsset)).toThrow(ComplianceError);
    expect(pipeline.checkFiling(salariedFiler).compliance.compliant).toBe(true);
  });
});

describe("scenario simulation", () => {
  const ruleset = loadFederalRuleset();
  const pipeline = createReturnPipeline({ ruleset, config: { tax: { bonusRate: 0.6 } } });

  it("compares baseline, conservative and aggressive depreciation", () => {
    const outcomes = simulateScenarios(pipeline, soleProprietor);

    expect(outcomes.map((outcome) => [outcome.scenario, outcome.bonusRate, outcome.riskScore, outcome.riskLevel])).toEqual([
      ["baseline", 0.6, 18, "LOW"],
      ["conservative", 0, 8, "LOW"],
      ["aggressive", 1, 30, "MODERATE"]
    ]);
    expect(outcomes.every((outcome) => outcome.status === "ACCEPTED")).toBe(true);
    expect(outcomes.map((outcome) => outcome.totalTax)).toEqual([13693.73, 13693.73, 13693.73]);
  });

  it("rejects scenarios above the risk ceiling", () => {
    const outcomes = simulateScenarios(pipeline, soleProprietor, { riskCeiling: 25 });

    expect(outcomes.map((outcome) => outcome.status)).toEqual(["ACCEPTED", "ACCEPTED", "REJECTED"]);
    expect(outcomes[2].rejectionReason).toBe("Scenario aggressive exceeds the risk ceiling");
  });

  it("wraps other failures with the original cause", () => {
    const broken = {
      ...soleProprietor,
      assets: [{ cost: 1000, recoveryPeriod: 4, placedInServiceQuarter: 1 as const, section179: 0, useAds: false }]
    };

    try {
      simulateScenarios(pipeline, broken);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ScenarioError);
      if (error instanceof ScenarioError) {
        expect(error.message).toBe("Scenario baseline failed");
        expect(error.statusCode).toBe(400);
        expect(error.cause).toBeInstanceOf(ValidationError);
      }
    }
  });

  it("raises RiskThresholdError from the ceiling check", () => {
    const outcome: ScenarioOutcome = {
      scenario: "baseline",
      status: "ACCEPTED",
      bonusRate: 0.6,
      totalTax: 0,
      balanceDue: 0,
      riskScore: 40,
      riskLevel: "MODERATE",
      action: "NO_IMMEDIATE_REVIEW",
      rejectionReason: null
    };

    expect(() => enforceRiskCeiling(outcome, 30)).toThrow(RiskThresholdError);
    expect(() => enforceRiskCeiling(outcome, 40)).not.toThrow();
    expect(() => enforceRiskCeiling(outcome, undefined)).not.toThrow();
  });
});
