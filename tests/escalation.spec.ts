import { describe, expect, it } from "vitest";

import { evaluateForEscalation } from "../src/domain/review/escalation.js";
import { REQUIRED_DISCLAIMER, safetyGate } from "../src/domain/review/safety-gate.js";
import type { ComplianceResult, SafetyResult, ScoredAssessment } from "../src/domain/review/types.js";

const compliant: ComplianceResult = { compliant: true, issues: [], excludedRules: [] };
const lowRisk: ScoredAssessment = { totalScore: 10, riskLevel: "LOW", flags: [], excludedRules: [] };
const allowed: SafetyResult = { allowed: true, reason: null, sanitizedResponse: "ok" };

describe("safety gate", () => {
  it("appends the disclaimer to educational text", () => {
    const text = "The IRS generally allows a standard deduction.";

    expect(safetyGate(text)).toEqual({
      allowed: true,
      reason: null,
      sanitizedResponse: `${text}\n\n${REQUIRED_DISCLAIMER}`
    });
  });

  it("rewrites second-person phrasing when educational framing is missing", () => {
    const result = safetyGate("Your mortgage interest may be deductible.");

    expect(result.sanitizedResponse).toBe(
      `a taxpayer's mortgage interest may be deductible.\n\n${REQUIRED_DISCLAIMER}`
    );
  });

  it("leaves text that already carries framing and the disclaimer untouched", () => {
    const text = `This is general information. ${REQUIRED_DISCLAIMER}`;

    expect(safetyGate(text).sanitizedResponse).toBe(text);
  });

  it("blocks advisory language", () => {
    expect(safetyGate("You should claim this deduction.")).toEqual({
      allowed: false,
      reason: "Response contains prohibited or advisory language.",
      sanitizedResponse: null
    });
  });

  it("blocks unsupported jurisdictions and personalized context", () => {
    expect(safetyGate("General information.", { jurisdiction: "CA" }).reason).toBe("Unsupported tax jurisdiction.");
    expect(safetyGate("General information.", { personalFields: ["ssn"] }).reason).toBe(
      "Personalized tax advice is not permitted."
    );
  });
});

describe("escalation engine", () => {
  it("does not escalate a clean review", () => {
    expect(
      evaluateForEscalation("tp-1", {
        compliance: compliant,
        riskAssessments: [{ source: "deduction", assessment: lowRisk }],
        safety: allowed
      })
    ).toEqual({ needsEscalation: false, cases: [] });
  });

  it("always escalates a non-compliant return", () => {
    const result = evaluateForEscalation("tp-1", {
      compliance: { compliant: false, issues: [], excludedRules: [] },
      riskAssessments: [],
      safety: allowed
    });

    expect(result.needsEscalation).toBe(true);
    expect(result.cases).toHaveLength(1);
    expect(result.cases[0]).toMatchObject({
      taxpayerId: "tp-1",
      reason: "Compliance validation failure",
      severity: "CRITICAL",
      relatedFlags: []
    });
  });

  it("maps risk levels onto case severity", () => {
    const result = evaluateForEscalation("tp-1", {
      compliance: compliant,
      riskAssessments: [
        { source: "deduction", assessment: { ...lowRisk, totalScore: 55, riskLevel: "HIGH" } },
        { source: "depreciation audit", assessment: { ...lowRisk, totalScore: 80, riskLevel: "SEVERE" } },
        { source: "scenario", assessment: { ...lowRisk, totalScore: 50, riskLevel: "MODERATE" } },
        { source: "other", assessment: { ...lowRisk, totalScore: 49, riskLevel: "MODERATE" } }
      ],
      safety: allowed
    });

    expect(result.cases.map((item) => [item.reason, item.severity])).toEqual([
      ["High deduction risk", "HIGH"],
      ["High depreciation audit risk", "CRITICAL"],
      ["High scenario risk", "CRITICAL"]
    ]);
    expect(result.cases[0].notes).toBe("Total risk score: 55, risk level: HIGH");
  });

  it("unions compliance, risk and safety cases with distinct ids", () => {
    const result = evaluateForEscalation("tp-1", {
      compliance: {
        compliant: false,
        issues: [{ code: "SE_TAX_MISMATCH", message: "Schedule SE tax does not match Schedule C income", severity: "ERROR" }],
        excludedRules: []
      },
      riskAssessments: [{ source: "deduction", assessment: { ...lowRisk, totalScore: 60, riskLevel: "HIGH" } }],
      safety: { allowed: false, reason: "Unsupported tax jurisdiction.", sanitizedResponse: null }
    });

    expect(result.cases.map((item) => item.severity)).toEqual(["CRITICAL", "HIGH", "CRITICAL"]);
    expect(result.cases[0].relatedFlags).toEqual([
      { code: "SE_TAX_MISMATCH", message: "Schedule SE tax does not match Schedule C income" }
    ]);
    expect(result.cases[2].relatedFlags).toEqual([{ reason: "Unsupported tax jurisdiction." }]);
    expect(new Set(result.cases.map((item) => item.id)).size).toBe(3);
    expect(result.cases[0].id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-7[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });
});
