import { createId } from "../../shared/ids.js";
import type {
  ComplianceResult,
  EscalationCase,
  EscalationResult,
  SafetyResult,
  ScoredAssessment
} from "./types.js";

export interface NamedAssessment {
  source: string;
  assessment: ScoredAssessment;
}

export interface EscalationInputs {
  compliance: ComplianceResult;
  riskAssessments: readonly NamedAssessment[];
  safety: SafetyResult;
}

export const ESCALATION_SCORE_THRESHOLD = 50;

function complianceCases(taxpayerId: string, compliance: ComplianceResult): EscalationCase[] {
  if (compliance.compliant) {
    return [];
  }

  const errors = compliance.issues.filter((issue) => issue.severity === "ERROR");
  return [
    {
      id: createId(),
      taxpayerId,
      reason: "Compliance validation failure",
      severity: "CRITICAL",
      relatedFlags: errors.map((issue) => ({ code: issue.code, message: issue.message })),
      notes: "Return violates IRS structural rules"
    }
  ];
}

function riskCases(taxpayerId: string, { source, assessment }: NamedAssessment): EscalationCase[] {
  const { totalScore, riskLevel } = assessment;
  const elevated =
    riskLevel === "HIGH" || riskLevel === "SEVERE" || totalScore >= ESCALATION_SCORE_THRESHOLD;
  if (!elevated) {
    return [];
  }

  return [
    {
      id: createId(),
      taxpayerId,
      reason: `High ${source} risk`,
      severity: riskLevel === "HIGH" ? "HIGH" : "CRITICAL",
      relatedFlags: assessment.flags.map((flag) => ({ ...flag })),
      notes: `Total risk score: ${totalScore}, risk level: ${riskLevel}`
    }
  ];
}

function safetyCases(taxpayerId: string, safety: SafetyResult): EscalationCase[] {
  if (safety.allowed) {
    return [];
  }

  return [
    {
      id: createId(),
      taxpayerId,
      reason: "Safety gate triggered",
      severity: "CRITICAL",
      relatedFlags: [{ reason: safety.reason }],
      notes: "Generated content could be unsafe or non-compliant"
    }
  ];
}

// Checks are independent; no case suppresses another.
export function evaluateForEscalation(taxpayerId: string, inputs: EscalationInputs): EscalationResult {
  const cases = [
    ...complianceCases(taxpayerId, inputs.compliance),
    ...inputs.riskAssessments.flatMap((entry) => riskCases(taxpayerId, entry)),
    ...safetyCases(taxpayerId, inputs.safety)
  ];

  return { needsEscalation: cases.length > 0, cases };
}
