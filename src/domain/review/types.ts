export type RiskLevel = "LOW" | "MODERATE" | "HIGH" | "SEVERE";
export type ComplianceSeverity = "INFO" | "WARNING" | "ERROR";
export type EscalationSeverity = "LOW" | "MEDIUM" | "HIGH" | "CRITICAL";

/** A fired rule. `severity` runs 1 (informational) to 10 (most serious). */
export interface ScoredFlag {
  code: string;
  description: string;
  severity: number;
  scoreImpact: number;
}

export interface ExcludedRule {
  rule: string;
  reason: string;
}

export interface ScoredAssessment {
  totalScore: number;
  riskLevel: RiskLevel;
  flags: ScoredFlag[];
  excludedRules: ExcludedRule[];
}

export interface ComplianceIssue {
  code: string;
  message: string;
  severity: ComplianceSeverity;
}

export interface ComplianceResult {
  compliant: boolean;
  issues: ComplianceIssue[];
  excludedRules: ExcludedRule[];
}

export interface SafetyContext {
  jurisdiction?: string;
  personalFields?: string[];
}

export interface SafetyResult {
  allowed: boolean;
  reason: string | null;
  sanitizedResponse: string | null;
}

export interface EscalationCase {
  id: string;
  taxpayerId: string;
  reason: string;
  severity: EscalationSeverity;
  relatedFlags: Array<Record<string, unknown>>;
  notes: string | null;
}

export interface EscalationResult {
  needsEscalation: boolean;
  cases: EscalationCase[];
}

// IRS form-shaped view of a computed return. Field names follow the form line labels.
export interface Form1040View {
  Form: "1040";
  "Line 9": number;
  "Line 12": number;
  "Line 15": number;
  "Line 16"?: number;
  "Line 22"?: number;
  "Line 23"?: number;
  "Line 24"?: number;
  "Line 25d"?: number;
  "Line 27"?: number;
  "Line 28"?: number;
  "Line 33"?: number;
  "Line 34"?: number;
  "Line 37"?: number;
}

export interface ScheduleCView {
  Form: "Schedule C";
  "Gross Receipts"?: number;
  "Total Expenses"?: number;
  "Net Profit": number;
}

export interface ScheduleSEView {
  Form: "Schedule SE";
  "Line 12": number;
}

export interface Form4562View {
  Form: "4562";
  "Part I Section 179": number;
  "Part II Bonus Depreciation": number;
  "Line 17 MACRS"?: number;
  "Mid-Quarter Convention Required"?: boolean;
}

export type IrsFormView = Form1040View | ScheduleCView | ScheduleSEView | Form4562View;

export interface IrsReturnView {
  Forms: IrsFormView[];
}

export interface IrsFormIndex {
  form1040?: Form1040View;
  scheduleC?: ScheduleCView;
  scheduleSE?: ScheduleSEView;
  form4562?: Form4562View;
}

export function indexIrsForms(forms: readonly IrsFormView[]): IrsFormIndex {
  const index: IrsFormIndex = {};

  for (const form of forms) {
    switch (form.Form) {
      case "1040":
        index.form1040 = form;
        break;
      case "Schedule C":
        index.scheduleC = form;
        break;
      case "Schedule SE":
        index.scheduleSE = form;
        break;
      case "4562":
        index.form4562 = form;
        break;
    }
  }

  return index;
}
