export const filingStatuses = ["SINGLE", "MARRIED_JOINT", "MARRIED_SEPARATE", "HEAD_OF_HOUSEHOLD"] as const;

export type FilingStatusCode = (typeof filingStatuses)[number];

export function isFilingStatus(value: string): value is FilingStatusCode {
  return filingStatuses.some((status) => status === value);
}

export interface TaxBracket {
  min: number;
  max: number | null;
  rate: number;
}

export interface EarnedIncomeCreditRule {
  qualifyingChildren: number;
  maxCredit: number;
  phaseInRate: number;
  phaseOutRate: number;
  phaseOutStart: number;
}

export interface FederalRuleset {
  id: string;
  jurisdiction: "federal";
  taxYear: number;
  effectiveFrom: string;
  status: "validated" | "stale" | "draft";
  source: Array<{ name: string; url: string }>;
  validatedAt: string;
  changelog: string[];
  standardDeduction: Record<FilingStatusCode, number>;
  brackets: Record<FilingStatusCode, TaxBracket[]>;
  selfEmploymentTax: {
    netEarningsFactor: number;
    combinedRate: number;
  };
  itemizedDeductions: {
    medicalAgiFloorRate: number;
    saltCap: number;
  };
  depreciation: {
    midQuarterThreshold: number;
    section179AnnualLimit: number;
    /** GDS half-year percentage tables keyed by recovery period in years. */
    macrsHalfYear: Record<string, number[]>;
  };
  childTaxCredit: {
    perChild: number;
    refundablePerChild: number;
    phaseoutStep: number;
    phaseoutPerStep: number;
    phaseoutThresholds: Record<FilingStatusCode, number>;
  };
  earnedIncomeCredit: {
    maxQualifyingChildren: number;
    rules: EarnedIncomeCreditRule[];
  };
  qbi: {
    rate: number;
    incomeLimits: Record<FilingStatusCode, number>;
  };
  notes: string[];
}

export interface RulesetMetaEntry {
  id: string;
  jurisdiction: string;
  path: string;
  effectiveFrom: string;
  status: string;
  approvedBy: string;
  approvedAt: string;
  validatedAt: string;
}

export interface RulesetMeta {
  active: {
    federal: string;
  };
  activeByTaxYear?: Record<string, { federal: string }>;
  versions: RulesetMetaEntry[];
}
