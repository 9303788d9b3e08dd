import type { FilingStatusCode } from "../rulesets/types.js";
import type { ScoredAssessment } from "../review/types.js";

export type DeductionMethod = "STANDARD" | "ITEMIZED";
export type DepreciationMethod = "MACRS_GDS_HALF_YEAR" | "ADS_STRAIGHT_LINE";

export interface WageForm {
  kind: "W2";
  employerEin: string;
  wages: number;
  federalWithheld: number;
  stateWithheld: number;
}

export interface NonemployeeCompForm {
  kind: "1099_NEC";
  payerTin: string;
  nonemployeeComp: number;
}

export interface InterestForm {
  kind: "1099_INT";
  payerTin: string;
  interestIncome: number;
}

export interface DividendForm {
  kind: "1099_DIV";
  payerTin: string;
  ordinaryDividends: number;
}

export interface ScheduleCForm {
  kind: "SCHEDULE_C";
  businessName?: string;
  grossReceipts: number;
  expenses: number;
}

export type IncomeForm = WageForm | NonemployeeCompForm | InterestForm | DividendForm | ScheduleCForm;

export interface DepreciableAsset {
  readonly description?: string;
  readonly cost: number;
  /** Recovery period in years; must be a key of the ruleset's MACRS table. */
  readonly recoveryPeriod: number;
  readonly placedInServiceQuarter: 1 | 2 | 3 | 4;
  readonly section179: number;
  readonly useAds: boolean;
}

export interface AssetPool {
  readonly assets: readonly DepreciableAsset[];
}

export interface Taxpayer {
  readonly taxpayerId: string;
  readonly filingStatus: FilingStatusCode;
  readonly forms: readonly IncomeForm[];
  readonly assets: readonly DepreciableAsset[];
  readonly itemizedDeductions: number;
  readonly priorYearDepreciation: number | null;
  readonly qualifyingChildren: number;
}

export interface ItemizedDeductionDetail {
  medicalExpenses: number;
  stateLocalTaxes: number;
  mortgageInterest: number;
  charitableContributions: number;
  casualtyLosses: number;
}

export interface IncomeBuckets {
  wages: number;
  selfEmployment: number;
  interest: number;
  dividends: number;
  businessIncome: number;
  withholdingFederal: number;
  withholdingState: number;
}

export interface IncomeSummary extends IncomeBuckets {
  totalIncome: number;
}

export interface DeductionSummary {
  standardDeduction: number;
  itemizedDeductions: number;
  deductionTaken: number;
  method: DeductionMethod;
}

export interface AssetDepreciation {
  cost: number;
  recoveryPeriod: number;
  method: DepreciationMethod;
  section179: number;
  bonus: number;
  remainingBasis: number;
  schedule: number[];
  totalDepreciation: number;
}

export interface PoolDepreciation {
  federal: AssetDepreciation[];
  state: AssetDepreciation[];
  /** Mid-quarter test result. Reported only; schedules always use the half-year convention. */
  midQuarterRequired: boolean;
}

export interface SelfEmploymentTax {
  netEarnings: number;
  taxableBase: number;
  tax: number;
}

export interface BracketSlice {
  min: number;
  max: number | null;
  rate: number;
  taxedAmount: number;
  tax: number;
}

export interface ChildTaxCredit {
  total: number;
  refundable: number;
  nonrefundable: number;
}

export interface CreditSummary {
  childTaxCredit: ChildTaxCredit;
  earnedIncomeCredit: number;
  /** Nonrefundable credits actually used, never more than the income tax. */
  nonrefundableApplied: number;
  refundable: number;
  total: number;
}

export interface ScheduleCSummary {
  businessName: string;
  grossReceipts: number;
  totalExpenses: number;
  netProfit: number;
}

export interface BusinessProfile {
  schedules: ScheduleCSummary[];
  totalNetProfit: number;
  qualifiedBusinessIncome: number;
  qbiDeduction: number;
}

export interface ComputedReturn {
  taxpayerId: string;
  filingStatus: FilingStatusCode;
  taxYear: number;
  rulesetVersion: string;
  income: IncomeSummary;
  deductions: DeductionSummary;
  depreciation: PoolDepreciation;
  selfEmploymentTax: SelfEmploymentTax;
  taxableIncome: number;
  bracketBreakdown: BracketSlice[];
  incomeTax: number;
  credits: CreditSummary;
  incomeTaxAfterCredits: number;
  totalTax: number;
  totalPayments: number;
  balanceDue: number;
  business: BusinessProfile;
  audit: ScoredAssessment;
}
