import type { Taxpayer } from "../src/domain/tax/types.js";

export const salariedFiler: Taxpayer = {
  taxpayerId: "tp-salaried",
  filingStatus: "SINGLE",
  forms: [{ kind: "W2", employerEin: "12-3456789", wages: 85000, federalWithheld: 9000, stateWithheld: 2500 }],
  assets: [],
  itemizedDeductions: 0,
  priorYearDepreciation: null,
  qualifyingChildren: 0
};

export const soleProprietor: Taxpayer = {
  taxpayerId: "tp-sole-prop",
  filingStatus: "SINGLE",
  forms: [
    { kind: "1099_NEC", payerTin: "98-7654321", nonemployeeComp: 20000 },
    { kind: "SCHEDULE_C", grossReceipts: 60000, expenses: 20000 }
  ],
  assets: [
    {
      description: "Delivery van",
      cost: 100000,
      recoveryPeriod: 5,
      placedInServiceQuarter: 1,
      section179: 25000,
      useAds: false
    }
  ],
  itemizedDeductions: 0,
  priorYearDepreciation: 20000,
  qualifyingChildren: 0
};

export const headOfHousehold: Taxpayer = {
  taxpayerId: "tp-hoh",
  filingStatus: "HEAD_OF_HOUSEHOLD",
  forms: [{ kind: "W2", employerEin: "12-3456789", wages: 30000, federalWithheld: 1200, stateWithheld: 0 }],
  assets: [],
  itemizedDeductions: 0,
  priorYearDepreciation: null,
  qualifyingChildren: 2
};

// Depreciable asset with no business schedule to attach it to.
export const employeeWithAsset: Taxpayer = {
  ...salariedFiler,
  taxpayerId: "tp-employee-asset",
  assets: [
    {
      description: "Laptop",
      cost: 10000,
      recoveryPeriod: 5,
      placedInServiceQuarter: 2,
      section179: 0,
      useAds: false
    }
  ]
};
