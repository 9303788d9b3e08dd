import { describe, expect, it } from "vitest";

import { runAudit } from "../src/domain/review/audit-rules.js";
import { createScoredRuleEngine, mapScoreToLevel } from "../src/domain/review/rule-engine.js";
import { runRiskScoring } from "../src/domain/review/risk-scoring.js";
import type { IrsReturnView } from "../src/domain/review/types.js";
import type { AssetDepreciation } from "../src/domain/tax/types.js";

function entry(overrides: Partial<AssetDepreciation> = {}): AssetDepreciation {
  return {
    cost: 10000,
    recoveryPeriod: 3,
    method: "ADS_STRAIGHT_LINE",
    section179: 0,
    bonus: 0,
    remainingBasis: 10000,
    schedule: [3333.33, 3333.33, 3333.34],
    totalDepreciation: 10000,
    ...overrides
  };
}

const auditConfig = { section179SoftLimit: 1_000_000 };

describe("scored rule engine", () => {
  it("maps scores onto the shared risk taxonomy", () => {
    expect([0, 24, 25, 49, 50, 74, 75, 100].map((score) => mapScoreToLevel(score))).toEqual([
      "LOW",
      "LOW",
      "MODERATE",
      "MODERATE",
      "HIGH",
      "HIGH",
      "SEVERE",
      "SEVERE"
    ]);
  });

  it("caps the total score at 100", () => {
    const engine = createScoredRuleEngine<number>({
      name: "capped",
      rules: [
        { name: "a", evaluate: () => ({ code: "A", description: "a", severity: 5, scoreImpact: 60 }) },
        { name: "b", evaluate: () => ({ code: "B", description: "b", severity: 5, scoreImpact: 70 }) }
      ]
    });

    const result = engine.evaluate(0);
    expect(result.totalScore).toBe(100);
    expect(result.riskLevel).toBe("SEVERE");
  });

  it("excludes a failing rule and keeps scoring the rest", () => {
    const engine = createScoredRuleEngine<number>({
      name: "fail-soft",
      rules: [
        {
          name: "broken",
          evaluate: () => {
            throw new Error("boom");
          }
        },
        {
          name: "positive",
          evaluate: (value) =>
            value > 0 ? { code: "POSITIVE", description: "positive", severity: 3, scoreImpact: 30 } : null
        }
      ]
    });

    const first = engine.evaluate(1);
    const second = engine.evaluate(1);

    expect(first.excludedRules).toEqual([{ rule: "broken", reason: "boom" }]);
    expect(first.flags.map((flag) => flag.code)).toEqual(["POSITIVE"]);
    expect(first.riskLevel).toBe("MODERATE");
    expect(second.flags).toHaveLength(1);
  });
});

describe("depreciation audit", () => {
  it("flags section 179 above the soft limit", () => {
    const heavy179 = entry({
      cost: 1_500_000,
      recoveryPeriod: 5,
      method: "MACRS_GDS_HALF_YEAR",
      section179: 1_200_000,
      remainingBasis: 300_000,
      schedule: [60000, 96000, 57600, 34560, 34560, 17280],
      totalDepreciation: 1_500_000
    });

    const result = runAudit({ federal: [heavy179], state: [heavy179], priorYearDepreciation: null, config: auditConfig });

    expect(result.flags.map((flag) => flag.code)).toEqual(["DEP179_HIGH"]);
    expect(result.totalScore).toBe(20);
    expect(result.riskLevel).toBe("LOW");
  });

  it("combines bonus, short recovery, year-over-year and state divergence flags", () => {
    const federal = entry({ bonus: 9000, remainingBasis: 1000, schedule: [333.33, 333.33, 333.34] });
    const state = entry();

    const result = runAudit({ federal: [federal], state: [state], priorYearDepreciation: 2000, config: auditConfig });

    expect(result.flags.map((flag) => flag.code)).toEqual([
      "BONUS_HEAVY",
      "SHORT_RECOVERY",
      "YOY_SPIKE",
      "STATE_MISMATCH"
    ]);
    expect(result.totalScore).toBe(55);
    expect(result.riskLevel).toBe("HIGH");
  });

  it("skips the year-over-year rule without a prior-year amount", () => {
    const federal = entry({ bonus: 9000, remainingBasis: 1000, schedule: [333.33, 333.33, 333.34] });

    const result = runAudit({ federal: [federal], state: [federal], priorYearDepreciation: 0, config: auditConfig });

    expect(result.flags.map((flag) => flag.code)).toEqual(["BONUS_HEAVY", "SHORT_RECOVERY"]);
  });

  it("scores an empty pool as low risk", () => {
    expect(runAudit({ federal: [], state: [], priorYearDepreciation: 5000, config: auditConfig }).totalScore).toBe(0);
  });
});

describe("deduction risk scoring", () => {
  it("caps a return that trips every rule", () => {
    const irsReturn: IrsReturnView = {
      Forms: [
        { Form: "1040", "Line 9": 40000, "Line 12": 50000, "Line 15": 0 },
        { Form: "Schedule C", "Net Profit": -5000 },
        { Form: "4562", "Part I Section 179": 25000, "Part II Bonus Depreciation": 1000 }
      ]
    };

    const result = runRiskScoring(irsReturn, 10000);

    expect(result.flags.map((flag) => flag.code)).toEqual([
      "R179_RATIO_HIGH",
      "BONUS_USED",
      "SC_LOSS",
      "SC_ROUND_NUM",
      "DED_GT_INCOME",
      "YOY_DED_SPIKE"
    ]);
    expect(result.totalScore).toBe(100);
    expect(result.riskLevel).toBe("SEVERE");
  });

  it("scores a Schedule C loss on its own as moderate", () => {
    const result = runRiskScoring({
      Forms: [
        { Form: "1040", "Line 9": 60000, "Line 12": 14600, "Line 15": 45400 },
        { Form: "Schedule C", "Net Profit": -5000 }
      ]
    });

    expect(result.flags.map((flag) => flag.code)).toEqual(["SC_LOSS", "SC_ROUND_NUM"]);
    expect(result.totalScore).toBe(26);
    expect(result.riskLevel).toBe("MODERATE");
  });

  it("does not treat non-round profits or a missing prior year as risky", () => {
    const result = runRiskScoring({
      Forms: [
        { Form: "1040", "Line 9": 60000, "Line 12": 14600, "Line 15": 45400 },
        { Form: "Schedule C", "Net Profit": 1500.5 }
      ]
    });

    expect(result.totalScore).toBe(0);
    expect(result.riskLevel).toBe("LOW");
  });
});
