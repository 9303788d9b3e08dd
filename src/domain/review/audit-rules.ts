import { roundCurrency } from "../../shared/money.js";
import type { AuditConfig } from "../tax/config.js";
import { firstYearDepreciation } from "../tax/depreciation.js";
import type { AssetDepreciation } from "../tax/types.js";
import { createScoredRuleEngine } from "./rule-engine.js";
import type { ScoredRule } from "./rule-engine.js";
import type { ScoredAssessment } from "./types.js";

export interface AuditContext {
  federal: readonly AssetDepreciation[];
  state: readonly AssetDepreciation[];
  priorYearDepreciation: number | null;
  config: AuditConfig;
}

// Year-over-year and state comparisons use first-year deductions; lifetime totals always equal cost.
const auditRules: ReadonlyArray<ScoredRule<AuditContext>> = [
  {
    name: "excessive-section179",
    evaluate: ({ federal, config }) => {
      const total179 = roundCurrency(federal.reduce((sum, asset) => sum + asset.section179, 0));
      return total179 > config.section179SoftLimit
        ? {
            code: "DEP179_HIGH",
            description: "Section 179 deduction unusually high",
            severity: 8,
            scoreImpact: 20
          }
        : null;
    }
  },
  {
    name: "bonus-depreciation-heavy",
    evaluate: ({ federal }) => {
      const bonusTotal = federal.reduce((sum, asset) => sum + asset.bonus, 0);
      const costTotal = federal.reduce((sum, asset) => sum + asset.cost, 0);
      return costTotal > 0 && bonusTotal / costTotal > 0.8
        ? {
            code: "BONUS_HEAVY",
            description: "Bonus depreciation exceeds 80% of asset cost",
            severity: 6,
            scoreImpact: 15
          }
        : null;
    }
  },
  {
    name: "short-lived-assets",
    evaluate: ({ federal }) =>
      federal.some((asset) => asset.schedule.length <= 3)
        ? {
            code: "SHORT_RECOVERY",
            description: "High concentration of short recovery assets",
            severity: 5,
            scoreImpact: 10
          }
        : null
  },
  {
    name: "year-over-year-depreciation-change",
    evaluate: ({ federal, priorYearDepreciation }) => {
      if (priorYearDepreciation === null || priorYearDepreciation === 0) {
        return null;
      }

      return firstYearDepreciation(federal) / priorYearDepreciation > 2.5
        ? {
            code: "YOY_SPIKE",
            description: "Depreciation expense increased sharply year-over-year",
            severity: 7,
            scoreImpact: 18
          }
        : null;
    }
  },
  {
    name: "state-federal-mismatch",
    evaluate: ({ federal, state }) => {
      const federalTotal = firstYearDepreciation(federal);
      if (federalTotal === 0) {
        return null;
      }

      return Math.abs(federalTotal - firstYearDepreciation(state)) / federalTotal > 0.5
        ? {
            code: "STATE_MISMATCH",
            description: "Large divergence between federal and state depreciation",
            severity: 6,
            scoreImpact: 12
          }
        : null;
    }
  }
];

const auditEngine = createScoredRuleEngine<AuditContext>({
  name: "depreciation-audit",
  rules: auditRules
});

export function runAudit(context: AuditContext): ScoredAssessment {
  return auditEngine.evaluate(context);
}
