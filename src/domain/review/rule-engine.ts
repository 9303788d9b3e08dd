import { logger } from "../../infrastructure/logger.js";
import { clamp } from "../../shared/money.js";
import type { ExcludedRule, RiskLevel, ScoredAssessment, ScoredFlag } from "./types.js";

export const MAX_RISK_SCORE = 100;

export interface ScoredRule<TContext> {
  name: string;
  evaluate: (context: TContext) => ScoredFlag | null;
}

export interface RiskBreakpoint {
  /** Scores strictly below this value map to `level`. */
  below: number;
  level: RiskLevel;
}

// Shared by the audit and deduction risk engines.
export const defaultRiskBreakpoints: RiskBreakpoint[] = [
  { below: 25, level: "LOW" },
  { below: 50, level: "MODERATE" },
  { below: 75, level: "HIGH" }
];

export function mapScoreToLevel(
  score: number,
  breakpoints: readonly RiskBreakpoint[] = defaultRiskBreakpoints,
  topLevel: RiskLevel = "SEVERE"
): RiskLevel {
  const match = breakpoints.find((breakpoint) => score < breakpoint.below);
  return match ? match.level : topLevel;
}

export interface ScoredRuleEngineDefinition<TContext> {
  name: string;
  rules: ReadonlyArray<ScoredRule<TContext>>;
  breakpoints?: readonly RiskBreakpoint[];
  topLevel?: RiskLevel;
}

export interface ScoredRuleEngine<TContext> {
  name: string;
  evaluate: (context: TContext) => ScoredAssessment;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs independent rules over one context. Every call builds its own flag list.
 * A rule that throws is recorded under `excludedRules` and the remaining rules still run.
 */
export function createScoredRuleEngine<TContext>(
  definition: ScoredRuleEngineDefinition<TContext>
): ScoredRuleEngine<TContext> {
  return {
    name: definition.name,
    evaluate(context) {
      const flags: ScoredFlag[] = [];
      const excludedRules: ExcludedRule[] = [];

      for (const rule of definition.rules) {
        try {
          const flag = rule.evaluate(context);
          if (flag) {
            flags.push(flag);
          }
        } catch (error) {
          const reason = describeError(error);
          excludedRules.push({ rule: rule.name, reason });
          logger.warn({ engine: definition.name, rule: rule.name, error: reason }, "scored rule excluded");
        }
      }

      const totalScore = clamp(
        flags.reduce((sum, flag) => sum + flag.scoreImpact, 0),
        0,
        MAX_RISK_SCORE
      );

      return {
        totalScore,
        riskLevel: mapScoreToLevel(totalScore, definition.breakpoints, definition.topLevel),
        flags,
        excludedRules
      };
    }
  };
}
