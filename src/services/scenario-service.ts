import type { RiskLevel } from "../domain/review/types.js";
import type { PipelineConfig } from "../domain/tax/config.js";
import type { Taxpayer } from "../domain/tax/types.js";
import { logger } from "../infrastructure/logger.js";
import { RiskThresholdError, ScenarioError } from "../shared/errors.js";
import { createReturnPipeline } from "./return-service.js";
import type { ReturnPipeline, ReviewAction } from "./return-service.js";

export const scenarioNames = ["baseline", "conservative", "aggressive"] as const;
export type ScenarioName = (typeof scenarioNames)[number];

export interface ScenarioOutcome {
  scenario: ScenarioName;
  status: "ACCEPTED" | "REJECTED";
  bonusRate: number;
  totalTax: number;
  balanceDue: number;
  /** Higher of the depreciation audit and deduction risk scores. */
  riskScore: number;
  riskLevel: RiskLevel;
  action: ReviewAction;
  rejectionReason: string | null;
}

export interface ScenarioOptions {
  riskCeiling?: number;
}

interface ScenarioVariant {
  config: PipelineConfig;
  taxpayer: Taxpayer;
}

function buildVariant(name: ScenarioName, config: PipelineConfig, taxpayer: Taxpayer): ScenarioVariant {
  switch (name) {
    case "baseline":
      return { config, taxpayer };
    case "conservative":
      return {
        config: { ...config, tax: { bonusRate: 0, stateBonusRate: 0 } },
        taxpayer: { ...taxpayer, assets: taxpayer.assets.map((asset) => ({ ...asset, section179: 0 })) }
      };
    case "aggressive":
      return { config: { ...config, tax: { ...config.tax, bonusRate: 1 } }, taxpayer };
  }
}

export function enforceRiskCeiling(outcome: ScenarioOutcome, riskCeiling: number | undefined): void {
  if (riskCeiling !== undefined && outcome.riskScore > riskCeiling) {
    throw new RiskThresholdError(`Scenario ${outcome.scenario} exceeds the risk ceiling`, {
      scenario: outcome.scenario,
      riskScore: outcome.riskScore,
      riskCeiling
    });
  }
}

function runScenario(
  pipeline: ReturnPipeline,
  name: ScenarioName,
  taxpayer: Taxpayer,
  options: ScenarioOptions
): ScenarioOutcome {
  const variant = buildVariant(name, pipeline.config, taxpayer);
  const review = createReturnPipeline({ ruleset: pipeline.ruleset, config: variant.config }).reviewReturn(
    variant.taxpayer
  );

  const audit = review.computed.audit;
  const riskier = review.deductionRisk.totalScore > audit.totalScore ? review.deductionRisk : audit;
  const outcome: ScenarioOutcome = {
    scenario: name,
    status: "ACCEPTED",
    bonusRate: variant.config.tax.bonusRate,
    totalTax: review.computed.totalTax,
    balanceDue: review.computed.balanceDue,
    riskScore: riskier.totalScore,
    riskLevel: riskier.riskLevel,
    action: review.action,
    rejectionReason: null
  };

  try {
    enforceRiskCeiling(outcome, options.riskCeiling);
  } catch (error) {
    if (error instanceof RiskThresholdError) {
      return { ...outcome, status: "REJECTED", rejectionReason: error.message };
    }

    throw error;
  }

  return outcome;
}

/**
 * Re-runs the review under baseline, conservative (no bonus, no Section 179) and
 * aggressive (full bonus) depreciation settings.
 */
export function simulateScenarios(
  pipeline: ReturnPipeline,
  taxpayer: Taxpayer,
  options: ScenarioOptions = {}
): ScenarioOutcome[] {
  return scenarioNames.map((name) => {
    try {
      return runScenario(pipeline, name, taxpayer, options);
    } catch (error) {
      logger.error({ scenario: name, taxpayerId: taxpayer.taxpayerId, err: error }, "scenario failed");
      throw new ScenarioError(`Scenario ${name} failed`, error, { scenario: name });
    }
  });
}
