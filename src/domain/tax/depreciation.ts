import { ValidationError } from "../../shared/errors.js";
import { roundCurrency, sumCurrency } from "../../shared/money.js";
import type { FederalRuleset } from "../rulesets/types.js";
import type { TaxConfig } from "./config.js";
import type { AssetDepreciation, AssetPool, DepreciableAsset, PoolDepreciation } from "./types.js";

// The elected amount is not checked against the annual Section 179 limit here; compliance does that.
export function applySection179(cost: number, elected: number): number {
  return roundCurrency(cost - Math.min(cost, elected));
}

export function bonusDepreciation(basis: number, rate: number): number {
  return roundCurrency(basis * rate);
}

export function requiresMidQuarter(assets: readonly DepreciableAsset[], threshold: number): boolean {
  const total = sumCurrency(assets.map((asset) => asset.cost));
  if (total <= 0) {
    return false;
  }

  const fourthQuarter = sumCurrency(
    assets.filter((asset) => asset.placedInServiceQuarter === 4).map((asset) => asset.cost)
  );
  return fourthQuarter / total > threshold;
}

// Folds the rounding remainder into the last period so the schedule sums exactly to basis.
function settleRemainder(schedule: number[], basis: number): number[] {
  const remainder = roundCurrency(basis - sumCurrency(schedule));
  if (remainder === 0 || schedule.length === 0) {
    return schedule;
  }

  const settled = [...schedule];
  settled[settled.length - 1] = roundCurrency(settled[settled.length - 1] + remainder);
  return settled;
}

export function adsSchedule(basis: number, recoveryPeriod: number): number[] {
  if (!Number.isInteger(recoveryPeriod) || recoveryPeriod <= 0) {
    throw new ValidationError(`Unsupported recovery period: ${recoveryPeriod}`, { recoveryPeriod });
  }

  const annual = roundCurrency(basis / recoveryPeriod);
  return settleRemainder(Array.from({ length: recoveryPeriod }, () => annual), basis);
}

export function macrsRates(ruleset: FederalRuleset, recoveryPeriod: number): number[] {
  const rates = ruleset.depreciation.macrsHalfYear[String(recoveryPeriod)];
  if (!rates) {
    throw new ValidationError(`Unsupported recovery period: ${recoveryPeriod}`, {
      recoveryPeriod,
      supported: Object.keys(ruleset.depreciation.macrsHalfYear).map(Number)
    });
  }

  return rates;
}

export function macrsSchedule(ruleset: FederalRuleset, basis: number, recoveryPeriod: number): number[] {
  const rates = macrsRates(ruleset, recoveryPeriod);
  return settleRemainder(
    rates.map((rate) => roundCurrency(basis * rate)),
    basis
  );
}

export function depreciateAsset(
  ruleset: FederalRuleset,
  asset: DepreciableAsset,
  bonusRate: number
): AssetDepreciation {
  // Both methods take their recovery period from the MACRS table, so look it up even on ADS.
  macrsRates(ruleset, asset.recoveryPeriod);

  const section179 = Math.min(asset.cost, asset.section179);
  const basisAfter179 = applySection179(asset.cost, asset.section179);
  const bonus = bonusDepreciation(basisAfter179, bonusRate);
  const remainingBasis = roundCurrency(basisAfter179 - bonus);
  const schedule = asset.useAds
    ? adsSchedule(remainingBasis, asset.recoveryPeriod)
    : macrsSchedule(ruleset, remainingBasis, asset.recoveryPeriod);

  return {
    cost: asset.cost,
    recoveryPeriod: asset.recoveryPeriod,
    method: asset.useAds ? "ADS_STRAIGHT_LINE" : "MACRS_GDS_HALF_YEAR",
    section179,
    bonus,
    remainingBasis,
    schedule,
    totalDepreciation: sumCurrency([section179, bonus, sumCurrency(schedule)])
  };
}

/**
 * Builds federal and state schedules for every asset. The two jurisdictions differ only
 * in bonus rate. The mid-quarter result is reported but not applied to any schedule.
 */
export function depreciatePool(ruleset: FederalRuleset, pool: AssetPool, taxConfig: TaxConfig): PoolDepreciation {
  return {
    federal: pool.assets.map((asset) => depreciateAsset(ruleset, asset, taxConfig.bonusRate)),
    state: pool.assets.map((asset) => depreciateAsset(ruleset, asset, taxConfig.stateBonusRate)),
    midQuarterRequired: requiresMidQuarter(pool.assets, ruleset.depreciation.midQuarterThreshold)
  };
}

export function firstYearDepreciation(entries: readonly AssetDepreciation[]): number {
  return sumCurrency(entries.map((entry) => sumCurrency([entry.section179, entry.bonus, entry.schedule[0] ?? 0])));
}
