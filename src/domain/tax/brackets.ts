import { roundCurrency, sumCurrency } from "../../shared/money.js";
import type { TaxBracket } from "../rulesets/types.js";
import type { BracketSlice } from "./types.js";

/**
 * Splits taxable income across progressive brackets. Each slice is taxed at its own
 * rate; the last bracket has no upper bound.
 */
export function computeBracketBreakdown(income: number, brackets: readonly TaxBracket[]): BracketSlice[] {
  const slices: BracketSlice[] = [];

  for (const bracket of brackets) {
    if (income <= bracket.min) {
      continue;
    }

    const upper = bracket.max ?? income;
    const taxedAmount = roundCurrency(Math.min(income, upper) - bracket.min);
    if (taxedAmount > 0) {
      slices.push({
        min: bracket.min,
        max: bracket.max,
        rate: bracket.rate,
        taxedAmount,
        tax: roundCurrency(taxedAmount * bracket.rate)
      });
    }
  }

  return slices;
}

export function computeBracketTax(income: number, brackets: readonly TaxBracket[]): number {
  return sumCurrency(computeBracketBreakdown(income, brackets).map((slice) => slice.tax));
}

export function computeMarginalRate(income: number, brackets: readonly TaxBracket[]): number {
  const slices = computeBracketBreakdown(income, brackets);
  return slices.length === 0 ? 0 : slices[slices.length - 1].rate;
}
