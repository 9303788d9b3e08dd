// Currency helpers used across the tax domain.
export function roundCurrency(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

export function toCents(value: number): number {
  return Math.round((value + Number.EPSILON) * 100);
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

// Sums cent amounts, rounding after every addition.
export function sumCurrency(values: readonly number[]): number {
  return values.reduce((total, value) => roundCurrency(total + value), 0);
}
