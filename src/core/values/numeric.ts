// src/core/values/numeric.ts
// Exact decimal arithmetic context and the Number/FastNumber promotion rule

import Decimal from "decimal.js";

/**
 * Decimal constructor used for every Number value. Division results are
 * rounded to 40 significant digits, half-to-even.
 */
export const Dec = Decimal.clone({ precision: 40, rounding: Decimal.ROUND_HALF_EVEN });

export const DISPLAY_SCALE = 10;

/**
 * Promotion rule for mixed operands: a Number becomes a FastNumber
 * (nearest double). Applied identically by every tier.
 */
export function promote(v: { tag: "Number"; d: Decimal } | { tag: "FastNumber"; n: number }): number {
  return v.tag === "FastNumber" ? v.n : v.d.toNumber();
}

/**
 * Display text for an exact Number: at most ten fractional digits
 * (truncated), trailing zeros removed.
 */
export function formatDecimal(d: Decimal): string {
  const text = d.toDecimalPlaces(DISPLAY_SCALE, Decimal.ROUND_DOWN).toFixed();
  const trimmed = text.includes(".") ? text.replace(/0+$/, "").replace(/\.$/, "") : text;
  return trimmed === "-0" ? "0" : trimmed;
}

/** Display text for a FastNumber. */
export function formatFast(n: number): string {
  if (Number.isNaN(n)) return "NaN";
  if (!Number.isFinite(n)) return n > 0 ? "Infinity" : "-Infinity";
  return String(n);
}

/** True when `d` is a whole number that fits a safe JS integer. */
export function isSafeWhole(d: Decimal): boolean {
  return d.isInteger() && d.abs().lte(Number.MAX_SAFE_INTEGER);
}
