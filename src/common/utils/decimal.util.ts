import Decimal from 'decimal.js';

// Prices and order values are computed exactly, then rounded once for JSON.
Decimal.set({
  precision: 20,
  rounding: Decimal.ROUND_HALF_UP,
  toExpPos: 9e15,
  toExpNeg: -9e15,
});

export type Numeric = number | string | Decimal;

export function toDecimal(value: Numeric): Decimal {
  return new Decimal(value);
}

/**
 * Converts Decimal back to JavaScript number for JSON serialization.
 * Rounds to 8 decimal places.
 */
export function toNumber(value: Decimal): number {
  return value.toDecimalPlaces(8).toNumber();
}

/** quantity x price, exact */
export function multiply(a: Numeric, b: Numeric): Decimal {
  return toDecimal(a).times(b);
}

/** (a + b) / 2 */
export function midpoint(a: Numeric, b: Numeric): Decimal {
  return toDecimal(a).plus(b).dividedBy(2);
}

export function isGreaterThan(value: Numeric, threshold: Numeric): boolean {
  return toDecimal(value).greaterThan(threshold);
}
