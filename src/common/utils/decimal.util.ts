import Decimal from 'decimal.js';

// Configure Decimal.js globally for ledger precision
Decimal.set({
  precision: 20,           // 20 significant digits
  rounding: Decimal.ROUND_HALF_UP,
  toExpPos: 9e15,         // No exponential notation for large numbers
  toExpNeg: -9e15,        // No exponential notation for small numbers
});

export const ZERO = new Decimal(0);

/**
 * Converts any number-like value to Decimal for ledger calculations.
 * Handles JavaScript numbers, strings, and existing Decimal instances.
 */
export function toDecimal(value: Decimal.Value): Decimal {
  return new Decimal(value);
}

/**
 * Converts Decimal back to JavaScript number for JSON serialization.
 * Rounds to 8 decimal places (standard crypto precision).
 */
export function toNumber(value: Decimal): number {
  return value.toDecimalPlaces(8).toNumber();
}

/** Sum of Decimal values, zero for an empty list. */
export function sum(values: Decimal[]): Decimal {
  return values.reduce((total, val) => total.plus(val), ZERO);
}

/**
 * part / whole × 100.
 * A zero whole yields 0 rather than a division error.
 */
export function percentOf(part: Decimal, whole: Decimal): Decimal {
  if (whole.isZero()) {
    return ZERO;
  }
  return part.dividedBy(whole).times(100);
}

