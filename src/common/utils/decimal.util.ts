import Decimal from 'decimal.js';

// Configure Decimal.js globally for financial precision
Decimal.set({
  precision: 28,           // 28 significant digits
  rounding: Decimal.ROUND_HALF_UP,
  toExpPos: 9e15,         // No exponential notation for large numbers
  toExpNeg: -9e15,        // No exponential notation for small numbers
});

export const ZERO = new Decimal(0);

/**
 * Converts any number-like value to Decimal for financial calculations.
 * Handles JavaScript numbers, strings, and existing Decimal instances.
 */
export function toDecimal(value: number | string | Decimal): Decimal {
  return new Decimal(value);
}

/**
 * Converts Decimal back to JavaScript number for JSON serialization.
 * Rounds to 8 decimal places.
 */
export function toNumber(value: Decimal): number {
  return value.toDecimalPlaces(8).toNumber();
}

/**
 * Converts Decimal to USD string with 2 decimal places.
 * Used for P&L amounts in log lines.
 */
export function toUSD(value: Decimal): string {
  return value.toDecimalPlaces(2, Decimal.ROUND_HALF_UP).toFixed(2);
}

/** Sum of Decimal values, zero when empty. */
export function sum(values: readonly Decimal[]): Decimal {
  return values.reduce((total, val) => total.plus(val), ZERO);
}

/**
 * Division that falls back to zero on a zero divisor.
 * Averages over empty sets are reported as 0, never as an error.
 */
export function divideOrZero(a: Decimal, b: Decimal): Decimal {
  if (b.isZero()) {
    return ZERO;
  }
  return a.dividedBy(b);
}

/** Rounds a display ratio (win rate, percentage) to the given places. */
export function roundRatio(value: number, places = 2): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}
