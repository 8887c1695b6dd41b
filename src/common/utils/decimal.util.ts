import Decimal from 'decimal.js';

// Configure Decimal.js globally for money and share quantities
Decimal.set({
  precision: 20,
  rounding: Decimal.ROUND_HALF_UP,
  toExpPos: 9e15,
  toExpNeg: -9e15,
});

export type DecimalInput = number | string | Decimal;

/** Remaining lot quantity at or below this is treated as fully sold. */
export const QUANTITY_EPSILON = new Decimal('0.000001');

export const ZERO = new Decimal(0);

/**
 * Converts any number-like value to Decimal for financial calculations.
 * Handles JavaScript numbers, strings, and existing Decimal instances.
 */
export function toDecimal(value: DecimalInput): Decimal {
  return new Decimal(value);
}

/**
 * Converts Decimal back to JavaScript number for JSON serialization.
 * Rounds to 8 decimal places so fractional shares survive the trip.
 */
export function toNumber(value: Decimal): number {
  return value.toDecimalPlaces(8).toNumber();
}

/** Cash and equity figures, 2 decimal places. */
export function toMoney(value: Decimal): number {
  return value.toDecimalPlaces(2, Decimal.ROUND_HALF_UP).toNumber();
}

/**
 * Converts Decimal to USD string with 2 decimal places.
 * Used in error messages shown to the trader.
 */
export function toUSD(value: Decimal): string {
  return value.toDecimalPlaces(2, Decimal.ROUND_HALF_UP).toFixed(2);
}

export function sum(values: Decimal[]): Decimal {
  return values.reduce((acc, val) => acc.plus(val), new Decimal(0));
}

/** True when a quantity is small enough to be dropped from the ledger. */
export function isDust(quantity: Decimal): boolean {
  return quantity.lessThanOrEqualTo(QUANTITY_EPSILON);
}
