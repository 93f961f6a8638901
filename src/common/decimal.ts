import Decimal from 'decimal.js';

export { Decimal };

/** Stored precision of lot and bulk quantities. */
export const QUANTITY_SCALE = 3;
/** Smallest quantity a lot can hold. */
export const QUANTITY_QUANTUM = new Decimal(1).dividedBy(10 ** QUANTITY_SCALE);
/** Precision of cost totals and weighted averages. */
export const COST_SCALE = 4;
/** Precision of per-base-unit costs derived from package prices. */
export const UNIT_COST_SCALE = 6;
/** Percentage-based adjustments round to cents of a unit. */
export const PERCENTAGE_RESULT_SCALE = 2;

export type DecimalInput = Decimal | string | number;

export const ZERO = new Decimal(0);
export const HUNDRED = new Decimal(100);

export function toDecimal(value: DecimalInput): Decimal {
  return value instanceof Decimal ? value : new Decimal(value);
}

export function roundHalfUp(value: DecimalInput, places: number): Decimal {
  return toDecimal(value).toDecimalPlaces(places, Decimal.ROUND_HALF_UP);
}

export function decimalMin(a: Decimal, b: Decimal): Decimal {
  return a.lessThanOrEqualTo(b) ? a : b;
}

export function decimalMax(a: Decimal, b: Decimal): Decimal {
  return a.greaterThanOrEqualTo(b) ? a : b;
}

export function decimalSum(values: Decimal[]): Decimal {
  return values.reduce((sum, value) => sum.plus(value), ZERO);
}

/**
 * Serialize for numeric columns and JSON payloads. `toFixed()` never
 * switches to exponent notation, which PostgreSQL would reject.
 */
export function toNumeric(value: Decimal): string {
  return value.toFixed();
}
