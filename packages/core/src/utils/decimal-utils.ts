import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

// Rounding to a currency's precision is always explicit (ROUND_FLOOR); anything
// that still hits the context precision is truncated, never rounded up.
Decimal.set({
  maxE: 9e15,
  minE: -9e15,
  precision: 64,
  rounding: Decimal.ROUND_DOWN,
  toExpNeg: -30,
  toExpPos: 40,
});

// Sums, differences and products of finite decimals always terminate, so they
// are computed without a significant-digit limit.
const ExactDecimal = Decimal.clone({ precision: 1e9, rounding: Decimal.ROUND_DOWN });

export type DecimalInput = Decimal.Value;

/**
 * Parse a string, number or Decimal into a finite Decimal.
 * Returns Err for unparseable strings, NaN and infinities.
 */
export function parseDecimal(value: DecimalInput): Result<Decimal, Error> {
  let decimal: Decimal;
  try {
    decimal = new Decimal(value);
  } catch {
    return err(new Error(`Not a decimal number: ${String(value)}`));
  }

  if (!decimal.isFinite()) {
    return err(new Error(`Not a finite number: ${String(value)}`));
  }

  return ok(decimal);
}

/**
 * Round toward negative infinity to `precision` fractional digits
 */
export function floorToPrecision(value: Decimal, precision: number): Decimal {
  return value.toDecimalPlaces(precision, Decimal.ROUND_FLOOR);
}

/**
 * Smallest amount representable with `precision` fractional digits: 10^-precision
 */
export function atomicUnitFor(precision: number): Decimal {
  return new Decimal(10).pow(-precision);
}

export function exactAdd(a: DecimalInput, b: DecimalInput): Decimal {
  return new Decimal(new ExactDecimal(a).plus(b));
}

export function exactSubtract(a: DecimalInput, b: DecimalInput): Decimal {
  return new Decimal(new ExactDecimal(a).minus(b));
}

export function exactMultiply(a: DecimalInput, b: DecimalInput): Decimal {
  return new Decimal(new ExactDecimal(a).times(b));
}

/**
 * `dividend / divisor` truncated to `precision` fractional digits. Only the
 * digits that survive the truncation are computed, so non-terminating
 * quotients such as 1/3 are fine.
 *
 * @example floorDivide('10', 3, 2) // 3.33
 */
export function floorDivide(dividend: DecimalInput, divisor: DecimalInput, precision: number): Decimal {
  const scale = new ExactDecimal(10).pow(precision);
  return new Decimal(new ExactDecimal(dividend).times(scale).dividedToIntegerBy(divisor).dividedBy(scale));
}

/**
 * Exact sum of decimals (empty list sums to zero)
 */
export function sumDecimals(values: readonly Decimal[]): Decimal {
  return values.reduce((total, value) => exactAdd(total, value), new Decimal(0));
}

/**
 * Check that a precision is usable as a fractional digit count
 */
export function isValidPrecision(precision: number): boolean {
  return Number.isInteger(precision) && precision >= 0;
}
