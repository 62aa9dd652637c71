/**
 * Money value type and its arithmetic engine
 *
 * A Money is an immutable, non-negative decimal amount tagged with a currency, the
 * currency's precision (fractional digit count) and its atomic unit (10^-precision).
 * The amount is floor-rounded to the precision when constructed and after every
 * operation, so values never carry digits the currency cannot represent.
 *
 * Operations return a neverthrow Result; none of them throws on user input.
 */

import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { resolveCurrency, type CurrencyCatalog } from '../currency-catalog.js';
import type { CurrencyCode } from '../currency.js';
import { MoneyError } from '../errors/index.js';
import {
  atomicUnitFor,
  exactAdd,
  exactMultiply,
  exactSubtract,
  floorDivide,
  floorToPrecision,
  isValidPrecision,
  parseDecimal,
  type DecimalInput,
} from '../utils/decimal-utils.js';

export interface Money {
  readonly amount: Decimal;
  readonly currency: CurrencyCode;
  readonly precision: number;
  readonly atomicUnit: Decimal;
}

export interface MoneyDivision {
  readonly quotient: Money;
  readonly remainder: Money;
}

function buildMoney(amount: Decimal, currency: CurrencyCode, precision: number): Money {
  return Object.freeze({
    amount: floorToPrecision(amount, precision),
    currency,
    precision,
    atomicUnit: atomicUnitFor(precision),
  });
}

function withAmount(money: Money, amount: Decimal): Money {
  return Object.freeze({ ...money, amount: floorToPrecision(amount, money.precision) });
}

/**
 * Parse a user-supplied amount: finite and not negative
 */
export function parseAmount(amount: DecimalInput): Result<Decimal, MoneyError> {
  const parsed = parseDecimal(amount);
  if (parsed.isErr()) {
    return err(new MoneyError('INVALID_AMOUNT', parsed.error.message, { context: { amount: String(amount) } }));
  }
  if (parsed.value.isNegative()) {
    return err(
      new MoneyError('INVALID_AMOUNT', `Amount must not be negative, got ${parsed.value.toString()}`, {
        context: { amount: parsed.value.toString() },
      })
    );
  }
  return ok(parsed.value);
}

/**
 * Construct a Money for a currency from the catalog, floor-rounding the amount
 * to the currency's fraction size.
 *
 * @example createMoney('10.559', 'BRL', catalog) // 10.55 BRL
 */
export function createMoney(
  amount: DecimalInput,
  currencyCode: string,
  catalog: CurrencyCatalog
): Result<Money, MoneyError> {
  const parsed = parseAmount(amount);
  if (parsed.isErr()) {
    return err(parsed.error);
  }

  const currency = resolveCurrency(catalog, currencyCode);
  if (!currency) {
    return err(
      new MoneyError('INVALID_CURRENCY_CODE', `Unknown currency code "${currencyCode}"`, {
        context: { currency: currencyCode },
      })
    );
  }

  return ok(buildMoney(parsed.value, currency.code, currency.definition.fractionSize));
}

/**
 * Construct a Money for a currency that was already validated against a catalog,
 * e.g. the currency of an existing account.
 *
 * @throws Error when `precision` is not a non-negative integer
 */
export function createMoneyWithPrecision(
  amount: DecimalInput,
  currency: CurrencyCode,
  precision: number
): Result<Money, MoneyError> {
  if (!isValidPrecision(precision)) {
    throw new Error(`Precision must be a non-negative integer, got ${precision}`);
  }
  return parseAmount(amount).map((value) => buildMoney(value, currency, precision));
}

export function zeroMoney(currency: CurrencyCode, precision: number): Money {
  if (!isValidPrecision(precision)) {
    throw new Error(`Precision must be a non-negative integer, got ${precision}`);
  }
  return buildMoney(new Decimal(0), currency, precision);
}

function currencyMismatch(operation: string, a: Money, b: Money): MoneyError {
  return new MoneyError('CURRENCY_MISMATCH', `Cannot ${operation} different currencies: ${a.currency} and ${b.currency}`, {
    context: { left: a.currency, right: b.currency },
  });
}

export function addMoney(a: Money, b: Money): Result<Money, MoneyError> {
  if (a.currency !== b.currency) {
    return err(currencyMismatch('add', a, b));
  }
  return ok(withAmount(a, exactAdd(a.amount, b.amount)));
}

/**
 * Subtract b from a. Money never goes negative: a smaller minuend is an error.
 */
export function subtractMoney(a: Money, b: Money): Result<Money, MoneyError> {
  if (a.currency !== b.currency) {
    return err(currencyMismatch('subtract', a, b));
  }
  if (a.amount.lessThan(b.amount)) {
    return err(
      new MoneyError(
        'NEGATIVE_RESULT',
        `Subtracting ${b.amount.toFixed(b.precision)} from ${a.amount.toFixed(a.precision)} ${a.currency} would be negative`,
        { context: { minuend: a.amount.toString(), subtrahend: b.amount.toString(), currency: a.currency } }
      )
    );
  }
  return ok(withAmount(a, exactSubtract(a.amount, b.amount)));
}

/**
 * Multiply `money` by `rate` and re-denominate the exact product in `currency`
 * with `precision` digits.
 *
 * Fails with VALUE_TOO_LOW when the exact product is nonzero but floors to less
 * than one atomic unit. An exactly zero product is a valid zero result.
 */
export function convertMoney(
  money: Money,
  rate: DecimalInput,
  currency: CurrencyCode,
  precision: number
): Result<Money, MoneyError> {
  const parsedRate = parseDecimal(rate);
  if (parsedRate.isErr() || parsedRate.value.isNegative()) {
    return err(
      new MoneyError('INVALID_MULTIPLIER', `Multiplier must be a non-negative number, got ${String(rate)}`, {
        context: { multiplier: String(rate) },
      })
    );
  }

  const exact = exactMultiply(money.amount, parsedRate.value);
  const result = buildMoney(exact, currency, precision);

  if (!exact.isZero() && result.amount.lessThan(result.atomicUnit)) {
    return err(
      new MoneyError(
        'VALUE_TOO_LOW',
        `${exact.toString()} ${currency} is below the smallest representable amount ${result.atomicUnit.toString()}`,
        { context: { value: exact.toString(), atomicUnit: result.atomicUnit.toString(), currency } }
      )
    );
  }

  return ok(result);
}

/**
 * Multiply by a non-negative factor, flooring the product to the currency's precision
 */
export function scaleMoney(money: Money, factor: DecimalInput): Result<Money, MoneyError> {
  return convertMoney(money, factor, money.currency, money.precision);
}

/**
 * Split `money` into `divisor` equal parts.
 *
 * The quotient is floored to the currency's precision and the remainder holds
 * what floor division left behind, so `quotient * divisor + remainder == money`.
 * The divisor must be an integer of at least 1.
 */
export function divideMoney(money: Money, divisor: DecimalInput): Result<MoneyDivision, MoneyError> {
  const parsedDivisor = parseDecimal(divisor);
  if (parsedDivisor.isErr() || parsedDivisor.value.lessThan(1) || !parsedDivisor.value.isInteger()) {
    return err(
      new MoneyError('INVALID_DIVISOR', `Divisor must be an integer of at least 1, got ${String(divisor)}`, {
        context: { divisor: String(divisor) },
      })
    );
  }

  const quotient = withAmount(money, floorDivide(money.amount, parsedDivisor.value, money.precision));

  if (!money.amount.isZero() && quotient.amount.lessThan(quotient.atomicUnit)) {
    return err(
      new MoneyError(
        'VALUE_TOO_LOW',
        `${money.amount.toFixed(money.precision)} ${money.currency} / ${parsedDivisor.value.toString()} is below the smallest representable amount ${money.atomicUnit.toString()}`,
        {
          context: {
            value: money.amount.toString(),
            divisor: parsedDivisor.value.toString(),
            atomicUnit: money.atomicUnit.toString(),
            currency: money.currency,
          },
        }
      )
    );
  }

  return scaleMoney(quotient, parsedDivisor.value)
    .andThen((whole) => subtractMoney(money, whole))
    .map((remainder) => ({ quotient, remainder }));
}

export function isZeroMoney(money: Money): boolean {
  return money.amount.isZero();
}

export function moneyEquals(a: Money, b: Money): boolean {
  return a.currency === b.currency && a.amount.equals(b.amount);
}

/**
 * Compare two amounts of the same currency: -1, 0 or 1
 */
export function compareMoney(a: Money, b: Money): Result<-1 | 0 | 1, MoneyError> {
  if (a.currency !== b.currency) {
    return err(currencyMismatch('compare', a, b));
  }
  const cmp = a.amount.comparedTo(b.amount);
  const order: -1 | 0 | 1 = cmp < 0 ? -1 : cmp > 0 ? 1 : 0;
  return ok(order);
}

/**
 * Amount with exactly `precision` fractional digits, e.g. "10.00" or "10"
 */
export function moneyToString(money: Money): string {
  return money.amount.toFixed(money.precision);
}
