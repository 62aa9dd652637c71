/**
 * Currency exchange through a common-base rate table
 */

import {
  convertMoney,
  MoneyError,
  resolveCurrency,
  scaleMoney,
  type CurrencyCatalog,
  type Money,
} from '@fiatledger/core';
import { getLogger } from '@fiatledger/logger';
import type { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import type { ExchangeRateProvider, RateTable } from './exchange-rate-provider.interface.js';

const logger = getLogger('Exchange');

export interface ExchangeContext {
  catalog: CurrencyCatalog;
  rateProvider: ExchangeRateProvider;
}

function rateUnavailable(message: string, context: Record<string, unknown>, cause?: unknown): MoneyError {
  return new MoneyError('RATE_UNAVAILABLE', message, { cause, context });
}

function lookupRate(rates: RateTable, currency: string): Result<Decimal, MoneyError> {
  const rate = rates.get(currency);
  if (rate === undefined) {
    return err(rateUnavailable(`No exchange rate for ${currency}`, { currency }));
  }
  if (!rate.greaterThan(0)) {
    return err(rateUnavailable(`Exchange rate for ${currency} must be positive, got ${rate.toString()}`, { currency }));
  }
  return ok(rate);
}

/**
 * Convert `money` into `toCurrency` in two floored steps: scale by
 * `rates[from]` within the source currency, then convert that by `rates[to]`
 * into the target currency and precision.
 *
 * Exchanging into the same currency returns `money` unchanged without asking
 * the provider. A provider failure, a missing rate or a non-positive rate fails
 * with RATE_UNAVAILABLE. Either step fails with VALUE_TOO_LOW when its nonzero
 * product floors below one atomic unit.
 */
export async function exchangeMoney(
  money: Money,
  toCurrency: string,
  context: ExchangeContext
): Promise<Result<Money, MoneyError>> {
  const target = resolveCurrency(context.catalog, toCurrency);
  if (!target) {
    return err(
      new MoneyError('INVALID_CURRENCY_CODE', `Unknown currency code "${toCurrency}"`, {
        context: { currency: toCurrency },
      })
    );
  }

  if (target.code === money.currency) {
    return ok(money);
  }

  const ratesResult = await context.rateProvider.getRates();
  if (ratesResult.isErr()) {
    const error = rateUnavailable(
      `Exchange rates unavailable: ${ratesResult.error.message}`,
      { from: money.currency, to: target.code },
      ratesResult.error
    );
    logger.warn({ code: error.code, from: money.currency, to: target.code }, error.message);
    return err(error);
  }

  const rates = ratesResult.value;
  const result = lookupRate(rates, money.currency).andThen((fromRate) =>
    lookupRate(rates, target.code).andThen((toRate) =>
      scaleMoney(money, fromRate).andThen((intermediate) =>
        convertMoney(intermediate, toRate, target.code, target.definition.fractionSize)
      )
    )
  );

  if (result.isErr()) {
    logger.warn(
      { code: result.error.code, from: money.currency, to: target.code, amount: money.amount },
      `Exchange rejected: ${result.error.message}`
    );
  } else {
    logger.debug(
      { from: money.currency, to: target.code, amount: money.amount, converted: result.value.amount },
      'Exchange applied'
    );
  }
  return result;
}
