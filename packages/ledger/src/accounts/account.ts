import {
  MoneyError,
  resolveCurrency,
  zeroMoney,
  type CurrencyCatalog,
  type CurrencyCode,
  type Money,
} from '@fiatledger/core';
import { err, ok, type Result } from 'neverthrow';

export type AccountId = string | number;

/**
 * Single-currency account. Operations never mutate an account; they return
 * a new value with the updated balance.
 */
export interface Account {
  readonly id: AccountId;
  readonly owner: string;
  readonly currency: CurrencyCode;
  readonly balance: Money;
}

/**
 * Open an account with a zero balance in `currencyCode`
 */
export function createAccount(
  id: AccountId,
  owner: string,
  currencyCode: string,
  catalog: CurrencyCatalog
): Result<Account, MoneyError> {
  const currency = resolveCurrency(catalog, currencyCode);
  if (!currency) {
    return err(
      new MoneyError('INVALID_CURRENCY_CODE', `Unknown currency code "${currencyCode}"`, {
        context: { accountId: id, currency: currencyCode },
      })
    );
  }

  return ok(
    Object.freeze({
      id,
      owner,
      currency: currency.code,
      balance: zeroMoney(currency.code, currency.definition.fractionSize),
    })
  );
}

export function withBalance(account: Account, balance: Money): Account {
  return Object.freeze({ ...account, balance });
}
