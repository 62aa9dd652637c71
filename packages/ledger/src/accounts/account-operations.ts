/**
 * Deposits, withdrawals and same-currency transfers
 *
 * Every operation validates all of its preconditions before building the new
 * account values, so a failure never leaves a partial update behind.
 */

import {
  addMoney,
  createMoneyWithPrecision,
  MoneyError,
  parseAmount,
  subtractMoney,
  type DecimalInput,
  type Money,
} from '@fiatledger/core';
import { getLogger } from '@fiatledger/logger';
import type { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { withBalance, type Account } from './account.js';

const logger = getLogger('Accounts');

export interface TransferOutcome {
  sender: Account;
  receiver: Account;
}

/**
 * Shape shared by deposit and withdraw, used by splitValue
 */
export type AccountOperation = (account: Account, value: DecimalInput, currency: string) => Result<Account, MoneyError>;

/**
 * Checks common to deposit and withdraw: amount, currency and minimum value.
 * Returns the parsed amount.
 */
function validateMovement(
  operation: string,
  account: Account,
  value: DecimalInput,
  currency: string
): Result<Decimal, MoneyError> {
  const amount = parseAmount(value);
  if (amount.isErr()) {
    return err(amount.error);
  }

  if (currency !== account.currency) {
    return err(
      new MoneyError(
        'UNSUPPORTED_CURRENCY',
        `Account ${account.id} holds ${account.currency} and cannot ${operation} ${currency}`,
        { context: { accountId: account.id, accountCurrency: account.currency, currency } }
      )
    );
  }

  const atomicUnit = account.balance.atomicUnit;
  if (amount.value.lessThan(atomicUnit)) {
    return err(
      new MoneyError(
        'VALUE_TOO_LOW',
        `${amount.value.toString()} ${currency} is below the smallest operable amount ${atomicUnit.toString()}`,
        { context: { accountId: account.id, value: amount.value.toString(), atomicUnit: atomicUnit.toString() } }
      )
    );
  }

  return ok(amount.value);
}

function logOutcome<T>(
  operation: string,
  account: Account,
  value: DecimalInput,
  result: Result<T, MoneyError>
): Result<T, MoneyError> {
  const context = { accountId: account.id, currency: account.currency, value: String(value) };
  if (result.isErr()) {
    logger.warn({ ...context, code: result.error.code }, `${operation} rejected: ${result.error.message}`);
  } else {
    logger.debug(context, `${operation} applied`);
  }
  return result;
}

/**
 * Add `value` (floored to the account precision) to the balance.
 *
 * Fails with INVALID_AMOUNT for a negative value, UNSUPPORTED_CURRENCY when
 * `currency` is not the account's and VALUE_TOO_LOW below one atomic unit.
 */
export function deposit(account: Account, value: DecimalInput, currency: string): Result<Account, MoneyError> {
  const result = validateMovement('deposit', account, value, currency)
    .andThen((amount) => createMoneyWithPrecision(amount, account.currency, account.balance.precision))
    .andThen((money) => addMoney(money, account.balance))
    .map((balance) => withBalance(account, balance));

  return logOutcome('Deposit', account, value, result);
}

/**
 * Take `value` (floored to the account precision) out of the balance.
 *
 * Same preconditions as deposit, plus INSUFFICIENT_FUNDS when the balance is
 * smaller than `value`.
 */
export function withdraw(account: Account, value: DecimalInput, currency: string): Result<Account, MoneyError> {
  const result = validateMovement('withdraw', account, value, currency)
    .andThen((amount): Result<Money, MoneyError> => {
      if (account.balance.amount.lessThan(amount)) {
        return err(
          new MoneyError(
            'INSUFFICIENT_FUNDS',
            `Account ${account.id} has ${account.balance.amount.toFixed(account.balance.precision)} ${account.currency}, cannot withdraw ${amount.toString()}`,
            {
              context: {
                accountId: account.id,
                balance: account.balance.amount.toString(),
                value: amount.toString(),
              },
            }
          )
        );
      }
      return createMoneyWithPrecision(amount, account.currency, account.balance.precision);
    })
    .andThen((money) => subtractMoney(account.balance, money))
    .map((balance) => withBalance(account, balance));

  return logOutcome('Withdrawal', account, value, result);
}

/**
 * Move `value` between two accounts of the same currency
 */
export function transfer(sender: Account, receiver: Account, value: DecimalInput): Result<TransferOutcome, MoneyError> {
  if (sender.currency !== receiver.currency) {
    const error = new MoneyError(
      'CURRENCY_MISMATCH',
      `Ordinary transfers need a single currency: ${sender.currency} and ${receiver.currency}. Use an international transfer`,
      { context: { senderId: sender.id, receiverId: receiver.id } }
    );
    logger.warn({ code: error.code, senderId: sender.id, receiverId: receiver.id }, error.message);
    return err(error);
  }

  return withdraw(sender, value, sender.currency).andThen((updatedSender) =>
    deposit(receiver, value, sender.currency).map((updatedReceiver) => ({
      sender: updatedSender,
      receiver: updatedReceiver,
    }))
  );
}
