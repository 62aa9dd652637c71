/**
 * Weighted distribution of a value across several accounts
 */

import {
  createMoneyWithPrecision,
  exactMultiply,
  exactSubtract,
  MoneyError,
  parseDecimal,
  subtractMoney,
  sumDecimals,
  type DecimalInput,
  type Money,
} from '@fiatledger/core';
import { getLogger } from '@fiatledger/logger';
import type { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { deposit, withdraw, type AccountOperation } from '../accounts/account-operations.js';
import type { Account } from '../accounts/account.js';

const logger = getLogger('Distribution');

export interface SplitTransferOutcome {
  sender: Account;
  /** Updated receivers, in input order */
  receivers: Account[];
  /** Part of the withdrawn value that flooring the shares left with no receiver */
  undistributed: Money;
}

function invalidDistribution(message: string, context?: Record<string, unknown>): MoneyError {
  return new MoneyError('INVALID_DISTRIBUTION', message, { context });
}

/**
 * Weights must be non-empty, non-negative numbers whose exact sum is 1
 */
export function validateWeights(weights: readonly DecimalInput[]): Result<Decimal[], MoneyError> {
  if (weights.length === 0) {
    return err(invalidDistribution('At least one weight is required'));
  }

  const parsed: Decimal[] = [];
  for (const [index, weight] of weights.entries()) {
    const value = parseDecimal(weight);
    if (value.isErr()) {
      return err(invalidDistribution(`Weight ${index} is not a number: ${String(weight)}`, { index }));
    }
    if (value.value.isNegative()) {
      return err(invalidDistribution(`Weight ${index} must not be negative, got ${value.value.toString()}`, { index }));
    }
    parsed.push(value.value);
  }

  const total = sumDecimals(parsed);
  if (!total.equals(1)) {
    return err(invalidDistribution(`Weights must sum to 1, got ${total.toString()}`, { total: total.toString() }));
  }

  return ok(parsed);
}

function validateShares(
  accountCount: number,
  value: DecimalInput,
  weights: readonly DecimalInput[]
): Result<Decimal[], MoneyError> {
  return validateWeights(weights).andThen((parsedWeights) => {
    if (parsedWeights.length !== accountCount) {
      return err(
        invalidDistribution(`Got ${accountCount} accounts for ${parsedWeights.length} weights`, {
          accounts: accountCount,
          weights: parsedWeights.length,
        })
      );
    }
    const parsedValue = parseDecimal(value);
    if (parsedValue.isErr()) {
      return err(new MoneyError('INVALID_AMOUNT', parsedValue.error.message, { context: { value: String(value) } }));
    }
    return ok(parsedWeights.map((weight) => exactMultiply(weight, parsedValue.value)));
  });
}

/**
 * Apply `operation` to each account with its share. A zero share leaves an
 * account of the right currency untouched; the first failure aborts the whole run.
 */
function applyShares(
  accounts: readonly Account[],
  shares: readonly Decimal[],
  currency: string,
  operation: AccountOperation
): Result<Account[], MoneyError> {
  const updated: Account[] = [];
  for (const [index, account] of accounts.entries()) {
    const share = shares[index];
    if (share === undefined || (share.isZero() && account.currency === currency)) {
      updated.push(account);
      continue;
    }
    const result = operation(account, share, currency);
    if (result.isErr()) {
      return err(result.error);
    }
    updated.push(result.value);
  }
  return ok(updated);
}

/**
 * Withdraw `value` from `sender` once and deposit `weights[i] * value` into
 * each receiver, in the sender's currency.
 */
export function splitTransfer(
  sender: Account,
  receivers: readonly Account[],
  value: DecimalInput,
  weights: readonly DecimalInput[]
): Result<SplitTransferOutcome, MoneyError> {
  const result = validateShares(receivers.length, value, weights).andThen((shares) =>
    withdraw(sender, value, sender.currency).andThen((updatedSender) =>
      applyShares(receivers, shares, sender.currency, deposit).andThen((updatedReceivers) =>
        undistributedResidue(sender, updatedSender, receivers, updatedReceivers).map((undistributed) => ({
          sender: updatedSender,
          receivers: updatedReceivers,
          undistributed,
        }))
      )
    )
  );

  if (result.isErr()) {
    logger.warn(
      { code: result.error.code, senderId: sender.id, value: String(value) },
      `Split transfer rejected: ${result.error.message}`
    );
  } else {
    logger.debug(
      { senderId: sender.id, receivers: receivers.length, undistributed: result.value.undistributed.amount },
      'Split transfer applied'
    );
  }
  return result;
}

/**
 * What left the sender minus what reached the receivers
 */
function undistributedResidue(
  sender: Account,
  updatedSender: Account,
  receivers: readonly Account[],
  updatedReceivers: readonly Account[]
): Result<Money, MoneyError> {
  const withdrawn = exactSubtract(sender.balance.amount, updatedSender.balance.amount);
  const credited = sumDecimals(
    updatedReceivers.map((account, index) => exactSubtract(account.balance.amount, receivers[index]?.balance.amount ?? 0))
  );
  return createMoneyWithPrecision(withdrawn, sender.currency, sender.balance.precision).andThen((left) =>
    createMoneyWithPrecision(credited, sender.currency, sender.balance.precision).andThen((right) =>
      subtractMoney(left, right)
    )
  );
}

/**
 * Apply `operation` (deposit or withdraw) to each account with
 * `weights[i] * value`, in the first account's currency.
 */
export function splitValue(
  accounts: readonly Account[],
  value: DecimalInput,
  weights: readonly DecimalInput[],
  operation: AccountOperation
): Result<Account[], MoneyError> {
  const first = accounts[0];
  if (!first) {
    return err(invalidDistribution('At least one account is required'));
  }

  const result = validateShares(accounts.length, value, weights).andThen((shares) =>
    applyShares(accounts, shares, first.currency, operation)
  );

  if (result.isErr()) {
    logger.warn({ code: result.error.code, value: String(value) }, `Split value rejected: ${result.error.message}`);
  } else {
    logger.debug({ accounts: accounts.length, currency: first.currency, value: String(value) }, 'Split value applied');
  }
  return result;
}
