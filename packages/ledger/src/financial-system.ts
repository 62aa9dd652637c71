import {
  createMoney,
  formatMoney,
  type CurrencyCatalog,
  type DecimalInput,
  type Money,
  type MoneyError,
} from '@fiatledger/core';
import { flushLoggers } from '@fiatledger/logger';
import type { Decimal } from 'decimal.js';
import type { Result } from 'neverthrow';

import { createAccount, type Account, type AccountId } from './accounts/account.js';
import {
  deposit,
  transfer,
  withdraw,
  type AccountOperation,
  type TransferOutcome,
} from './accounts/account-operations.js';
import { transferInternational } from './accounts/international-transfer.js';
import { splitTransfer, splitValue, validateWeights, type SplitTransferOutcome } from './distribution/distribution.js';
import type { ExchangeRateProvider } from './exchange/exchange-rate-provider.interface.js';
import { exchangeMoney, type ExchangeContext } from './exchange/exchange.js';

export interface FinancialSystemDeps {
  catalog: CurrencyCatalog;
  rateProvider: ExchangeRateProvider;
}

/**
 * Entry point binding the account, exchange and distribution operations to one
 * currency catalog and one rate provider
 */
export class FinancialSystem {
  private readonly context: ExchangeContext;

  constructor(deps: FinancialSystemDeps) {
    this.context = { catalog: deps.catalog, rateProvider: deps.rateProvider };
  }

  get catalog(): CurrencyCatalog {
    return this.context.catalog;
  }

  createMoney(amount: DecimalInput, currencyCode: string): Result<Money, MoneyError> {
    return createMoney(amount, currencyCode, this.context.catalog);
  }

  createAccount(id: AccountId, owner: string, currencyCode: string): Result<Account, MoneyError> {
    return createAccount(id, owner, currencyCode, this.context.catalog);
  }

  deposit(account: Account, value: DecimalInput, currency: string): Result<Account, MoneyError> {
    return deposit(account, value, currency);
  }

  withdraw(account: Account, value: DecimalInput, currency: string): Result<Account, MoneyError> {
    return withdraw(account, value, currency);
  }

  transfer(sender: Account, receiver: Account, value: DecimalInput): Result<TransferOutcome, MoneyError> {
    return transfer(sender, receiver, value);
  }

  transferInternational(
    sender: Account,
    receiver: Account,
    toCurrency: string,
    value: DecimalInput
  ): Promise<Result<TransferOutcome, MoneyError>> {
    return transferInternational(sender, receiver, toCurrency, value, this.context);
  }

  exchange(money: Money, toCurrency: string): Promise<Result<Money, MoneyError>> {
    return exchangeMoney(money, toCurrency, this.context);
  }

  validateWeights(weights: readonly DecimalInput[]): Result<Decimal[], MoneyError> {
    return validateWeights(weights);
  }

  splitTransfer(
    sender: Account,
    receivers: readonly Account[],
    value: DecimalInput,
    weights: readonly DecimalInput[]
  ): Result<SplitTransferOutcome, MoneyError> {
    return splitTransfer(sender, receivers, value, weights);
  }

  splitValue(
    accounts: readonly Account[],
    value: DecimalInput,
    weights: readonly DecimalInput[],
    operation: AccountOperation
  ): Result<Account[], MoneyError> {
    return splitValue(accounts, value, weights, operation);
  }

  /**
   * Balance with its currency symbol, e.g. "R$10.00"
   */
  checkBalance(account: Account): string {
    return formatMoney(account.balance, this.context.catalog);
  }

  /**
   * Release the rate provider and flush buffered log output
   */
  async close(): Promise<void> {
    await this.context.rateProvider.close?.();
    flushLoggers();
  }
}
