import { createMoney, type DecimalInput, type MoneyError } from '@fiatledger/core';
import { getLogger } from '@fiatledger/logger';
import { err, type Result } from 'neverthrow';

import { exchangeMoney, type ExchangeContext } from '../exchange/exchange.js';

import { deposit, withdraw, type TransferOutcome } from './account-operations.js';
import type { Account } from './account.js';

const logger = getLogger('Accounts');

/**
 * Send `value` denominated in `toCurrency` to `receiver`, charging the sender
 * the equivalent amount in the sender's own currency.
 *
 * The receiver must hold `toCurrency`. Nothing is applied unless the exchange,
 * the withdrawal and the deposit all succeed.
 */
export async function transferInternational(
  sender: Account,
  receiver: Account,
  toCurrency: string,
  value: DecimalInput,
  context: ExchangeContext
): Promise<Result<TransferOutcome, MoneyError>> {
  const money = createMoney(value, toCurrency, context.catalog);
  if (money.isErr()) {
    return err(money.error);
  }

  const converted = await exchangeMoney(money.value, sender.currency, context);
  if (converted.isErr()) {
    return err(converted.error);
  }

  const result = withdraw(sender, converted.value.amount, sender.currency).andThen((updatedSender) =>
    deposit(receiver, value, toCurrency).map((updatedReceiver) => ({
      sender: updatedSender,
      receiver: updatedReceiver,
    }))
  );

  if (result.isOk()) {
    logger.debug(
      {
        senderId: sender.id,
        receiverId: receiver.id,
        charged: converted.value.amount,
        sentCurrency: toCurrency,
        sent: money.value.amount,
      },
      'International transfer applied'
    );
  }
  return result;
}
