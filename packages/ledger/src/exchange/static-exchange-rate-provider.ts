import { parseDecimal, type DecimalInput } from '@fiatledger/core';
import type { Decimal } from 'decimal.js';
import { ok, type Result } from 'neverthrow';

import type { ExchangeRateProvider, RateTable } from './exchange-rate-provider.interface.js';

/**
 * Provider serving a fixed rate table, for offline use and tests
 *
 * @throws Error when a rate is not a finite number
 */
export class StaticExchangeRateProvider implements ExchangeRateProvider {
  private readonly rates: RateTable;

  constructor(rates: Readonly<Record<string, DecimalInput>>) {
    const table = new Map<string, Decimal>();
    for (const [currency, rate] of Object.entries(rates)) {
      const parsed = parseDecimal(rate);
      if (parsed.isErr()) {
        throw new Error(`Invalid rate for ${currency}: ${parsed.error.message}`);
      }
      table.set(currency, parsed.value);
    }
    this.rates = table;
  }

  getRates(): Promise<Result<RateTable, Error>> {
    return Promise.resolve(ok(this.rates));
  }
}
