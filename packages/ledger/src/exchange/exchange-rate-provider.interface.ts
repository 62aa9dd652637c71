/**
 * Interface for fetching exchange rates
 *
 * Exchange and international transfers depend on this interface only; the
 * HTTP document source, a static table or a test double plug in behind it.
 */

import type { Decimal } from 'decimal.js';
import type { Result } from 'neverthrow';

/**
 * Units of each currency worth one unit of a common base currency,
 * e.g. { EUR: 1, USD: 1.08, BRL: 5.9 }
 */
export type RateTable = ReadonlyMap<string, Decimal>;

export interface ExchangeRateProvider {
  /**
   * Current rate table. Err when the rates cannot be obtained.
   */
  getRates(): Promise<Result<RateTable, Error>>;

  /**
   * Release held resources (sockets, timers). Optional.
   */
  close?(): Promise<void>;
}
