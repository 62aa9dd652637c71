import { HttpClient, type HttpEffects } from '@fiatledger/http';
import { getLogger } from '@fiatledger/logger';
import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import type { ExchangeRateProvider, RateTable } from './exchange-rate-provider.interface.js';

/**
 * Rate document: `{ "base": "EUR", "rates": { "USD": 1.08, "BRL": 5.9 } }`
 */
export const RateDocumentSchema = z.object({
  base: z.string().regex(/^[A-Z]{3}$/).optional(),
  rates: z.record(z.string(), z.number().positive()),
});

export type RateDocument = z.infer<typeof RateDocumentSchema>;

export interface HttpExchangeRateProviderConfig {
  /** Full URL of the rate document */
  url: string;
  retries?: number | undefined;
  timeoutMs?: number | undefined;
}

/**
 * Build a rate table from a validated document. The base currency is worth
 * exactly one unit of itself, so it is added at rate 1 when the document omits it.
 */
export function toRateTable(document: RateDocument): RateTable {
  const table = new Map<string, Decimal>();
  for (const [currency, rate] of Object.entries(document.rates)) {
    table.set(currency, new Decimal(rate));
  }
  if (document.base && !table.has(document.base)) {
    table.set(document.base, new Decimal(1));
  }
  return table;
}

/**
 * Fetches the rate document over HTTP on every call. Retries and timeouts are
 * handled by the HttpClient.
 */
export class HttpExchangeRateProvider implements ExchangeRateProvider {
  private readonly client: HttpClient;
  private readonly logger = getLogger('HttpExchangeRateProvider');

  constructor(config: HttpExchangeRateProviderConfig, effects?: Partial<HttpEffects>) {
    this.client = new HttpClient(
      {
        baseUrl: config.url,
        providerName: 'exchange-rates',
        retries: config.retries,
        timeout: config.timeoutMs,
      },
      effects
    );
  }

  async getRates(): Promise<Result<RateTable, Error>> {
    const result = await this.client.get('', { schema: RateDocumentSchema });
    if (result.isErr()) {
      this.logger.warn({ error: result.error }, `Failed to fetch exchange rates: ${result.error.message}`);
      return err(result.error);
    }

    const table = toRateTable(result.value);
    this.logger.debug({ base: result.value.base, count: table.size }, 'Exchange rates fetched');
    return ok(table);
  }

  close(): Promise<void> {
    return this.client.close();
  }
}
