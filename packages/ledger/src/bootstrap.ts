import { loadBundledCurrencyCatalog, loadCurrencyCatalog, type InMemoryCurrencyCatalog } from '@fiatledger/core';
import { getConfig, type AppConfig } from '@fiatledger/env';
import type { HttpEffects } from '@fiatledger/http';
import { ConsoleSink, getLogger, initLogger, type Sink } from '@fiatledger/logger';
import type { Result } from 'neverthrow';

import type { ExchangeRateProvider } from './exchange/exchange-rate-provider.interface.js';
import { HttpExchangeRateProvider } from './exchange/http-exchange-rate-provider.js';
import { StaticExchangeRateProvider } from './exchange/static-exchange-rate-provider.js';
import { FinancialSystem } from './financial-system.js';

export interface BootstrapOptions {
  /** Log sinks; defaults to a ConsoleSink */
  sinks?: Sink[] | undefined;
  /** Overrides for the rate provider's HTTP side effects */
  httpEffects?: Partial<HttpEffects> | undefined;
}

/**
 * Wire a FinancialSystem from configuration: logging, the currency catalog
 * (configured file or the bundled ISO data) and the rate provider.
 *
 * Without an exchange URL the provider serves an empty table, so exchanges
 * fail with RATE_UNAVAILABLE.
 *
 * @throws Error when the environment or the catalog file is invalid
 */
export function createFinancialSystem(config: AppConfig = getConfig(), options: BootstrapOptions = {}): FinancialSystem {
  initLogger({ level: config.logLevel, sinks: options.sinks ?? [new ConsoleSink()] });
  const logger = getLogger('Bootstrap');

  const catalogResult: Result<InMemoryCurrencyCatalog, Error> = config.currencyCatalogPath
    ? loadCurrencyCatalog(config.currencyCatalogPath)
    : loadBundledCurrencyCatalog();
  if (catalogResult.isErr()) {
    logger.error({ error: catalogResult.error }, 'Failed to load currency catalog');
    throw catalogResult.error;
  }
  const catalog = catalogResult.value;

  let rateProvider: ExchangeRateProvider;
  if (config.exchangeApiUrl) {
    rateProvider = new HttpExchangeRateProvider(
      { url: config.exchangeApiUrl, retries: config.httpRetries, timeoutMs: config.httpTimeoutMs },
      options.httpEffects
    );
  } else {
    logger.warn('No exchange rate URL configured; exchanges will fail with RATE_UNAVAILABLE');
    rateProvider = new StaticExchangeRateProvider({});
  }

  logger.info(
    {
      catalog: config.currencyCatalogPath ?? 'bundled',
      currencies: catalog.size,
      rates: config.exchangeApiUrl ? 'http' : 'none',
    },
    'Financial system ready'
  );

  return new FinancialSystem({ catalog, rateProvider });
}
