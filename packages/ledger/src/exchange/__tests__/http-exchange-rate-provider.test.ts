import type { FetchResponse, HttpEffects } from '@fiatledger/http';
import { HttpError } from '@fiatledger/http';
import { describe, expect, it, vi } from 'vitest';

import { HttpExchangeRateProvider, toRateTable } from '../http-exchange-rate-provider.js';

function jsonResponse(body: unknown, status = 200): FetchResponse {
  return {
    headers: new Headers(),
    json: () => Promise.resolve(body),
    ok: status >= 200 && status < 300,
    status,
    text: () => Promise.resolve(JSON.stringify(body)),
  };
}

function createProvider(fetch: HttpEffects['fetch'], retries = 1): HttpExchangeRateProvider {
  return new HttpExchangeRateProvider(
    { url: 'https://rates.example.com/latest', retries },
    { delay: vi.fn().mockResolvedValue(undefined), fetch, log: vi.fn() }
  );
}

describe('toRateTable', () => {
  it('adds the base currency at rate 1 when absent', () => {
    const table = toRateTable({ base: 'EUR', rates: { USD: 1.08, BRL: 5.9 } });

    expect(table.get('EUR')?.toString()).toBe('1');
    expect(table.get('USD')?.toString()).toBe('1.08');
    expect(table.size).toBe(3);
  });

  it('keeps a base rate the document already lists', () => {
    const table = toRateTable({ base: 'USD', rates: { USD: 1, EUR: 0.92 } });
    expect(table.size).toBe(2);
  });

  it('works without a base', () => {
    expect(toRateTable({ rates: { USD: 1.08 } }).size).toBe(1);
  });
});

describe('HttpExchangeRateProvider', () => {
  it('fetches and converts the rate document', async () => {
    const fetch = vi
      .fn<HttpEffects['fetch']>()
      .mockResolvedValue(jsonResponse({ base: 'EUR', rates: { USD: 1.08, BRL: 5.9 } }));
    const provider = createProvider(fetch);

    const table = (await provider.getRates())._unsafeUnwrap();

    expect(table.get('BRL')?.toString()).toBe('5.9');
    expect(table.get('EUR')?.toString()).toBe('1');
    expect(fetch.mock.calls[0]?.[0]).toBe('https://rates.example.com/latest');
  });

  it('returns the HTTP error for a failed request', async () => {
    const fetch = vi.fn<HttpEffects['fetch']>().mockResolvedValue(jsonResponse('down', 503));
    const provider = createProvider(fetch);

    const error = (await provider.getRates())._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(HttpError);
    expect(error.message).toBe('HTTP 503: "down"');
  });

  it('rejects documents with non-positive rates', async () => {
    const fetch = vi.fn<HttpEffects['fetch']>().mockResolvedValue(jsonResponse({ rates: { USD: -1 } }));
    const provider = createProvider(fetch);

    const error = (await provider.getRates())._unsafeUnwrapErr();

    expect(error.message).toBe('Response validation failed: rates.USD: Number must be greater than 0');
  });

  it('retries network failures through the HTTP client', async () => {
    const fetch = vi
      .fn<HttpEffects['fetch']>()
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockResolvedValue(jsonResponse({ rates: { USD: 1 } }));
    const provider = createProvider(fetch, 2);

    expect((await provider.getRates()).isOk()).toBe(true);
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it('closes its HTTP client', async () => {
    const provider = createProvider(vi.fn<HttpEffects['fetch']>());
    await expect(provider.close()).resolves.toBeUndefined();
  });
});
