/**
 * Currency catalog: maps an ISO-4217 code to its fractional-unit count and display symbol.
 *
 * Money construction consumes the CurrencyCatalog interface; embedding applications
 * supply their own implementation or load one of the JSON catalogs below.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import { isCurrencyCodeFormat, type CurrencyCode } from './currency.js';

export const currencySymbolSchema = z.object({
  grapheme: z.string().min(1),
  template: z.string().optional(),
  rtl: z.boolean().optional(),
});

export const currencyDefinitionSchema = z.object({
  name: z.string().optional(),
  fractionSize: z.number().int().min(0).max(18),
  symbol: currencySymbolSchema,
});

export const currencyCatalogSchema = z.record(
  z.string().regex(/^[A-Z]{3}$/, { message: 'Currency code must be three upper-case letters' }),
  currencyDefinitionSchema
);

export type CurrencySymbol = z.infer<typeof currencySymbolSchema>;
export type CurrencyDefinition = z.infer<typeof currencyDefinitionSchema>;

export interface CurrencyCatalog {
  /** Definition for `code`, or undefined when the code is not in the catalog */
  lookup(code: string): CurrencyDefinition | undefined;
}

/**
 * Resolved catalog entry: the validated code together with its definition
 */
export interface ResolvedCurrency {
  code: CurrencyCode;
  definition: CurrencyDefinition;
}

/**
 * Look a code up and brand it on success
 */
export function resolveCurrency(catalog: CurrencyCatalog, code: string): ResolvedCurrency | undefined {
  if (!isCurrencyCodeFormat(code)) {
    return undefined;
  }
  const definition = catalog.lookup(code);
  return definition ? { code, definition } : undefined;
}

export class InMemoryCurrencyCatalog implements CurrencyCatalog {
  private readonly entries: ReadonlyMap<string, CurrencyDefinition>;

  constructor(entries: Readonly<Record<string, CurrencyDefinition>>) {
    this.entries = new Map(Object.entries(entries));
  }

  lookup(code: string): CurrencyDefinition | undefined {
    return this.entries.get(code);
  }

  codes(): string[] {
    return [...this.entries.keys()].sort();
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * Validate raw JSON data into a catalog
 */
export function parseCurrencyCatalog(raw: unknown): Result<InMemoryCurrencyCatalog, Error> {
  const result = currencyCatalogSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .slice(0, 5)
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    return err(new Error(`Invalid currency catalog: ${issues}`));
  }
  return ok(new InMemoryCurrencyCatalog(result.data));
}

/**
 * Load and validate a catalog from a JSON file shaped like
 * `{ "BRL": { "fractionSize": 2, "symbol": { "grapheme": "R$" } } }`
 */
export function loadCurrencyCatalog(filePath: string): Result<InMemoryCurrencyCatalog, Error> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(new Error(`Failed to read currency catalog ${filePath}: ${message}`, { cause: error }));
  }
  return parseCurrencyCatalog(raw);
}

export const BUNDLED_CATALOG_PATH = fileURLToPath(new URL('../data/currencies.json', import.meta.url));

let bundledCatalog: InMemoryCurrencyCatalog | undefined;

/**
 * The ISO-4217 catalog shipped with this package, loaded once
 */
export function loadBundledCurrencyCatalog(): Result<InMemoryCurrencyCatalog, Error> {
  if (bundledCatalog) {
    return ok(bundledCatalog);
  }
  return loadCurrencyCatalog(BUNDLED_CATALOG_PATH).map((catalog) => {
    bundledCatalog = catalog;
    return catalog;
  });
}
