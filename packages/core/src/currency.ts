import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';

/**
 * Branded string type for ISO-4217 currency codes (e.g. 'BRL', 'USD', 'JPY')
 * Only produced after validation: by parseCurrencyCode() or by a catalog lookup
 */
export type CurrencyCode = string & { readonly _brand: 'CurrencyCode' };

const CURRENCY_CODE_PATTERN = /^[A-Z]{3}$/;

/**
 * Check the shape of a currency code: three upper-case letters
 */
export function isCurrencyCodeFormat(code: string): code is CurrencyCode {
  return CURRENCY_CODE_PATTERN.test(code);
}

/**
 * Parse a raw string into a CurrencyCode.
 * Codes are case-sensitive; 'brl' is rejected rather than normalized.
 */
export function parseCurrencyCode(code: string): Result<CurrencyCode, Error> {
  if (!isCurrencyCodeFormat(code)) {
    return err(new Error(`Currency code must be three upper-case letters, got "${code}"`));
  }
  return ok(code);
}
