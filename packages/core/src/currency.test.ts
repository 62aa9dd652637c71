import { describe, expect, it } from 'vitest';

import { isCurrencyCodeFormat, parseCurrencyCode } from './currency.js';

describe('parseCurrencyCode', () => {
  it('should accept three upper-case letters', () => {
    expect(parseCurrencyCode('BRL')._unsafeUnwrap()).toBe('BRL');
  });

  it('should reject lower-case codes instead of normalizing them', () => {
    const result = parseCurrencyCode('brl');
    expect(result.isErr()).toBe(true);
    expect(result._unsafeUnwrapErr().message).toBe('Currency code must be three upper-case letters, got "brl"');
  });

  it('should reject codes of the wrong length', () => {
    expect(parseCurrencyCode('').isErr()).toBe(true);
    expect(parseCurrencyCode('TEMERS').isErr()).toBe(true);
    expect(parseCurrencyCode(' BRL').isErr()).toBe(true);
  });
});

describe('isCurrencyCodeFormat', () => {
  it('should only check the shape, not catalog membership', () => {
    expect(isCurrencyCodeFormat('XYZ')).toBe(true);
    expect(isCurrencyCodeFormat('US1')).toBe(false);
  });
});
