import { describe, expect, it } from 'vitest';

import { InMemoryCurrencyCatalog } from '../currency-catalog.js';
import { money, testCatalog } from '../__tests__/test-utils.js';

import { formatMoney } from './money-format.js';

describe('formatMoney', () => {
  it('should prefix the currency grapheme and keep every fractional digit', () => {
    expect(formatMoney(money(10, 'BRL'), testCatalog)).toBe('R$10.00');
    expect(formatMoney(money('10.5', 'USD'), testCatalog)).toBe('$10.50');
  });

  it('should print no fractional part for zero-precision currencies', () => {
    expect(formatMoney(money(10, 'JPY'), testCatalog)).toBe('¥10');
  });

  it('should fall back to the code when the catalog has no entry', () => {
    const empty = new InMemoryCurrencyCatalog({});
    expect(formatMoney(money('0.5', 'KWD'), empty)).toBe('KWD 0.500');
  });
});
