import type { CurrencyCatalog } from '../currency-catalog.js';
import { moneyToString, type Money } from '../value-objects/money.js';

/**
 * Display a Money as its currency symbol followed by the amount at full precision,
 * e.g. "R$10.00" or "¥10". Codes missing from the catalog print as "XXX 10.00".
 */
export function formatMoney(money: Money, catalog: CurrencyCatalog): string {
  const grapheme = catalog.lookup(money.currency)?.symbol.grapheme;
  const amount = moneyToString(money);
  return grapheme === undefined ? `${money.currency} ${amount}` : `${grapheme}${amount}`;
}
