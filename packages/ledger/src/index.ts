export { createAccount, withBalance, type Account, type AccountId } from './accounts/account.js';
export {
  deposit,
  transfer,
  withdraw,
  type AccountOperation,
  type TransferOutcome,
} from './accounts/account-operations.js';
export { transferInternational } from './accounts/international-transfer.js';
export {
  splitTransfer,
  splitValue,
  validateWeights,
  type SplitTransferOutcome,
} from './distribution/distribution.js';
export type { ExchangeRateProvider, RateTable } from './exchange/exchange-rate-provider.interface.js';
export { exchangeMoney, type ExchangeContext } from './exchange/exchange.js';
export {
  HttpExchangeRateProvider,
  RateDocumentSchema,
  toRateTable,
  type HttpExchangeRateProviderConfig,
  type RateDocument,
} from './exchange/http-exchange-rate-provider.js';
export { StaticExchangeRateProvider } from './exchange/static-exchange-rate-provider.js';
export { createFinancialSystem, type BootstrapOptions } from './bootstrap.js';
export { FinancialSystem, type FinancialSystemDeps } from './financial-system.js';
