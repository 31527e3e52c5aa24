/**
 * @tokenledger/node — HTTP node for a token ledger.
 *
 * Package public API. `main.ts` is the executable entry point.
 */

export { LedgerService } from "./services/ledger-service.js";
export type {
  ArchiveServiceConfig,
  ArchivedTransactions,
  LedgerServiceConfig,
  SupplySummary,
} from "./services/ledger-service.js";
export {
  loadConfig,
  parseApiKeys,
  parseInitialBalances,
  toApiKeyMap,
  toLedgerServiceConfig,
  ConfigSchema,
} from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./types/index.js";
