/**
 * @tokenledger/ledger — Fungible-token ledger engine.
 *
 * Balances, mint/burn/transfer, a bounded live transaction log and its
 * overflow into an archive:
 * - Every committed request gets the next gapless global index
 * - sum(balances) + burned == minted after every operation
 * - At most one archive migration is in flight at a time
 * - Range queries stitch the live log and the archive together
 *
 * Design rules:
 * - All types are readonly
 * - Rejected requests are values, broken invariants throw
 * - All monetary arithmetic uses bigint
 */

// Core engine
export { TokenLedger } from "./ledger.js";

// Components
export { BalanceStore } from "./balance-store.js";
export { TransactionLog } from "./transaction-log.js";
export type { TransactionLogOptions } from "./transaction-log.js";
export { ArchiveCoordinator, ArchiveReference } from "./archive-coordinator.js";
export type {
  ArchiveBinding,
  ArchiveCoordinatorOptions,
  ArchiveStatus,
  MigrationOutcome,
  MigrationSkipReason,
  MigrationState,
} from "./archive-coordinator.js";
export { MigrationBackoff, computeDelay, DEFAULT_BACKOFF_CONFIG } from "./backoff.js";
export type { BackoffConfig, FailureRecord } from "./backoff.js";

// Requests
export { classify, callerAccount, toTransactionRequest } from "./classifier.js";
export { validate } from "./validator.js";
export type { ValidationContext, ValidationResult } from "./validator.js";
export { DedupIndex, requestHash } from "./dedup.js";

// Range queries
export { resolveRange, chunkRange, fetchArchivedRanges } from "./range-resolver.js";

// Accounts
export {
  DEFAULT_SUBACCOUNT,
  accountsEqual,
  decodeAccount,
  encodeAccount,
  isValidAccount,
  normalizeAccount,
} from "./accounts.js";

// Types
export type {
  ArchivedRangeDescriptor,
  GetTransactionsResponse,
  InitialBalance,
  LedgerErrorCode,
  LedgerMetadata,
  LedgerPolicy,
  TokenLedgerConfig,
  TokenLedgerDeps,
  TransactionDraft,
  TransactionRequest,
  ValidatedRequest,
} from "./types.js";

export {
  DEFAULT_ARCHIVE_CREATION_COST,
  DEFAULT_MAX_LOG_SIZE,
  DEFAULT_PERMITTED_DRIFT_MS,
  DEFAULT_TRANSACTION_WINDOW_MS,
  GENERIC_ERROR_CODES,
  LedgerError,
  LedgerInitError,
  MAX_MEMO_BYTES,
  NO_INDEX,
} from "./types.js";
