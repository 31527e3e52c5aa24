/**
 * @tokenledger/types — Shared domain types for the token ledger stack.
 *
 * These types are used across all packages:
 * - Accounts and their encoded keys
 * - Committed transactions and transfer requests
 * - The transfer error taxonomy
 * - The archive endpoint contract
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Account types
export type { Account, EncodedAccount, Principal } from "./account.js";

// Transaction types
export type {
  Transaction,
  TransactionKind,
  TransferArgs,
  MintArgs,
  BurnArgs,
  TransferError,
  TransferErrorKind,
  TransferResult,
} from "./transaction.js";

// Archive contract
export type {
  ArchiveAppendError,
  ArchiveAppendResult,
  ArchiveRange,
  ArchiveEndpoint,
  ArchiveProvisioner,
  ProvisionRequest,
} from "./archive.js";
export { MAX_TRANSACTION_BYTES, MAX_TRANSACTIONS_PER_REQUEST } from "./archive.js";

// JSON codec
export type { TransactionJson } from "./codec.js";
export { transactionToJson, transactionFromJson } from "./codec.js";

// Runtime type guards
export {
  isOwner,
  isSubaccount,
  isAccount,
  isTransactionKind,
  isTransactionJson,
} from "./guards.js";
