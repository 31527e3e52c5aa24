/**
 * @tokenledger/ledger — Internal types for the ledger engine.
 *
 * These extend the shared @tokenledger/types with ledger-specific
 * structures used only within this package.
 *
 * Rules:
 * - All types are readonly
 * - Rejected requests are values (TransferError), never exceptions
 * - Broken invariants and bad construction throw
 */

import type { Logger } from "pino";
import type {
  Account,
  ArchiveProvisioner,
  EncodedAccount,
  Transaction,
  TransactionKind,
} from "@tokenledger/types";
import type { BackoffConfig } from "./backoff.js";

// ─── Constants ───────────────────────────────────────────────────────────

/** Number of transactions the live log holds before migrating. */
export const DEFAULT_MAX_LOG_SIZE = 2000;

/** De-duplication window for requests carrying createdAtTime. */
export const DEFAULT_TRANSACTION_WINDOW_MS = 24 * 60 * 60 * 1000;

/** Allowed clock skew between caller and ledger. */
export const DEFAULT_PERMITTED_DRIFT_MS = 60 * 1000;

/** Fixed resource cost charged when an archive is provisioned. */
export const DEFAULT_ARCHIVE_CREATION_COST = 100_000_000_000n;

/** Maximum memo length in bytes. */
export const MAX_MEMO_BYTES = 32;

/** `firstIndex` of a range response that matched nothing. */
export const NO_INDEX = Number.MAX_SAFE_INTEGER;

/**
 * Error codes carried by `GenericError` transfer rejections.
 */
export const GENERIC_ERROR_CODES = {
  INVALID_ACCOUNT: 1,
  INVALID_MEMO: 2,
  SELF_TRANSFER: 3,
  MAX_SUPPLY_EXCEEDED: 4,
  INVALID_AMOUNT: 5,
} as const;

// ─── Configuration ───────────────────────────────────────────────────────

/**
 * An account funded at construction time.
 */
export interface InitialBalance {
  readonly account: Account;
  readonly amount: bigint;
}

/**
 * Token and policy parameters of a ledger.
 */
export interface TokenLedgerConfig {
  /** Identity the ledger presents to its archive. Default: "ledger" */
  readonly id?: string | undefined;
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
  /** Fee charged (and burned) on every ordinary transfer */
  readonly fee: bigint;
  readonly mintingAccount: Account;
  /** Smallest amount a burn may destroy. Default: the transfer fee */
  readonly minBurnAmount?: bigint | undefined;
  /** Cap on total minted tokens */
  readonly maxSupply: bigint;
  readonly initialBalances?: readonly InitialBalance[] | undefined;
  readonly transactionWindowMs?: number | undefined;
  readonly permittedDriftMs?: number | undefined;
  readonly maxLogSize?: number | undefined;
  /** Per-call limit of archive range descriptors */
  readonly maxQueryLength?: number | undefined;
  readonly archiveCreationCost?: bigint | undefined;
  readonly backoff?: Partial<BackoffConfig> | undefined;
}

/**
 * Collaborators injected into a ledger.
 */
export interface TokenLedgerDeps {
  readonly provisioner: ArchiveProvisioner;
  /** Epoch milliseconds. Default: Date.now */
  readonly clock?: (() => number) | undefined;
  readonly logger?: Logger | undefined;
  /** Source of backoff jitter. Default: Math.random */
  readonly random?: (() => number) | undefined;
}

/**
 * The policy a request is validated against.
 */
export interface LedgerPolicy {
  readonly fee: bigint;
  readonly mintingAccount: Account;
  readonly minBurnAmount: bigint;
  readonly maxSupply: bigint;
  readonly transactionWindowMs: number;
  readonly permittedDriftMs: number;
}

/**
 * Public description of the token.
 */
export interface LedgerMetadata {
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
  readonly fee: bigint;
  readonly mintingAccount: Account;
  readonly minBurnAmount: bigint;
  readonly maxSupply: bigint;
  readonly totalSupply: bigint;
}

// ─── Requests ────────────────────────────────────────────────────────────

/**
 * A classified, not yet validated request. Both sides are always present:
 * the minting account stands in for the missing side of a mint or burn.
 */
export interface TransactionRequest {
  readonly kind: TransactionKind;
  readonly from: Account;
  readonly to: Account;
  readonly amount: bigint;
  /** Fee as supplied by the caller */
  readonly fee?: bigint | undefined;
  readonly memo?: string | undefined;
  readonly createdAtTime?: number | undefined;
}

/**
 * A request that passed validation and may be applied.
 */
export interface ValidatedRequest {
  readonly kind: TransactionKind;
  readonly from: Account;
  readonly to: Account;
  readonly fromKey: EncodedAccount;
  readonly toKey: EncodedAccount;
  readonly amount: bigint;
  /** Effective fee: the ledger fee for transfers, 0 otherwise */
  readonly fee: bigint;
  readonly memo?: string | undefined;
  readonly createdAtTime?: number | undefined;
  /** Present when the request takes part in de-duplication */
  readonly dedupKey?: string | undefined;
}

/** A transaction before the log assigns its index. */
export type TransactionDraft = Omit<Transaction, "index">;

// ─── Range Queries ───────────────────────────────────────────────────────

/**
 * A block of archived transactions the caller fetches from the archive.
 */
export interface ArchivedRangeDescriptor {
  readonly start: number;
  readonly length: number;
}

/**
 * Answer to `getTransactions(start, length)`.
 */
export interface GetTransactionsResponse {
  /** Total transactions ever committed (archive + live log) */
  readonly logLength: number;
  /** Number of matched transactions: archived + local */
  readonly length: number;
  /** First matched index, or NO_INDEX when nothing matched */
  readonly firstIndex: number;
  /** Matched transactions still held by the ledger */
  readonly transactions: readonly Transaction[];
  /** Matched transactions held by the archive, in index order */
  readonly archivedTransactions: readonly ArchivedRangeDescriptor[];
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INSUFFICIENT_BALANCE"
  | "INVALID_AMOUNT"
  | "INVALID_ACCOUNT"
  | "INVALID_RANGE"
  | "ARCHIVE_UNAVAILABLE"
  | "ARCHIVE_INCOMPLETE";

/**
 * Structured error from the ledger engine.
 * Thrown on misuse or broken invariants; transfer rejections are values.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

/**
 * Fatal configuration error. A ledger that throws this was never usable.
 */
export class LedgerInitError extends Error {
  public readonly code = "LEDGER_INIT" as const;

  constructor(message: string) {
    super(message);
    this.name = "LedgerInitError";
  }
}
