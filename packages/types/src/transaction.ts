/**
 * Transaction Types
 *
 * Committed transactions are immutable and carry a global index that is
 * gapless across the live log and the archive.
 *
 * Rules:
 * - Amounts are bigint base units (never floating point)
 * - Times are epoch milliseconds
 * - A transaction is never modified after commit
 */

import type { Account } from "./account.js";

/**
 * What a transaction does to the supply.
 *
 * - mint: from the minting account, increases supply
 * - burn: to the minting account, decreases supply
 * - transfer: between two ordinary accounts
 */
export type TransactionKind = "mint" | "burn" | "transfer";

/**
 * A committed transaction.
 */
export interface Transaction {
  /** Global position, starts at 0 */
  readonly index: number;

  readonly kind: TransactionKind;

  /** Absent for mints */
  readonly from?: Account | undefined;

  /** Absent for burns */
  readonly to?: Account | undefined;

  readonly amount: bigint;

  /** Present only on transfers */
  readonly fee?: bigint | undefined;

  /** Hex-encoded memo, at most 32 bytes */
  readonly memo?: string | undefined;

  /** Caller-supplied creation time, used for de-duplication */
  readonly createdAtTime?: number | undefined;

  /** Ledger time at commit */
  readonly timestamp: number;
}

/**
 * Arguments of a transfer request as issued by a caller.
 *
 * The sender is always the caller's own account, selected by
 * `fromSubaccount`.
 */
export interface TransferArgs {
  readonly fromSubaccount?: string | undefined;
  readonly to: Account;
  readonly amount: bigint;
  readonly fee?: bigint | undefined;
  readonly memo?: string | undefined;
  readonly createdAtTime?: number | undefined;
}

/**
 * Arguments of a mint request. The sender is the minting account.
 */
export interface MintArgs {
  readonly to: Account;
  readonly amount: bigint;
  readonly memo?: string | undefined;
  readonly createdAtTime?: number | undefined;
}

/**
 * Arguments of a burn request. The recipient is the minting account.
 */
export interface BurnArgs {
  readonly fromSubaccount?: string | undefined;
  readonly amount: bigint;
  readonly memo?: string | undefined;
  readonly createdAtTime?: number | undefined;
}

// =============================================================================
// Transfer errors
// =============================================================================

/**
 * Why a transfer request was rejected.
 *
 * Returned as a value; a rejected request never changes ledger state.
 */
export type TransferError =
  | { readonly kind: "BadFee"; readonly expectedFee: bigint }
  | { readonly kind: "BadBurn"; readonly minBurnAmount: bigint }
  | { readonly kind: "InsufficientFunds"; readonly balance: bigint }
  | { readonly kind: "TooOld" }
  | { readonly kind: "CreatedInFuture"; readonly ledgerTime: number }
  | { readonly kind: "Duplicate"; readonly duplicateOf: number }
  | { readonly kind: "Unauthorized"; readonly message: string }
  | {
      readonly kind: "GenericError";
      readonly errorCode: number;
      readonly message: string;
    };

export type TransferErrorKind = TransferError["kind"];

/**
 * Outcome of a transfer, mint or burn.
 */
export type TransferResult =
  | { readonly ok: true; readonly index: number }
  | { readonly ok: false; readonly error: TransferError };
