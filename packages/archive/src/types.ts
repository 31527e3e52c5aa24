/**
 * @tokenledger/archive — Core types.
 *
 * Archive nodes hold the transactions a ledger has migrated out of its
 * live log.
 *
 * Design principles:
 * - An archive only accepts batches from the ledger that owns it
 * - Batches extend the archive contiguously (no gaps, no overlap)
 * - Capacity is counted in maximum-size transactions
 */

import { MAX_TRANSACTION_BYTES } from "@tokenledger/types";

/** Default storage budget of one archive node: 8 GiB. */
export const DEFAULT_MAX_MEMORY_BYTES = 8 * 1024 * 1024 * 1024;

/**
 * Options shared by every archive implementation.
 */
export interface ArchiveOptions {
  /** Identifier of this archive instance */
  readonly id: string;
  /** The only caller allowed to append */
  readonly ledgerId: string;
  /** Storage budget; capacity = floor(maxMemoryBytes / MAX_TRANSACTION_BYTES) */
  readonly maxMemoryBytes?: number | undefined;
}

/**
 * Number of transactions that fit in a storage budget.
 */
export function capacityFor(maxMemoryBytes: number): number {
  return Math.floor(maxMemoryBytes / MAX_TRANSACTION_BYTES);
}

// =============================================================================
// Errors
// =============================================================================

export type ArchiveErrorCode =
  | "PROVISIONING_BUDGET_EXHAUSTED"
  | "INVALID_OPTIONS"
  | "ARCHIVE_EXISTS"
  | "CORRUPT_ARCHIVE";

/**
 * Error thrown by archive nodes and provisioners.
 */
export class ArchiveError extends Error {
  public readonly code: ArchiveErrorCode;

  constructor(code: ArchiveErrorCode, message: string) {
    super(message);
    this.name = "ArchiveError";
    this.code = code;
  }
}
