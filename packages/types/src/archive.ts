/**
 * Archive Types
 *
 * The contract between a ledger and the external store that holds its
 * migrated transactions. Every call is asynchronous: the ledger may be
 * interleaved with other operations while a call is outstanding.
 */

import type { Transaction } from "./transaction.js";

/**
 * Upper bound on the encoded size of one transaction.
 * Archive capacity is expressed in multiples of it.
 */
export const MAX_TRANSACTION_BYTES = 196;

/**
 * Maximum number of transactions returned by one archive range call.
 */
export const MAX_TRANSACTIONS_PER_REQUEST = 5000;

/**
 * Why an archive refused a batch.
 */
export interface ArchiveAppendError {
  readonly kind: "Unauthorized" | "NonContiguous" | "CapacityExceeded";
  readonly message: string;
}

/**
 * Result of appending a batch to an archive.
 */
export type ArchiveAppendResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: ArchiveAppendError };

/**
 * A contiguous range of transactions held by an archive.
 */
export interface ArchiveRange {
  /** Index of the first transaction returned */
  readonly start: number;
  readonly transactions: readonly Transaction[];
}

/**
 * An archive endpoint as consumed by the ledger.
 */
export interface ArchiveEndpoint {
  /** Identifier of this archive instance */
  readonly id: string;

  /**
   * Append a batch. The first transaction's index must equal the
   * archive's current length.
   */
  append(
    callerId: string,
    batch: readonly Transaction[],
  ): Promise<ArchiveAppendResult>;

  getTransaction(index: number): Promise<Transaction | undefined>;

  /** Clamped to MAX_TRANSACTIONS_PER_REQUEST entries */
  getTransactions(start: number, length: number): Promise<ArchiveRange>;

  totalTransactions(): Promise<number>;

  /** Number of further transactions the archive can accept */
  remainingCapacity(): Promise<number>;
}

/**
 * Request to create a new archive instance for a ledger.
 */
export interface ProvisionRequest {
  readonly ledgerId: string;
  /** Fixed resource cost charged for the allocation */
  readonly cost: bigint;
}

/**
 * Creates archive instances on demand.
 */
export interface ArchiveProvisioner {
  provision(request: ProvisionRequest): Promise<ArchiveEndpoint>;
}
