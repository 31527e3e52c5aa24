/**
 * @tokenledger/archive — In-memory archive node.
 *
 * Stores migrated transactions in a plain array. Suitable for:
 * - Unit and integration tests
 * - Short-lived processes
 * - Development and prototyping
 *
 * Not suitable for production (all state lost on process exit).
 *
 * Properties:
 * - O(1) append per transaction (amortized)
 * - O(n) range read (where n = number of transactions returned)
 * - No durability guarantees
 */

import type {
  ArchiveAppendResult,
  ArchiveEndpoint,
  ArchiveRange,
  Transaction,
} from "@tokenledger/types";
import { MAX_TRANSACTIONS_PER_REQUEST } from "@tokenledger/types";
import type { ArchiveOptions } from "./types.js";
import { ArchiveError, DEFAULT_MAX_MEMORY_BYTES, capacityFor } from "./types.js";

/**
 * In-memory archive.
 *
 * Transaction `i` lives at array position `i`: the archive always starts
 * at global index 0 and grows contiguously.
 */
export class InMemoryArchive implements ArchiveEndpoint {
  readonly id: string;
  readonly ledgerId: string;
  readonly capacity: number;

  protected readonly _transactions: Transaction[] = [];

  constructor(options: ArchiveOptions) {
    const maxMemoryBytes = options.maxMemoryBytes ?? DEFAULT_MAX_MEMORY_BYTES;
    if (!Number.isSafeInteger(maxMemoryBytes) || maxMemoryBytes <= 0) {
      throw new ArchiveError("INVALID_OPTIONS", `maxMemoryBytes must be a positive integer, got ${maxMemoryBytes}`);
    }
    this.id = options.id;
    this.ledgerId = options.ledgerId;
    this.capacity = capacityFor(maxMemoryBytes);
  }

  // ─── Append ─────────────────────────────────────────────────────────

  async append(
    callerId: string,
    batch: readonly Transaction[],
  ): Promise<ArchiveAppendResult> {
    if (callerId !== this.ledgerId) {
      return {
        ok: false,
        error: { kind: "Unauthorized", message: `Only "${this.ledgerId}" may append to archive "${this.id}"` },
      };
    }

    const expected = this._transactions.length;
    const nonContiguous = batch.findIndex((tx, i) => tx.index !== expected + i);
    if (nonContiguous !== -1) {
      const found = batch[nonContiguous]?.index;
      return {
        ok: false,
        error: {
          kind: "NonContiguous",
          message: `Expected index ${expected + nonContiguous}, got ${String(found)}`,
        },
      };
    }

    if (batch.length > this.capacity - this._transactions.length) {
      return {
        ok: false,
        error: {
          kind: "CapacityExceeded",
          message: `Batch of ${batch.length} exceeds remaining capacity ${this.capacity - this._transactions.length}`,
        },
      };
    }

    this._persist(batch);
    this._transactions.push(...batch);
    return { ok: true };
  }

  /**
   * Durability hook, called before a validated batch becomes visible.
   * A throw leaves the archive unchanged.
   */
  protected _persist(_batch: readonly Transaction[]): void {
    // In-memory: nothing to write.
  }

  // ─── Read ───────────────────────────────────────────────────────────

  async getTransaction(index: number): Promise<Transaction | undefined> {
    if (!Number.isSafeInteger(index) || index < 0) {
      return undefined;
    }
    return this._transactions[index];
  }

  /**
   * Transactions [start, start + length), clamped to what the archive
   * holds and to MAX_TRANSACTIONS_PER_REQUEST.
   */
  async getTransactions(start: number, length: number): Promise<ArchiveRange> {
    const from = Math.max(Math.trunc(start), 0);
    const count = Math.min(Math.max(Math.trunc(length), 0), MAX_TRANSACTIONS_PER_REQUEST);
    return {
      start: from,
      transactions: this._transactions.slice(from, from + count),
    };
  }

  async totalTransactions(): Promise<number> {
    return this._transactions.length;
  }

  async remainingCapacity(): Promise<number> {
    return this.capacity - this._transactions.length;
  }
}
