/**
 * @tokenledger/ledger — Bounded transaction log.
 *
 * The live, in-memory tail of the ledger's history. Entries are only ever
 * appended; they leave the log as a prefix once the archive has confirmed
 * receiving them.
 *
 * Invariants:
 * - The first entry's index equals the archive's stored count
 * - Indices are consecutive
 */

import type { Transaction } from "@tokenledger/types";
import type { TransactionDraft } from "./types.js";

export interface TransactionLogOptions {
  /** Size at which the log asks to be migrated */
  readonly capacity: number;
  /** Number of transactions already held by the archive */
  readonly storedCount: () => number;
}

export class TransactionLog {
  private readonly _entries: Transaction[] = [];
  private readonly _capacity: number;
  private readonly _storedCount: () => number;

  constructor(options: TransactionLogOptions) {
    this._capacity = options.capacity;
    this._storedCount = options.storedCount;
  }

  get capacity(): number {
    return this._capacity;
  }

  /** Global index of the first local entry. */
  get firstIndex(): number {
    return this._storedCount();
  }

  size(): number {
    return this._entries.length;
  }

  isFull(): boolean {
    return this._entries.length >= this._capacity;
  }

  /**
   * Append a transaction and return the global index assigned to it.
   *
   * The log may grow past capacity while a migration is pending.
   */
  append(draft: TransactionDraft): number {
    const index = this.firstIndex + this._entries.length;
    this._entries.push({ index, ...draft });
    return index;
  }

  /**
   * Local entry at a global index.
   */
  get(index: number): Transaction | undefined {
    const offset = index - this.firstIndex;
    if (!Number.isInteger(offset) || offset < 0) {
      return undefined;
    }
    return this._entries[offset];
  }

  /**
   * Local entries with global index in [start, start + length).
   */
  slice(start: number, length: number): readonly Transaction[] {
    const from = Math.max(start - this.firstIndex, 0);
    const to = Math.max(start + length - this.firstIndex, 0);
    return this._entries.slice(from, to);
  }

  /** Copy of every local entry, oldest first. */
  entries(): readonly Transaction[] {
    return [...this._entries];
  }

  /**
   * Drop the oldest `count` entries (all of them by default).
   * Called only once the archive holds those entries.
   */
  clear(count: number = this._entries.length): void {
    this._entries.splice(0, count);
  }
}
