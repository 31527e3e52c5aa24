/**
 * @tokenledger/ledger — Request de-duplication.
 *
 * A request that carries `createdAtTime` is identified by the SHA-256 of
 * its RFC 8785 (JCS) canonical form. A second request with the same hash
 * inside the transaction window is a duplicate of the first.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import { encodeAccount } from "./accounts.js";
import type { TransactionRequest } from "./types.js";

interface DedupEntry {
  readonly index: number;
  readonly createdAtTime: number;
}

/**
 * Hash a request for de-duplication.
 *
 * Amounts are stringified and accounts encoded so equal requests hash
 * equally regardless of how their accounts were spelled.
 */
export function requestHash(request: TransactionRequest): string {
  const content = canonicalize({
    kind: request.kind,
    from: encodeAccount(request.from),
    to: encodeAccount(request.to),
    amount: request.amount.toString(),
    ...(request.fee !== undefined ? { fee: request.fee.toString() } : {}),
    ...(request.memo !== undefined ? { memo: request.memo } : {}),
    ...(request.createdAtTime !== undefined ? { createdAtTime: request.createdAtTime } : {}),
  });
  return createHash("sha256").update(content).digest("hex");
}

/**
 * Hashes of recent requests and the index each was committed at.
 *
 * Entries are queued in commit order and pruned from the head, so pruning
 * stops at the first entry still inside the window. An older entry queued
 * behind it is kept until the head expires; it can no longer match because
 * the TooOld check runs before the duplicate lookup.
 */
export class DedupIndex {
  private readonly _entries: Map<string, DedupEntry> = new Map();
  private _queue: { readonly hash: string; readonly entry: DedupEntry }[] = [];
  private _head = 0;

  /**
   * Index of the transaction a request duplicates, if any.
   */
  find(hash: string): number | undefined {
    return this._entries.get(hash)?.index;
  }

  record(hash: string, index: number, createdAtTime: number): void {
    const entry: DedupEntry = { index, createdAtTime };
    this._entries.set(hash, entry);
    this._queue.push({ hash, entry });
  }

  /**
   * Forget requests created before `oldestAllowed`, oldest commit first.
   */
  prune(oldestAllowed: number): void {
    while (this._head < this._queue.length) {
      const queued = this._queue[this._head];
      if (queued === undefined || queued.entry.createdAtTime >= oldestAllowed) {
        break;
      }
      if (this._entries.get(queued.hash) === queued.entry) {
        this._entries.delete(queued.hash);
      }
      this._head++;
    }

    // Compact once the consumed prefix outweighs the live tail
    if (this._head > 0 && this._head * 2 >= this._queue.length) {
      this._queue = this._queue.slice(this._head);
      this._head = 0;
    }
  }

  get size(): number {
    return this._entries.size;
  }
}
