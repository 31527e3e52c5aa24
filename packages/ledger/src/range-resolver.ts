/**
 * @tokenledger/ledger — Range queries across log and archive.
 *
 * Splits a requested index window into the part still held by the live
 * log (returned inline) and the part held by the archive (returned as
 * fetch descriptors no longer than the archive's per-call limit).
 */

import type { ArchiveEndpoint, Transaction } from "@tokenledger/types";
import type { TransactionLog } from "./transaction-log.js";
import type { ArchivedRangeDescriptor, GetTransactionsResponse } from "./types.js";
import { LedgerError, NO_INDEX } from "./types.js";

/**
 * Cut [start, end) into consecutive descriptors of at most `maxLength`.
 */
export function chunkRange(
  start: number,
  end: number,
  maxLength: number,
): readonly ArchivedRangeDescriptor[] {
  const chunks: ArchivedRangeDescriptor[] = [];
  for (let chunkStart = start; chunkStart < end; chunkStart += maxLength) {
    chunks.push({ start: chunkStart, length: Math.min(maxLength, end - chunkStart) });
  }
  return chunks;
}

/**
 * Resolve transactions [start, start + length).
 *
 * @param storedTxs - Transactions held by the archive
 * @param maxQueryLength - Archive per-call limit
 */
export function resolveRange(
  start: number,
  length: number,
  storedTxs: number,
  log: TransactionLog,
  maxQueryLength: number,
): GetTransactionsResponse {
  if (!Number.isSafeInteger(start) || start < 0 || !Number.isSafeInteger(length) || length < 0) {
    throw new LedgerError(
      "INVALID_RANGE",
      `Range must be non-negative integers, got start=${start}, length=${length}`,
    );
  }

  const txEnd = storedTxs + log.size();

  if (length === 0 || start >= txEnd) {
    return {
      logLength: txEnd,
      length: 0,
      firstIndex: NO_INDEX,
      transactions: [],
      archivedTransactions: [],
    };
  }

  const end = Math.min(start + length, txEnd);

  const archivedEnd = Math.min(storedTxs, end);
  const archivedTransactions =
    start < archivedEnd ? chunkRange(start, archivedEnd, maxQueryLength) : [];

  const localStart = Math.max(start, storedTxs);
  const transactions = localStart < end ? log.slice(localStart, end - localStart) : [];

  return {
    logLength: txEnd,
    length: Math.max(archivedEnd - start, 0) + transactions.length,
    firstIndex: start,
    transactions,
    archivedTransactions,
  };
}

/**
 * Fetch the transactions behind archive descriptors, in order.
 *
 * @throws {LedgerError} ARCHIVE_INCOMPLETE if the archive returns a
 *   different range than the one requested
 */
export async function fetchArchivedRanges(
  endpoint: ArchiveEndpoint,
  ranges: readonly ArchivedRangeDescriptor[],
): Promise<readonly Transaction[]> {
  const transactions: Transaction[] = [];

  for (const range of ranges) {
    const result = await endpoint.getTransactions(range.start, range.length);
    const complete =
      result.start === range.start &&
      result.transactions.length === range.length &&
      result.transactions.every((tx, i) => tx.index === range.start + i);

    if (!complete) {
      throw new LedgerError(
        "ARCHIVE_INCOMPLETE",
        `Archive "${endpoint.id}" returned ${result.transactions.length} of ${range.length} transactions from ${range.start}`,
      );
    }
    transactions.push(...result.transactions);
  }

  return transactions;
}
