/**
 * Runtime Type Guards
 *
 * Narrowing functions for token ledger types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, archive files, external integrations).
 */

import type { Account } from "./account.js";
import type { TransactionKind } from "./transaction.js";
import type { TransactionJson } from "./codec.js";

const OWNER_PATTERN = /^[a-z0-9-]{1,63}$/;
const SUBACCOUNT_PATTERN = /^[0-9a-f]{64}$/;
const TRANSACTION_KINDS = new Set<string>(["mint", "burn", "transfer"]);
const NAT_PATTERN = /^\d+$/;

// =============================================================================
// Account guards
// =============================================================================

export function isOwner(value: unknown): value is string {
  return typeof value === "string" && OWNER_PATTERN.test(value);
}

export function isSubaccount(value: unknown): value is string {
  return typeof value === "string" && SUBACCOUNT_PATTERN.test(value);
}

export function isAccount(value: unknown): value is Account {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isOwner(v.owner) &&
    (v.subaccount === undefined || isSubaccount(v.subaccount))
  );
}

// =============================================================================
// Transaction guards
// =============================================================================

export function isTransactionKind(value: unknown): value is TransactionKind {
  return typeof value === "string" && TRANSACTION_KINDS.has(value);
}

function isNatString(value: unknown): value is string {
  return typeof value === "string" && NAT_PATTERN.test(value);
}

function isIndex(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

/**
 * Check the JSON (wire) shape of a transaction.
 *
 * Mints carry no sender, burns no recipient, and only transfers carry a fee.
 */
export function isTransactionJson(value: unknown): value is TransactionJson {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;

  if (!isIndex(v.index) || !isTransactionKind(v.kind)) return false;
  if (!isNatString(v.amount) || !isIndex(v.timestamp)) return false;
  if (v.memo !== undefined && typeof v.memo !== "string") return false;
  if (v.createdAtTime !== undefined && !isIndex(v.createdAtTime)) return false;

  switch (v.kind) {
    case "mint":
      return v.from === undefined && isAccount(v.to) && v.fee === undefined;
    case "burn":
      return isAccount(v.from) && v.to === undefined && v.fee === undefined;
    default:
      return isAccount(v.from) && isAccount(v.to) && isNatString(v.fee);
  }
}
