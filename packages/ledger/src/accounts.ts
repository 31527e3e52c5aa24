/**
 * @tokenledger/ledger — Account encoding.
 *
 * Turns an owner + subaccount pair into the comparable key the
 * balance store is indexed by.
 *
 * Rules:
 * - The default (all-zero) subaccount encodes like an absent one
 * - Encoded keys compare by plain string equality
 */

import type { Account, EncodedAccount } from "@tokenledger/types";
import { isAccount } from "@tokenledger/types";
import { LedgerError } from "./types.js";

export const DEFAULT_SUBACCOUNT = "0".repeat(64);

const SEPARATOR = ".";

/**
 * Check that an account is well-formed.
 */
export function isValidAccount(account: Account): boolean {
  return isAccount(account);
}

/**
 * Drop the default subaccount so equal accounts have equal shapes.
 */
export function normalizeAccount(account: Account): Account {
  if (account.subaccount === undefined || account.subaccount === DEFAULT_SUBACCOUNT) {
    return { owner: account.owner };
  }
  return { owner: account.owner, subaccount: account.subaccount };
}

/**
 * Encode an account into its canonical key.
 * Does not validate; pair with isValidAccount at boundaries.
 */
export function encodeAccount(account: Account): EncodedAccount {
  const normalized = normalizeAccount(account);
  return normalized.subaccount === undefined
    ? normalized.owner
    : `${normalized.owner}${SEPARATOR}${normalized.subaccount}`;
}

/**
 * Decode a canonical key back into an account.
 *
 * @throws {LedgerError} INVALID_ACCOUNT if the key is malformed
 */
export function decodeAccount(key: string): Account {
  const at = key.indexOf(SEPARATOR);
  const account: Account =
    at === -1
      ? { owner: key }
      : { owner: key.slice(0, at), subaccount: key.slice(at + 1) };

  if (!isValidAccount(account)) {
    throw new LedgerError("INVALID_ACCOUNT", `Invalid account: "${key}"`);
  }
  return normalizeAccount(account);
}

export function accountsEqual(a: Account, b: Account): boolean {
  return encodeAccount(a) === encodeAccount(b);
}
