/**
 * Transaction JSON codec.
 *
 * bigint does not survive JSON.stringify, so amounts travel as decimal
 * strings of base units. Optional fields are omitted rather than null.
 */

import type { Account } from "./account.js";
import type { Transaction, TransactionKind } from "./transaction.js";
import { isTransactionJson } from "./guards.js";

/**
 * Wire form of a Transaction.
 */
export interface TransactionJson {
  readonly index: number;
  readonly kind: TransactionKind;
  readonly from?: Account | undefined;
  readonly to?: Account | undefined;
  readonly amount: string;
  readonly fee?: string | undefined;
  readonly memo?: string | undefined;
  readonly createdAtTime?: number | undefined;
  readonly timestamp: number;
}

function copyAccount(account: Account): Account {
  return account.subaccount === undefined
    ? { owner: account.owner }
    : { owner: account.owner, subaccount: account.subaccount };
}

export function transactionToJson(tx: Transaction): TransactionJson {
  return {
    index: tx.index,
    kind: tx.kind,
    ...(tx.from !== undefined ? { from: copyAccount(tx.from) } : {}),
    ...(tx.to !== undefined ? { to: copyAccount(tx.to) } : {}),
    amount: tx.amount.toString(),
    ...(tx.fee !== undefined ? { fee: tx.fee.toString() } : {}),
    ...(tx.memo !== undefined ? { memo: tx.memo } : {}),
    ...(tx.createdAtTime !== undefined ? { createdAtTime: tx.createdAtTime } : {}),
    timestamp: tx.timestamp,
  };
}

/**
 * Decode a wire-form transaction.
 *
 * @throws {TypeError} if the value is not a well-formed TransactionJson
 */
export function transactionFromJson(value: unknown): Transaction {
  if (!isTransactionJson(value)) {
    throw new TypeError("Malformed transaction record");
  }

  return {
    index: value.index,
    kind: value.kind,
    ...(value.from !== undefined ? { from: copyAccount(value.from) } : {}),
    ...(value.to !== undefined ? { to: copyAccount(value.to) } : {}),
    amount: BigInt(value.amount),
    ...(value.fee !== undefined ? { fee: BigInt(value.fee) } : {}),
    ...(value.memo !== undefined ? { memo: value.memo } : {}),
    ...(value.createdAtTime !== undefined ? { createdAtTime: value.createdAtTime } : {}),
    timestamp: value.timestamp,
  };
}
