/**
 * @tokenledger/ledger — Request classification.
 *
 * A request's kind follows from where it touches the minting account:
 * out of it is a mint, into it is a burn, anything else a transfer.
 */

import type {
  Account,
  Principal,
  TransactionKind,
  TransferArgs,
} from "@tokenledger/types";
import { accountsEqual } from "./accounts.js";
import type { TransactionRequest } from "./types.js";

/**
 * The caller's own account selected by `fromSubaccount`.
 */
export function callerAccount(caller: Principal, fromSubaccount?: string): Account {
  return fromSubaccount === undefined
    ? { owner: caller }
    : { owner: caller, subaccount: fromSubaccount };
}

export function classify(
  args: TransferArgs,
  caller: Principal,
  mintingAccount: Account,
): TransactionKind {
  if (accountsEqual(callerAccount(caller, args.fromSubaccount), mintingAccount)) {
    return "mint";
  }
  if (accountsEqual(args.to, mintingAccount)) {
    return "burn";
  }
  return "transfer";
}

/**
 * Stage a caller's transfer arguments as a classified request.
 */
export function toTransactionRequest(
  args: TransferArgs,
  caller: Principal,
  mintingAccount: Account,
): TransactionRequest {
  return {
    kind: classify(args, caller, mintingAccount),
    from: callerAccount(caller, args.fromSubaccount),
    to: args.to,
    amount: args.amount,
    ...(args.fee !== undefined ? { fee: args.fee } : {}),
    ...(args.memo !== undefined ? { memo: args.memo } : {}),
    ...(args.createdAtTime !== undefined ? { createdAtTime: args.createdAtTime } : {}),
  };
}
