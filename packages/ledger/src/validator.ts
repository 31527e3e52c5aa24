/**
 * @tokenledger/ledger — Request validation.
 *
 * Read-only: inspects balances and the de-duplication index, never
 * mutates them. Checks run in a fixed order and the first failure wins:
 *
 * 1. Account, memo and amount shape            → GenericError
 * 2. Fee                                       → BadFee
 * 3. Balance (amount + fee for transfers)      → InsufficientFunds
 * 4. createdAtTime inside the window           → TooOld / CreatedInFuture
 * 5. Burn amount at least minBurnAmount        → BadBurn
 * 6. Mint within maxSupply                     → GenericError
 * 7. Not a duplicate of a recent request       → Duplicate
 */

import type { TransferError } from "@tokenledger/types";
import { encodeAccount, isValidAccount } from "./accounts.js";
import type { BalanceStore } from "./balance-store.js";
import type { DedupIndex } from "./dedup.js";
import { requestHash } from "./dedup.js";
import type { LedgerPolicy, TransactionRequest, ValidatedRequest } from "./types.js";
import { GENERIC_ERROR_CODES, MAX_MEMO_BYTES } from "./types.js";

const HEX_PATTERN = /^(?:[0-9a-f]{2})*$/;

/**
 * Everything validation reads.
 */
export interface ValidationContext {
  readonly balances: BalanceStore;
  readonly dedup: DedupIndex;
  readonly policy: LedgerPolicy;
  /** Ledger time in epoch milliseconds */
  readonly now: number;
}

export type ValidationResult =
  | { readonly ok: true; readonly request: ValidatedRequest }
  | { readonly ok: false; readonly error: TransferError };

function reject(error: TransferError): ValidationResult {
  return { ok: false, error };
}

function genericError(errorCode: number, message: string): ValidationResult {
  return reject({ kind: "GenericError", errorCode, message });
}

/**
 * Validate a classified request against ledger state and policy.
 */
export function validate(
  request: TransactionRequest,
  context: ValidationContext,
): ValidationResult {
  const { balances, dedup, policy, now } = context;

  // 1. Shape
  if (!isValidAccount(request.from)) {
    return genericError(GENERIC_ERROR_CODES.INVALID_ACCOUNT, `Invalid sender account: "${request.from.owner}"`);
  }
  if (!isValidAccount(request.to)) {
    return genericError(GENERIC_ERROR_CODES.INVALID_ACCOUNT, `Invalid recipient account: "${request.to.owner}"`);
  }
  if (
    request.memo !== undefined &&
    (!HEX_PATTERN.test(request.memo) || request.memo.length / 2 > MAX_MEMO_BYTES)
  ) {
    return genericError(
      GENERIC_ERROR_CODES.INVALID_MEMO,
      `Memo must be lowercase hex of at most ${MAX_MEMO_BYTES} bytes`,
    );
  }
  if (request.amount < 0n) {
    return genericError(GENERIC_ERROR_CODES.INVALID_AMOUNT, "Amount must be non-negative");
  }

  const fromKey = encodeAccount(request.from);
  const toKey = encodeAccount(request.to);
  if (fromKey === toKey) {
    return genericError(GENERIC_ERROR_CODES.SELF_TRANSFER, "Sender and recipient must differ");
  }

  // 2. Fee
  let fee = 0n;
  if (request.kind === "transfer") {
    if (request.fee !== undefined && request.fee !== policy.fee) {
      return reject({ kind: "BadFee", expectedFee: policy.fee });
    }
    fee = policy.fee;
  } else if (request.fee !== undefined && request.fee !== 0n) {
    return reject({ kind: "BadFee", expectedFee: 0n });
  }

  // 3. Balance
  if (request.kind !== "mint") {
    const balance = balances.balanceOf(fromKey);
    if (balance < request.amount + fee) {
      return reject({ kind: "InsufficientFunds", balance });
    }
  }

  // 4. Time window
  if (request.createdAtTime !== undefined) {
    if (request.createdAtTime < now - policy.transactionWindowMs - policy.permittedDriftMs) {
      return reject({ kind: "TooOld" });
    }
    if (request.createdAtTime > now + policy.permittedDriftMs) {
      return reject({ kind: "CreatedInFuture", ledgerTime: now });
    }
  }

  // 5. Burn minimum
  if (request.kind === "burn" && request.amount < policy.minBurnAmount) {
    return reject({ kind: "BadBurn", minBurnAmount: policy.minBurnAmount });
  }

  // 6. Supply cap
  if (request.kind === "mint" && balances.totalMinted + request.amount > policy.maxSupply) {
    return genericError(
      GENERIC_ERROR_CODES.MAX_SUPPLY_EXCEEDED,
      `Minting ${request.amount.toString()} would exceed the max supply of ${policy.maxSupply.toString()}`,
    );
  }

  // 7. Duplicates
  let dedupKey: string | undefined;
  if (request.createdAtTime !== undefined) {
    dedupKey = requestHash(request);
    const duplicateOf = dedup.find(dedupKey);
    if (duplicateOf !== undefined) {
      return reject({ kind: "Duplicate", duplicateOf });
    }
  }

  return {
    ok: true,
    request: {
      kind: request.kind,
      from: request.from,
      to: request.to,
      fromKey,
      toKey,
      amount: request.amount,
      fee,
      ...(request.memo !== undefined ? { memo: request.memo } : {}),
      ...(request.createdAtTime !== undefined ? { createdAtTime: request.createdAtTime } : {}),
      ...(dedupKey !== undefined ? { dedupKey } : {}),
    },
  };
}
