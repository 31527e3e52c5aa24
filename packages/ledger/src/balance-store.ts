/**
 * @tokenledger/ledger — Balance store.
 *
 * Holds balances by encoded account and the minted/burned counters.
 * All arithmetic is bigint.
 *
 * Invariants:
 * - Every stored balance is > 0 (zero balances are dropped)
 * - sum(balances) + totalBurned == totalMinted
 */

import type { EncodedAccount } from "@tokenledger/types";
import { LedgerError } from "./types.js";

function assertNonNegative(amount: bigint): void {
  if (amount < 0n) {
    throw new LedgerError("INVALID_AMOUNT", `Amount must be non-negative, got ${amount.toString()}`);
  }
}

/**
 * Mutable balance table.
 *
 * Every mutator checks before it writes, so a throwing call leaves the
 * store exactly as it was.
 */
export class BalanceStore {
  private readonly _balances: Map<EncodedAccount, bigint> = new Map();
  private _minted = 0n;
  private _burned = 0n;

  /**
   * Balance of an account; 0 for unknown accounts.
   */
  balanceOf(account: EncodedAccount): bigint {
    return this._balances.get(account) ?? 0n;
  }

  /**
   * Create `amount` new tokens in `to`.
   */
  mint(to: EncodedAccount, amount: bigint): void {
    assertNonNegative(amount);
    this._set(to, this.balanceOf(to) + amount);
    this._minted += amount;
  }

  /**
   * Destroy `amount` tokens held by `from`.
   *
   * @throws {LedgerError} INSUFFICIENT_BALANCE
   */
  burn(from: EncodedAccount, amount: bigint): void {
    assertNonNegative(amount);
    this._assertCovers(from, amount);
    this._set(from, this.balanceOf(from) - amount);
    this._burned += amount;
  }

  /**
   * Move `amount` from `from` to `to`, burning `fee` from the sender.
   *
   * @throws {LedgerError} INSUFFICIENT_BALANCE if `from` holds less than amount + fee
   */
  transfer(from: EncodedAccount, to: EncodedAccount, amount: bigint, fee: bigint = 0n): void {
    assertNonNegative(amount);
    assertNonNegative(fee);
    this._assertCovers(from, amount + fee);

    this._set(from, this.balanceOf(from) - amount - fee);
    this._set(to, this.balanceOf(to) + amount);
    this._burned += fee;
  }

  get totalMinted(): bigint {
    return this._minted;
  }

  get totalBurned(): bigint {
    return this._burned;
  }

  get totalSupply(): bigint {
    return this._minted - this._burned;
  }

  /** Number of accounts with a non-zero balance. */
  get holderCount(): number {
    return this._balances.size;
  }

  /**
   * All non-zero balances.
   */
  entries(): readonly (readonly [EncodedAccount, bigint])[] {
    return [...this._balances.entries()];
  }

  private _assertCovers(account: EncodedAccount, required: bigint): void {
    const balance = this.balanceOf(account);
    if (balance < required) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Account "${account}" holds ${balance.toString()}, needs ${required.toString()}`,
      );
    }
  }

  private _set(account: EncodedAccount, balance: bigint): void {
    if (balance === 0n) {
      this._balances.delete(account);
    } else {
      this._balances.set(account, balance);
    }
  }
}
