/**
 * Account Types
 *
 * An account is an owner identity plus an optional 32-byte subaccount.
 * Two accounts are the same account when their encoded keys are equal;
 * an absent subaccount and the all-zero subaccount are interchangeable.
 */

/**
 * A token account.
 */
export interface Account {
  /** Owner identity, lowercase `[a-z0-9-]`, 1..63 characters */
  readonly owner: string;

  /** Optional subaccount as 64 lowercase hex characters (32 bytes) */
  readonly subaccount?: string | undefined;
}

/**
 * Canonical, comparable form of an Account.
 *
 * `owner` for the default subaccount, `owner.<hex>` otherwise.
 */
export type EncodedAccount = string;

/**
 * The identity issuing a request (the owner half of an Account).
 */
export type Principal = string;
