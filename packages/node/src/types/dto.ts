/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Each request DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query validation.
 *
 * Amounts cross the wire as decimal strings of base units; the schemas
 * turn them into bigint and the response helpers turn them back.
 */

import { z } from "zod";
import type { Account, Transaction, TransactionJson, TransferError } from "@tokenledger/types";
import { MAX_TRANSACTIONS_PER_REQUEST, transactionToJson } from "@tokenledger/types";
import type { GetTransactionsResponse, LedgerMetadata } from "@tokenledger/ledger";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AmountSchema = z
  .string()
  .regex(/^\d+$/, "Amount must be a non-negative integer string of base units")
  .transform((value) => BigInt(value));

export const AccountSchema = z.object({
  owner: z.string().min(1),
  subaccount: z.string().optional(),
});

const MemoSchema = z.string().max(64);

const CreatedAtTimeSchema = z.number().int().min(0);

// =============================================================================
// Write DTOs
// =============================================================================

export const TransferSchema = z.object({
  fromSubaccount: z.string().optional(),
  to: AccountSchema,
  amount: AmountSchema,
  fee: AmountSchema.optional(),
  memo: MemoSchema.optional(),
  createdAtTime: CreatedAtTimeSchema.optional(),
});

export type TransferDto = z.infer<typeof TransferSchema>;

export const MintSchema = z.object({
  to: AccountSchema,
  amount: AmountSchema,
  memo: MemoSchema.optional(),
  createdAtTime: CreatedAtTimeSchema.optional(),
});

export type MintDto = z.infer<typeof MintSchema>;

export const BurnSchema = z.object({
  fromSubaccount: z.string().optional(),
  amount: AmountSchema,
  memo: MemoSchema.optional(),
  createdAtTime: CreatedAtTimeSchema.optional(),
});

export type BurnDto = z.infer<typeof BurnSchema>;

// =============================================================================
// Query DTOs
// =============================================================================

export const RangeQuerySchema = z.object({
  start: z.coerce.number().int().min(0).default(0),
  length: z.coerce.number().int().min(0).default(100),
});

export type RangeQuery = z.infer<typeof RangeQuerySchema>;

export const ArchiveRangeQuerySchema = z.object({
  start: z.coerce.number().int().min(0).default(0),
  length: z.coerce.number().int().min(0).max(MAX_TRANSACTIONS_PER_REQUEST).default(100),
});

export type ArchiveRangeQuery = z.infer<typeof ArchiveRangeQuerySchema>;

export const TransactionIndexSchema = z.coerce.number().int().min(0);

// =============================================================================
// Response DTOs
// =============================================================================

export interface MetadataDto {
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
  readonly fee: string;
  readonly mintingAccount: Account;
  readonly minBurnAmount: string;
  readonly maxSupply: string;
  readonly totalSupply: string;
}

export function toMetadataDto(metadata: LedgerMetadata): MetadataDto {
  return {
    name: metadata.name,
    symbol: metadata.symbol,
    decimals: metadata.decimals,
    fee: metadata.fee.toString(),
    mintingAccount: metadata.mintingAccount,
    minBurnAmount: metadata.minBurnAmount.toString(),
    maxSupply: metadata.maxSupply.toString(),
    totalSupply: metadata.totalSupply.toString(),
  };
}

export interface TransactionsDto {
  readonly logLength: number;
  readonly length: number;
  readonly firstIndex: number;
  readonly transactions: readonly TransactionJson[];
  readonly archivedTransactions: GetTransactionsResponse["archivedTransactions"];
}

export function toTransactionsDto(response: GetTransactionsResponse): TransactionsDto {
  return {
    logLength: response.logLength,
    length: response.length,
    firstIndex: response.firstIndex,
    transactions: response.transactions.map(transactionToJson),
    archivedTransactions: response.archivedTransactions,
  };
}

export function toTransactionDtos(transactions: readonly Transaction[]): readonly TransactionJson[] {
  return transactions.map(transactionToJson);
}

/**
 * Make a transfer rejection JSON-safe: bigint fields become strings.
 */
export function transferErrorDetails(error: TransferError): Record<string, unknown> {
  switch (error.kind) {
    case "BadFee":
      return { expectedFee: error.expectedFee.toString() };
    case "BadBurn":
      return { minBurnAmount: error.minBurnAmount.toString() };
    case "InsufficientFunds":
      return { balance: error.balance.toString() };
    case "CreatedInFuture":
      return { ledgerTime: error.ledgerTime };
    case "Duplicate":
      return { duplicateOf: error.duplicateOf };
    case "GenericError":
      return { errorCode: error.errorCode };
    case "TooOld":
    case "Unauthorized":
      return {};
  }
}

/**
 * Human-readable message for a transfer rejection.
 */
export function transferErrorMessage(error: TransferError): string {
  switch (error.kind) {
    case "BadFee":
      return `Expected fee ${error.expectedFee.toString()}`;
    case "BadBurn":
      return `Burn amount must be at least ${error.minBurnAmount.toString()}`;
    case "InsufficientFunds":
      return `Insufficient funds: balance is ${error.balance.toString()}`;
    case "TooOld":
      return "Request is older than the transaction window";
    case "CreatedInFuture":
      return "Request was created in the future";
    case "Duplicate":
      return `Duplicate of transaction ${error.duplicateOf}`;
    case "Unauthorized":
    case "GenericError":
      return error.message;
  }
}
