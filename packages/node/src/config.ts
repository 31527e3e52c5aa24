/**
 * @tokenledger/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * Token amounts are decimal strings of base units and load as bigint.
 */

import { z } from "zod";
import type { Logger } from "pino";
import { decodeAccount } from "@tokenledger/ledger";
import { isOwner } from "@tokenledger/types";
import type { InitialBalance } from "@tokenledger/ledger";
import type { ApiKeyRecord, Role } from "./types/auth.js";
import { isRole } from "./types/auth.js";
import type { LedgerServiceConfig } from "./services/ledger-service.js";

// =============================================================================
// Schema
// =============================================================================

const TokenAmount = z
  .string()
  .regex(/^\d+$/, "must be a non-negative integer of base units")
  .transform((value) => BigInt(value));

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Auth
  API_KEYS: z.string().default(""),
  JWT_SECRET: z.string().optional(),
  JWT_ISSUER: z.string().default("tokenledger"),

  // Token
  LEDGER_ID: z.string().min(1).default("ledger"),
  TOKEN_NAME: z.string().min(1).default("Ledger Token"),
  TOKEN_SYMBOL: z.string().min(1).default("LTK"),
  TOKEN_DECIMALS: z.coerce.number().int().min(0).max(18).default(8),
  TRANSFER_FEE: TokenAmount.default("10000"),
  MINTING_ACCOUNT: z.string().default("minter"),
  MIN_BURN_AMOUNT: TokenAmount.optional(),
  MAX_SUPPLY: TokenAmount.default("2100000000000000"),
  INITIAL_BALANCES: z.string().default(""),

  // Policy
  TRANSACTION_WINDOW_MS: z.coerce.number().int().min(1).default(86_400_000),
  PERMITTED_DRIFT_MS: z.coerce.number().int().min(0).default(60_000),
  MAX_LOG_SIZE: z.coerce.number().int().min(1).default(2000),
  MAX_QUERY_LENGTH: z.coerce.number().int().min(1).default(5000),

  // Archive
  ARCHIVE_DIR: z.string().optional(),
  ARCHIVE_CREATION_COST: TokenAmount.default("100000000000"),
  PROVISIONING_BUDGET: TokenAmount.default("1000000000000"),
  MIGRATION_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  MIGRATION_MAX_DELAY_MS: z.coerce.number().int().min(0).default(300_000),
  MIGRATION_ALERT_AFTER: z.coerce.number().int().min(1).default(5),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly role: Role;
  readonly principal: string;
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:role1:principal1,key2:role2:principal2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [key, role, principal] = parts;
    if (parts.length !== 3 || key === undefined || role === undefined || principal === undefined) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:role:principal`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (!isRole(role)) {
      throw new Error(
        `Invalid role "${role}" in API_KEYS. Must be: admin, operator, or viewer`,
      );
    }
    if (!isOwner(principal)) {
      throw new Error(`Invalid principal "${principal}" in API_KEYS`);
    }

    keys.push({ key, role, principal });
  }

  return keys;
}

export function toApiKeyMap(keys: readonly ParsedApiKey[]): ReadonlyMap<string, ApiKeyRecord> {
  return new Map(keys.map((k) => [k.key, k]));
}

// =============================================================================
// Initial Balance Parsing
// =============================================================================

/**
 * Parse the INITIAL_BALANCES env var.
 *
 * Format: "account1=amount1,account2=amount2", accounts in their
 * encoded form (`owner` or `owner.subaccount`).
 */
export function parseInitialBalances(raw: string): readonly InitialBalance[] {
  if (raw.trim() === "") {
    return [];
  }

  return raw.split(",").map((entry) => {
    const trimmed = entry.trim();
    const at = trimmed.lastIndexOf("=");
    const amount = trimmed.slice(at + 1);
    if (at <= 0 || !/^\d+$/.test(amount)) {
      throw new Error(
        `Invalid INITIAL_BALANCES entry: "${trimmed}". Expected format: account=amount`,
      );
    }
    return { account: decodeAccount(trimmed.slice(0, at)), amount: BigInt(amount) };
  });
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

/**
 * Build the ledger service configuration.
 *
 * @throws {LedgerError} INVALID_ACCOUNT for a malformed account
 */
export function toLedgerServiceConfig(config: AppConfig, logger?: Logger): LedgerServiceConfig {
  return {
    ledger: {
      id: config.LEDGER_ID,
      name: config.TOKEN_NAME,
      symbol: config.TOKEN_SYMBOL,
      decimals: config.TOKEN_DECIMALS,
      fee: config.TRANSFER_FEE,
      mintingAccount: decodeAccount(config.MINTING_ACCOUNT),
      minBurnAmount: config.MIN_BURN_AMOUNT,
      maxSupply: config.MAX_SUPPLY,
      initialBalances: parseInitialBalances(config.INITIAL_BALANCES),
      transactionWindowMs: config.TRANSACTION_WINDOW_MS,
      permittedDriftMs: config.PERMITTED_DRIFT_MS,
      maxLogSize: config.MAX_LOG_SIZE,
      maxQueryLength: config.MAX_QUERY_LENGTH,
      archiveCreationCost: config.ARCHIVE_CREATION_COST,
      backoff: {
        baseDelayMs: config.MIGRATION_BASE_DELAY_MS,
        maxDelayMs: config.MIGRATION_MAX_DELAY_MS,
        alertAfterFailures: config.MIGRATION_ALERT_AFTER,
      },
    },
    archive: {
      directory: config.ARCHIVE_DIR,
      budget: config.PROVISIONING_BUDGET,
    },
    logger,
  };
}
