/**
 * LedgerService — Composition root for the token ledger node.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. The service owns one TokenLedger and the archive
 * provisioner behind it.
 */

import pino from "pino";
import type { Logger } from "pino";
import type {
  Account,
  ArchiveProvisioner,
  BurnArgs,
  MintArgs,
  Principal,
  Transaction,
  TransferArgs,
  TransferResult,
} from "@tokenledger/types";
import { MAX_TRANSACTIONS_PER_REQUEST } from "@tokenledger/types";
import { InMemoryArchiveProvisioner, JsonlArchiveProvisioner } from "@tokenledger/archive";
import {
  DEFAULT_BACKOFF_CONFIG,
  TokenLedger,
  decodeAccount,
  fetchArchivedRanges,
} from "@tokenledger/ledger";
import type {
  ArchiveStatus,
  GetTransactionsResponse,
  LedgerMetadata,
  MigrationOutcome,
  TokenLedgerConfig,
} from "@tokenledger/ledger";

// =============================================================================
// Configuration
// =============================================================================

export interface ArchiveServiceConfig {
  /** Write JSONL archives here; in-memory archives when absent */
  readonly directory?: string | undefined;
  /** Budget provisioning is charged against */
  readonly budget: bigint;
}

export interface LedgerServiceConfig {
  readonly ledger: TokenLedgerConfig;
  readonly archive: ArchiveServiceConfig;
  readonly logger?: Logger | undefined;
  readonly clock?: (() => number) | undefined;
}

export interface SupplySummary {
  readonly totalSupply: bigint;
  readonly totalMinted: bigint;
  readonly totalBurned: bigint;
  readonly totalTransactions: number;
}

export interface ArchivedTransactions {
  readonly start: number;
  readonly transactions: readonly Transaction[];
}

function createProvisioner(config: ArchiveServiceConfig): ArchiveProvisioner {
  if (config.directory !== undefined) {
    return new JsonlArchiveProvisioner({ directory: config.directory, budget: config.budget });
  }
  return new InMemoryArchiveProvisioner({ budget: config.budget });
}

// =============================================================================
// Service
// =============================================================================

export class LedgerService {
  readonly ledger: TokenLedger;
  private readonly _alertAfterFailures: number;

  constructor(config: LedgerServiceConfig) {
    const logger = config.logger ?? pino({ level: "silent" });
    this.ledger = new TokenLedger(config.ledger, {
      provisioner: createProvisioner(config.archive),
      logger,
      clock: config.clock,
    });
    this._alertAfterFailures =
      config.ledger.backoff?.alertAfterFailures ?? DEFAULT_BACKOFF_CONFIG.alertAfterFailures;
  }

  // ─── Writes ────────────────────────────────────────────────────────

  transfer(args: TransferArgs, caller: Principal): Promise<TransferResult> {
    return this.ledger.transfer(args, caller);
  }

  mint(args: MintArgs, caller: Principal): Promise<TransferResult> {
    return this.ledger.mint(args, caller);
  }

  burn(args: BurnArgs, caller: Principal): Promise<TransferResult> {
    return this.ledger.burn(args, caller);
  }

  // ─── Reads ─────────────────────────────────────────────────────────

  metadata(): LedgerMetadata {
    return this.ledger.metadata();
  }

  /**
   * Balance of an encoded account key.
   *
   * @throws {LedgerError} INVALID_ACCOUNT for a malformed key
   */
  balanceOf(encoded: string): { account: Account; balance: bigint } {
    const account = decodeAccount(encoded);
    return { account, balance: this.ledger.balanceOf(account) };
  }

  supply(): SupplySummary {
    return {
      totalSupply: this.ledger.totalSupply,
      totalMinted: this.ledger.totalMinted,
      totalBurned: this.ledger.totalBurned,
      totalTransactions: this.ledger.totalTransactions,
    };
  }

  getTransactions(start: number, length: number): GetTransactionsResponse {
    return this.ledger.getTransactions(start, length);
  }

  getTransaction(index: number): Promise<Transaction | undefined> {
    return this.ledger.getTransaction(index);
  }

  // ─── Archive ───────────────────────────────────────────────────────

  archiveStatus(): ArchiveStatus {
    return this.ledger.archiveStatus();
  }

  flushArchive(): Promise<MigrationOutcome> {
    return this.ledger.flushArchive();
  }

  /**
   * Archived transactions in [start, start + length), fetched through
   * the descriptors the ledger hands out.
   */
  async archivedTransactions(start: number, length: number): Promise<ArchivedTransactions> {
    const response = this.ledger.getTransactions(start, Math.min(length, MAX_TRANSACTIONS_PER_REQUEST));
    const endpoint = this.ledger.archiveEndpoint();
    if (endpoint === undefined || response.archivedTransactions.length === 0) {
      return { start, transactions: [] };
    }
    const transactions = await fetchArchivedRanges(endpoint, response.archivedTransactions);
    return { start, transactions };
  }

  // ─── Health ────────────────────────────────────────────────────────

  /**
   * Not ready once migration has failed often enough to raise the alert.
   */
  isReady(): boolean {
    return this.ledger.archiveStatus().consecutiveFailures < this._alertAfterFailures;
  }
}
