/**
 * @tokenledger/ledger — Core TokenLedger class.
 *
 * A fungible-token ledger whose history overflows into an archive.
 *
 * API surface:
 * - transfer() / mint() / burn() — The only write operations
 * - balanceOf(), totalSupply, totalTransactions — Synchronous reads
 * - getTransactions() — Range query across log and archive
 * - getTransaction() — Single lookup, routed to the archive when needed
 * - metadata(), archiveStatus() — Descriptors
 * - flushArchive() — Operator-triggered migration
 *
 * A write validates, mutates balances and appends to the log in one
 * synchronous step, then awaits the archive migration hook. Migration
 * failures never turn a committed write into an error.
 */

import pino from "pino";
import type { Logger } from "pino";
import type {
  Account,
  ArchiveEndpoint,
  BurnArgs,
  MintArgs,
  Principal,
  Transaction,
  TransferArgs,
  TransferResult,
} from "@tokenledger/types";
import { MAX_TRANSACTIONS_PER_REQUEST } from "@tokenledger/types";
import { encodeAccount, isValidAccount, normalizeAccount } from "./accounts.js";
import { ArchiveCoordinator, ArchiveReference } from "./archive-coordinator.js";
import type { ArchiveStatus, MigrationOutcome } from "./archive-coordinator.js";
import { DEFAULT_BACKOFF_CONFIG, MigrationBackoff } from "./backoff.js";
import { BalanceStore } from "./balance-store.js";
import { toTransactionRequest } from "./classifier.js";
import { DedupIndex } from "./dedup.js";
import { resolveRange } from "./range-resolver.js";
import { TransactionLog } from "./transaction-log.js";
import type {
  GetTransactionsResponse,
  LedgerMetadata,
  LedgerPolicy,
  TokenLedgerConfig,
  TokenLedgerDeps,
  TransactionDraft,
  TransactionRequest,
  ValidatedRequest,
} from "./types.js";
import {
  DEFAULT_ARCHIVE_CREATION_COST,
  DEFAULT_MAX_LOG_SIZE,
  DEFAULT_PERMITTED_DRIFT_MS,
  DEFAULT_TRANSACTION_WINDOW_MS,
  LedgerError,
  LedgerInitError,
} from "./types.js";
import { validate } from "./validator.js";

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new LedgerInitError(`${name} must be a positive integer, got ${value}`);
  }
}

/**
 * Fungible-token ledger with a bounded live log and an archive.
 *
 * Each instance owns all of its state; independent instances never share
 * balances, logs or archives.
 */
export class TokenLedger {
  readonly id: string;

  private readonly _config: TokenLedgerConfig;
  private readonly _policy: LedgerPolicy;
  private readonly _maxQueryLength: number;
  private readonly _balances: BalanceStore = new BalanceStore();
  private readonly _dedup: DedupIndex = new DedupIndex();
  private readonly _archive: ArchiveReference = new ArchiveReference();
  private readonly _log: TransactionLog;
  private readonly _coordinator: ArchiveCoordinator;
  private readonly _clock: () => number;
  private readonly _logger: Logger;

  /**
   * @throws {LedgerInitError} if the configuration cannot produce a
   *   consistent ledger
   */
  constructor(config: TokenLedgerConfig, deps: TokenLedgerDeps) {
    this.id = config.id ?? "ledger";
    this._config = config;
    this._clock = deps.clock ?? Date.now;
    this._logger = (deps.logger ?? pino({ level: "silent" })).child({ ledgerId: this.id });

    if (!isValidAccount(config.mintingAccount)) {
      throw new LedgerInitError(`Invalid minting account: "${config.mintingAccount.owner}"`);
    }
    if (!Number.isSafeInteger(config.decimals) || config.decimals < 0) {
      throw new LedgerInitError(`decimals must be a non-negative integer, got ${config.decimals}`);
    }
    const baseUnit = 10n ** BigInt(config.decimals);
    if (config.maxSupply < baseUnit) {
      throw new LedgerInitError(
        `maxSupply ${config.maxSupply.toString()} is smaller than one token (${baseUnit.toString()} base units)`,
      );
    }
    if (config.fee < 0n) {
      throw new LedgerInitError("fee must be non-negative");
    }
    const minBurnAmount = config.minBurnAmount ?? config.fee;
    if (minBurnAmount < 0n) {
      throw new LedgerInitError("minBurnAmount must be non-negative");
    }

    const maxLogSize = config.maxLogSize ?? DEFAULT_MAX_LOG_SIZE;
    assertPositiveInteger("maxLogSize", maxLogSize);
    this._maxQueryLength = config.maxQueryLength ?? MAX_TRANSACTIONS_PER_REQUEST;
    assertPositiveInteger("maxQueryLength", this._maxQueryLength);

    this._policy = {
      fee: config.fee,
      mintingAccount: normalizeAccount(config.mintingAccount),
      minBurnAmount,
      maxSupply: config.maxSupply,
      transactionWindowMs: config.transactionWindowMs ?? DEFAULT_TRANSACTION_WINDOW_MS,
      permittedDriftMs: config.permittedDriftMs ?? DEFAULT_PERMITTED_DRIFT_MS,
    };

    this._seedInitialBalances();

    this._log = new TransactionLog({
      capacity: maxLogSize,
      storedCount: () => this._archive.storedTxs,
    });

    this._coordinator = new ArchiveCoordinator({
      ledgerId: this.id,
      log: this._log,
      archive: this._archive,
      provisioner: deps.provisioner,
      creationCost: config.archiveCreationCost ?? DEFAULT_ARCHIVE_CREATION_COST,
      backoff: new MigrationBackoff(
        { ...DEFAULT_BACKOFF_CONFIG, ...config.backoff },
        deps.random ?? Math.random,
      ),
      clock: this._clock,
      logger: this._logger,
    });
  }

  /**
   * Credit initial balances as minted supply. They are not transactions.
   */
  private _seedInitialBalances(): void {
    const mintingKey = encodeAccount(this._policy.mintingAccount);
    let total = 0n;

    for (const { account, amount } of this._config.initialBalances ?? []) {
      if (!isValidAccount(account)) {
        throw new LedgerInitError(`Invalid initial balance account: "${account.owner}"`);
      }
      const key = encodeAccount(account);
      if (key === mintingKey) {
        throw new LedgerInitError("The minting account cannot hold a balance");
      }
      if (amount < 0n) {
        throw new LedgerInitError(`Initial balance for "${key}" is negative`);
      }
      total += amount;
      if (total > this._policy.maxSupply) {
        throw new LedgerInitError(
          `Initial balances exceed maxSupply ${this._policy.maxSupply.toString()}`,
        );
      }
      this._balances.mint(key, amount);
    }
  }

  // ─── Writes ──────────────────────────────────────────────────────────

  /**
   * Transfer from the caller's account. Transfers out of the minting
   * account mint; transfers into it burn.
   */
  async transfer(args: TransferArgs, caller: Principal): Promise<TransferResult> {
    const request = toTransactionRequest(args, caller, this._policy.mintingAccount);
    const result = this._commit(request);
    if (result.ok) {
      await this._coordinator.afterCommit();
    }
    return result;
  }

  /**
   * Mint to `args.to`. Only the owner of the minting account may mint.
   */
  async mint(args: MintArgs, caller: Principal): Promise<TransferResult> {
    const minting = this._policy.mintingAccount;
    if (caller !== minting.owner) {
      return {
        ok: false,
        error: { kind: "Unauthorized", message: `"${caller}" may not mint` },
      };
    }
    return this.transfer(
      {
        ...(minting.subaccount !== undefined ? { fromSubaccount: minting.subaccount } : {}),
        to: args.to,
        amount: args.amount,
        ...(args.memo !== undefined ? { memo: args.memo } : {}),
        ...(args.createdAtTime !== undefined ? { createdAtTime: args.createdAtTime } : {}),
      },
      caller,
    );
  }

  /**
   * Burn from the caller's account by sending to the minting account.
   */
  async burn(args: BurnArgs, caller: Principal): Promise<TransferResult> {
    return this.transfer({ ...args, to: this._policy.mintingAccount }, caller);
  }

  /**
   * Validate and apply a request. Synchronous, so no other operation can
   * observe a partially applied request.
   */
  private _commit(request: TransactionRequest): TransferResult {
    const now = this._clock();
    this._dedup.prune(now - this._policy.transactionWindowMs - this._policy.permittedDriftMs);

    const validation = validate(request, {
      balances: this._balances,
      dedup: this._dedup,
      policy: this._policy,
      now,
    });
    if (!validation.ok) {
      this._logger.debug({ kind: request.kind, error: validation.error.kind }, "Request rejected");
      return validation;
    }

    const validated = validation.request;
    switch (validated.kind) {
      case "mint":
        this._balances.mint(validated.toKey, validated.amount);
        break;
      case "burn":
        this._balances.burn(validated.fromKey, validated.amount);
        break;
      case "transfer":
        this._balances.transfer(validated.fromKey, validated.toKey, validated.amount, validated.fee);
        break;
    }

    const index = this._log.append(toDraft(validated, now));
    if (validated.dedupKey !== undefined && validated.createdAtTime !== undefined) {
      this._dedup.record(validated.dedupKey, index, validated.createdAtTime);
    }
    return { ok: true, index };
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  balanceOf(account: Account): bigint {
    return this._balances.balanceOf(encodeAccount(account));
  }

  get totalSupply(): bigint {
    return this._balances.totalSupply;
  }

  get totalMinted(): bigint {
    return this._balances.totalMinted;
  }

  get totalBurned(): bigint {
    return this._balances.totalBurned;
  }

  /** Transactions ever committed: archived plus live. */
  get totalTransactions(): number {
    return this._archive.storedTxs + this._log.size();
  }

  get fee(): bigint {
    return this._policy.fee;
  }

  get mintingAccount(): Account {
    return this._policy.mintingAccount;
  }

  /** Number of transactions still held by the live log. */
  get logSize(): number {
    return this._log.size();
  }

  metadata(): LedgerMetadata {
    return {
      name: this._config.name,
      symbol: this._config.symbol,
      decimals: this._config.decimals,
      fee: this._policy.fee,
      mintingAccount: this._policy.mintingAccount,
      minBurnAmount: this._policy.minBurnAmount,
      maxSupply: this._policy.maxSupply,
      totalSupply: this.totalSupply,
    };
  }

  /**
   * Transactions [start, start + length): live ones inline, archived ones
   * as descriptors to fetch from `archiveEndpoint()`.
   *
   * @throws {LedgerError} INVALID_RANGE on negative or fractional bounds
   */
  getTransactions(start: number, length: number): GetTransactionsResponse {
    return resolveRange(start, length, this._archive.storedTxs, this._log, this._maxQueryLength);
  }

  /**
   * Look up one transaction wherever it lives.
   */
  async getTransaction(index: number): Promise<Transaction | undefined> {
    if (!Number.isSafeInteger(index) || index < 0) {
      return undefined;
    }
    if (index < this._archive.storedTxs) {
      const binding = this._archive.binding;
      if (binding.status !== "bound") {
        throw new LedgerError("ARCHIVE_UNAVAILABLE", `Transaction ${index} is archived but no archive is bound`);
      }
      return binding.endpoint.getTransaction(index);
    }
    return this._log.get(index);
  }

  /** The bound archive, if one has been provisioned. */
  archiveEndpoint(): ArchiveEndpoint | undefined {
    const binding = this._archive.binding;
    return binding.status === "bound" ? binding.endpoint : undefined;
  }

  archiveStatus(): ArchiveStatus {
    return this._coordinator.status();
  }

  /**
   * Migrate the live log now, regardless of capacity and backoff.
   */
  flushArchive(): Promise<MigrationOutcome> {
    return this._coordinator.flush();
  }
}

function toDraft(request: ValidatedRequest, timestamp: number): TransactionDraft {
  const common = {
    amount: request.amount,
    ...(request.memo !== undefined ? { memo: request.memo } : {}),
    ...(request.createdAtTime !== undefined ? { createdAtTime: request.createdAtTime } : {}),
    timestamp,
  };

  switch (request.kind) {
    case "mint":
      return { kind: "mint", to: normalizeAccount(request.to), ...common };
    case "burn":
      return { kind: "burn", from: normalizeAccount(request.from), ...common };
    case "transfer":
      return {
        kind: "transfer",
        from: normalizeAccount(request.from),
        to: normalizeAccount(request.to),
        fee: request.fee,
        ...common,
      };
  }
}
