/**
 * @tokenledger/ledger — Archive migration.
 *
 * Moves the live log into the archive once it reaches capacity.
 *
 * Attempt lifecycle:
 *   idle → provisioning (first time only) → transmitting → committed | failed
 *
 * Provisioning and transmission suspend, so other commits may run while an
 * attempt is outstanding. The `migrating` flag is checked and set in the
 * same synchronous step, so at most one attempt is ever in flight.
 *
 * On confirmation the stored count and the log prefix move together in one
 * synchronous step. On failure nothing moves; the failure is logged and
 * the next automatic attempt waits out the backoff.
 */

import type { Logger } from "pino";
import type {
  ArchiveEndpoint,
  ArchiveProvisioner,
  Transaction,
} from "@tokenledger/types";
import type { MigrationBackoff } from "./backoff.js";
import type { TransactionLog } from "./transaction-log.js";

// ─── Archive Reference ───────────────────────────────────────────────────

/**
 * Lazily bound archive handle.
 */
export type ArchiveBinding =
  | { readonly status: "unbound" }
  | { readonly status: "bound"; readonly endpoint: ArchiveEndpoint };

/**
 * The ledger's view of its archive: the binding plus the authoritative
 * count of transactions the archive has confirmed.
 */
export class ArchiveReference {
  private _binding: ArchiveBinding = { status: "unbound" };
  private _storedTxs = 0;

  get binding(): ArchiveBinding {
    return this._binding;
  }

  get storedTxs(): number {
    return this._storedTxs;
  }

  bind(endpoint: ArchiveEndpoint): void {
    this._binding = { status: "bound", endpoint };
  }

  recordStored(count: number): void {
    this._storedTxs += count;
  }
}

// ─── Coordinator ─────────────────────────────────────────────────────────

export type MigrationState = "idle" | "migrating";

export type MigrationSkipReason = "below-capacity" | "in-flight" | "backoff" | "empty";

export type MigrationOutcome =
  | { readonly status: "skipped"; readonly reason: MigrationSkipReason }
  | { readonly status: "committed"; readonly count: number; readonly storedTxs: number }
  | {
      readonly status: "failed";
      readonly stage: "provisioning" | "transmitting";
      readonly message: string;
    };

/**
 * Snapshot of the archive side of a ledger.
 */
export interface ArchiveStatus {
  readonly binding: ArchiveBinding["status"];
  readonly archiveId?: string | undefined;
  readonly storedTxs: number;
  readonly logSize: number;
  readonly state: MigrationState;
  readonly consecutiveFailures: number;
  readonly nextAttemptAt?: number | undefined;
}

export interface ArchiveCoordinatorOptions {
  /** Identity presented to the archive on append */
  readonly ledgerId: string;
  readonly log: TransactionLog;
  readonly archive: ArchiveReference;
  readonly provisioner: ArchiveProvisioner;
  readonly creationCost: bigint;
  readonly backoff: MigrationBackoff;
  readonly clock: () => number;
  readonly logger: Logger;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class ArchiveCoordinator {
  private readonly _options: ArchiveCoordinatorOptions;
  private readonly _logger: Logger;
  private _state: MigrationState = "idle";

  constructor(options: ArchiveCoordinatorOptions) {
    this._options = options;
    this._logger = options.logger.child({ component: "archive-coordinator" });
  }

  get state(): MigrationState {
    return this._state;
  }

  /**
   * Post-commit hook. Starts a migration when the log is at capacity,
   * none is in flight and the backoff allows it.
   */
  afterCommit(): Promise<MigrationOutcome> {
    const { log, backoff, clock } = this._options;

    if (!log.isFull()) {
      return Promise.resolve(skipped("below-capacity"));
    }
    if (this._state === "migrating") {
      this._logger.debug({ logSize: log.size() }, "Migration already in flight");
      return Promise.resolve(skipped("in-flight"));
    }
    if (!backoff.canAttempt(clock())) {
      this._logger.debug(
        { logSize: log.size(), nextAttemptAt: backoff.nextAttemptAt },
        "Migration deferred by backoff",
      );
      return Promise.resolve(skipped("backoff"));
    }

    this._state = "migrating";
    return this._migrate();
  }

  /**
   * Operator hook: migrate whatever the log holds now, ignoring capacity
   * and backoff. Still never runs two attempts at once.
   */
  flush(): Promise<MigrationOutcome> {
    if (this._options.log.size() === 0) {
      return Promise.resolve(skipped("empty"));
    }
    if (this._state === "migrating") {
      return Promise.resolve(skipped("in-flight"));
    }

    this._state = "migrating";
    return this._migrate();
  }

  status(): ArchiveStatus {
    const { archive, log, backoff } = this._options;
    const binding = archive.binding;
    return {
      binding: binding.status,
      ...(binding.status === "bound" ? { archiveId: binding.endpoint.id } : {}),
      storedTxs: archive.storedTxs,
      logSize: log.size(),
      state: this._state,
      consecutiveFailures: backoff.consecutiveFailures,
      ...(backoff.nextAttemptAt !== undefined ? { nextAttemptAt: backoff.nextAttemptAt } : {}),
    };
  }

  // ─── Attempt ─────────────────────────────────────────────────────────

  private async _migrate(): Promise<MigrationOutcome> {
    try {
      let endpoint: ArchiveEndpoint;
      try {
        endpoint = await this._ensureBound();
      } catch (err: unknown) {
        return this._fail("provisioning", describeError(err));
      }

      const batch = this._options.log.entries();
      if (batch.length === 0) {
        return skipped("empty");
      }

      let message: string | undefined;
      try {
        const result = await endpoint.append(this._options.ledgerId, batch);
        if (!result.ok) {
          message = `${result.error.kind}: ${result.error.message}`;
        }
      } catch (err: unknown) {
        message = describeError(err);
      }

      if (message !== undefined) {
        return this._fail("transmitting", message);
      }
      return this._commit(batch);
    } finally {
      this._state = "idle";
    }
  }

  private async _ensureBound(): Promise<ArchiveEndpoint> {
    const { archive, provisioner, ledgerId, creationCost } = this._options;
    const binding = archive.binding;
    if (binding.status === "bound") {
      return binding.endpoint;
    }

    this._logger.info({ ledgerId, cost: creationCost.toString() }, "Provisioning archive");
    const endpoint = await provisioner.provision({ ledgerId, cost: creationCost });
    archive.bind(endpoint);
    this._logger.info({ archiveId: endpoint.id }, "Archive bound");
    return endpoint;
  }

  /** Advance the stored count and drop the migrated prefix together. */
  private _commit(batch: readonly Transaction[]): MigrationOutcome {
    const { archive, log, backoff } = this._options;

    archive.recordStored(batch.length);
    log.clear(batch.length);
    backoff.recordSuccess();

    this._logger.info(
      { count: batch.length, storedTxs: archive.storedTxs, logSize: log.size() },
      "Archive migration committed",
    );
    return { status: "committed", count: batch.length, storedTxs: archive.storedTxs };
  }

  private _fail(stage: "provisioning" | "transmitting", message: string): MigrationOutcome {
    const { backoff, clock, log } = this._options;
    const record = backoff.recordFailure(clock());

    this._logger.error(
      {
        stage,
        failures: record.failures,
        retryInMs: record.delayMs,
        logSize: log.size(),
        reason: message,
      },
      "Archive migration failed",
    );
    if (record.alert) {
      this._logger.fatal(
        { failures: record.failures, logSize: log.size() },
        "Archive migration keeps failing; live log is growing past capacity",
      );
    }
    return { status: "failed", stage, message };
  }
}

function skipped(reason: MigrationSkipReason): MigrationOutcome {
  return { status: "skipped", reason };
}
