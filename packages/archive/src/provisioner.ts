/**
 * @tokenledger/archive — Archive provisioners.
 *
 * A provisioner creates a fresh archive node for a ledger and charges a
 * fixed cost against a finite budget for doing so.
 */

import { existsSync } from "node:fs";
import { join } from "node:path";
import type {
  ArchiveEndpoint,
  ArchiveProvisioner,
  ProvisionRequest,
} from "@tokenledger/types";
import { InMemoryArchive } from "./in-memory-archive.js";
import { JsonlArchive } from "./jsonl-archive.js";
import { ArchiveError } from "./types.js";

/**
 * Resource budget drawn down by provisioning.
 */
export class ProvisioningBudget {
  private _remaining: bigint;

  constructor(initial: bigint) {
    this._remaining = initial;
  }

  get remaining(): bigint {
    return this._remaining;
  }

  /**
   * @throws {ArchiveError} PROVISIONING_BUDGET_EXHAUSTED
   */
  charge(cost: bigint): void {
    if (cost < 0n) {
      throw new ArchiveError("INVALID_OPTIONS", `Provisioning cost must be non-negative, got ${cost.toString()}`);
    }
    if (cost > this._remaining) {
      throw new ArchiveError(
        "PROVISIONING_BUDGET_EXHAUSTED",
        `Provisioning costs ${cost.toString()}, only ${this._remaining.toString()} left`,
      );
    }
    this._remaining -= cost;
  }
}

export interface InMemoryProvisionerOptions {
  readonly budget: bigint;
  readonly maxMemoryBytes?: number | undefined;
}

/**
 * Provisions InMemoryArchive nodes.
 */
export class InMemoryArchiveProvisioner implements ArchiveProvisioner {
  readonly budget: ProvisioningBudget;
  private readonly _maxMemoryBytes: number | undefined;
  private readonly _provisioned: InMemoryArchive[] = [];

  constructor(options: InMemoryProvisionerOptions) {
    this.budget = new ProvisioningBudget(options.budget);
    this._maxMemoryBytes = options.maxMemoryBytes;
  }

  async provision(request: ProvisionRequest): Promise<ArchiveEndpoint> {
    this.budget.charge(request.cost);
    const archive = new InMemoryArchive({
      id: `${request.ledgerId}-archive-${this._provisioned.length}`,
      ledgerId: request.ledgerId,
      maxMemoryBytes: this._maxMemoryBytes,
    });
    this._provisioned.push(archive);
    return archive;
  }

  /** Every archive this provisioner has created. */
  get provisioned(): readonly InMemoryArchive[] {
    return [...this._provisioned];
  }
}

export interface JsonlProvisionerOptions {
  /** Directory the archive files are written to */
  readonly directory: string;
  readonly budget: bigint;
  readonly maxMemoryBytes?: number | undefined;
}

/**
 * Provisions JsonlArchive nodes, one file per ledger.
 *
 * A ledger starts with an empty history, so an archive file left by an
 * earlier run is never reused: provisioning fails with ARCHIVE_EXISTS
 * and the budget is not charged.
 */
export class JsonlArchiveProvisioner implements ArchiveProvisioner {
  readonly budget: ProvisioningBudget;
  private readonly _directory: string;
  private readonly _maxMemoryBytes: number | undefined;

  constructor(options: JsonlProvisionerOptions) {
    this.budget = new ProvisioningBudget(options.budget);
    this._directory = options.directory;
    this._maxMemoryBytes = options.maxMemoryBytes;
  }

  async provision(request: ProvisionRequest): Promise<ArchiveEndpoint> {
    const filePath = this.filePathFor(request.ledgerId);
    if (existsSync(filePath)) {
      throw new ArchiveError("ARCHIVE_EXISTS", `Archive file "${filePath}" already exists`);
    }

    this.budget.charge(request.cost);
    return new JsonlArchive({
      id: `${request.ledgerId}-archive`,
      ledgerId: request.ledgerId,
      maxMemoryBytes: this._maxMemoryBytes,
      filePath,
    });
  }

  filePathFor(ledgerId: string): string {
    return join(this._directory, `${ledgerId}-archive.jsonl`);
  }
}
