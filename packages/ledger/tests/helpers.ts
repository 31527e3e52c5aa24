/**
 * Shared test doubles for the ledger package.
 */

import pino from "pino";
import type { Logger } from "pino";
import type {
  ArchiveAppendResult,
  ArchiveEndpoint,
  ArchiveProvisioner,
  ArchiveRange,
  ProvisionRequest,
  Transaction,
} from "@tokenledger/types";

// ─── Logging ─────────────────────────────────────────────────────────────

export interface LogLine {
  readonly level: number;
  readonly msg: string;
  readonly [key: string]: unknown;
}

/**
 * A logger that keeps every line it writes.
 */
export function captureLogger(): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const logger = pino(
    { level: "trace" },
    {
      write(msg: string): void {
        lines.push(JSON.parse(msg));
      },
    },
  );
  return { logger, lines };
}

/** pino numeric levels. */
export const LEVEL = { debug: 20, info: 30, error: 50, fatal: 60 } as const;

// ─── Archive ─────────────────────────────────────────────────────────────

interface Deferred<T> {
  readonly promise: Promise<T>;
  resolve(value: T): void;
}

function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/**
 * Scriptable archive.
 *
 * By default it stores every batch. `failNext` makes the next appends
 * reject or throw; `hold` parks appends until `release` is called.
 */
export class FakeArchive implements ArchiveEndpoint {
  readonly id = "fake-archive";
  readonly stored: Transaction[] = [];
  readonly batches: (readonly Transaction[])[] = [];

  private _failures: ("reject" | "throw")[] = [];
  private _held: Deferred<void>[] = [];
  private _holding = false;

  failNext(...modes: ("reject" | "throw")[]): void {
    this._failures.push(...modes);
  }

  hold(): void {
    this._holding = true;
  }

  /** Let every parked append continue. */
  release(): void {
    this._holding = false;
    const held = this._held;
    this._held = [];
    for (const gate of held) gate.resolve();
  }

  get pending(): number {
    return this._held.length;
  }

  async append(_callerId: string, batch: readonly Transaction[]): Promise<ArchiveAppendResult> {
    this.batches.push(batch);
    if (this._holding) {
      const gate = deferred<void>();
      this._held.push(gate);
      await gate.promise;
    }

    const mode = this._failures.shift();
    if (mode === "throw") {
      throw new Error("connection reset");
    }
    if (mode === "reject") {
      return { ok: false, error: { kind: "CapacityExceeded", message: "archive full" } };
    }
    this.stored.push(...batch);
    return { ok: true };
  }

  async getTransaction(index: number): Promise<Transaction | undefined> {
    return this.stored[index];
  }

  async getTransactions(start: number, length: number): Promise<ArchiveRange> {
    return { start, transactions: this.stored.slice(start, start + length) };
  }

  async totalTransactions(): Promise<number> {
    return this.stored.length;
  }

  async remainingCapacity(): Promise<number> {
    return Number.MAX_SAFE_INTEGER - this.stored.length;
  }
}

/**
 * Hands out one archive; can be told to fail.
 */
export class FakeProvisioner implements ArchiveProvisioner {
  readonly requests: ProvisionRequest[] = [];
  failuresLeft = 0;

  constructor(readonly archive: FakeArchive = new FakeArchive()) {}

  async provision(request: ProvisionRequest): Promise<ArchiveEndpoint> {
    this.requests.push(request);
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw new Error("out of cycles");
    }
    return this.archive;
  }
}

/** Let queued promise callbacks run. */
export async function settle(): Promise<void> {
  for (let i = 0; i < 20; i++) {
    await Promise.resolve();
  }
}
