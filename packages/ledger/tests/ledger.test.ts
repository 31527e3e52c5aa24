/**
 * Tests for the core TokenLedger class.
 *
 * Covers:
 * - Construction and configuration errors
 * - Transfers, mints and burns with fees
 * - Rejections leave state untouched
 * - De-duplication by createdAtTime
 * - Migration into the archive at capacity
 * - Lookups and range queries across log and archive
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { Account } from "@tokenledger/types";
import { TokenLedger } from "../src/ledger.js";
import { fetchArchivedRanges } from "../src/range-resolver.js";
import type { TokenLedgerConfig } from "../src/types.js";
import { LedgerInitError, NO_INDEX } from "../src/types.js";
import { FakeProvisioner } from "./helpers.js";

// ─── Fixtures ────────────────────────────────────────────────────────────

const NOW = 1_700_000_000_000;

const ALICE: Account = { owner: "alice" };
const BOB: Account = { owner: "bob" };
const MINTER: Account = { owner: "minter" };

const CONFIG: TokenLedgerConfig = {
  id: "ledger-1",
  name: "Test Token",
  symbol: "TST",
  decimals: 2,
  fee: 10n,
  mintingAccount: MINTER,
  maxSupply: 1_000_000n,
  initialBalances: [{ account: ALICE, amount: 1_000n }],
};

let provisioner: FakeProvisioner;
let now: number;

function makeLedger(overrides: Partial<TokenLedgerConfig> = {}): TokenLedger {
  return new TokenLedger({ ...CONFIG, ...overrides }, { provisioner, clock: () => now });
}

beforeEach(() => {
  provisioner = new FakeProvisioner();
  now = NOW;
});

// ─── Construction ────────────────────────────────────────────────────────

describe("TokenLedger construction", () => {
  it("credits initial balances as minted supply without transactions", () => {
    const ledger = makeLedger();

    expect(ledger.balanceOf(ALICE)).toBe(1_000n);
    expect(ledger.totalSupply).toBe(1_000n);
    expect(ledger.totalMinted).toBe(1_000n);
    expect(ledger.totalTransactions).toBe(0);
  });

  it("describes the token", () => {
    expect(makeLedger().metadata()).toEqual({
      name: "Test Token",
      symbol: "TST",
      decimals: 2,
      fee: 10n,
      mintingAccount: MINTER,
      minBurnAmount: 10n,
      maxSupply: 1_000_000n,
      totalSupply: 1_000n,
    });
  });

  it("rejects a max supply smaller than one whole token", () => {
    expect(() => makeLedger({ maxSupply: 99n })).toThrow(LedgerInitError);
  });

  it("rejects initial balances above the max supply", () => {
    expect(() => makeLedger({ maxSupply: 500n })).toThrow(/exceed maxSupply 500/);
  });

  it("rejects an initial balance on the minting account", () => {
    expect(() =>
      makeLedger({ initialBalances: [{ account: MINTER, amount: 1n }] }),
    ).toThrow("The minting account cannot hold a balance");
  });

  it("rejects an invalid minting account", () => {
    expect(() => makeLedger({ mintingAccount: { owner: "MINTER" } })).toThrow(LedgerInitError);
  });

  it("rejects a non-positive log size", () => {
    expect(() => makeLedger({ maxLogSize: 0 })).toThrow("maxLogSize must be a positive integer, got 0");
  });
});

// ─── Transfers ───────────────────────────────────────────────────────────

describe("TokenLedger transfers", () => {
  let ledger: TokenLedger;

  beforeEach(() => {
    ledger = makeLedger();
  });

  it("moves tokens, burns the fee and records the transaction", async () => {
    const result = await ledger.transfer({ to: BOB, amount: 200n }, "alice");

    expect(result).toEqual({ ok: true, index: 0 });
    expect(ledger.balanceOf(ALICE)).toBe(790n);
    expect(ledger.balanceOf(BOB)).toBe(200n);
    expect(ledger.totalSupply).toBe(990n);
    expect(await ledger.getTransaction(0)).toEqual({
      index: 0,
      kind: "transfer",
      from: ALICE,
      to: BOB,
      amount: 200n,
      fee: 10n,
      timestamp: NOW,
    });
  });

  it("assigns consecutive indices", async () => {
    await ledger.transfer({ to: BOB, amount: 1n }, "alice");
    const second = await ledger.transfer({ to: BOB, amount: 1n }, "alice");
    expect(second).toEqual({ ok: true, index: 1 });
  });

  it("rejects a transfer the sender cannot cover and changes nothing", async () => {
    const result = await ledger.transfer({ to: ALICE, amount: 1n }, "bob");

    expect(result).toEqual({ ok: false, error: { kind: "InsufficientFunds", balance: 0n } });
    expect(ledger.totalTransactions).toBe(0);
    expect(ledger.balanceOf(ALICE)).toBe(1_000n);
  });

  it("rejects a wrong fee", async () => {
    const result = await ledger.transfer({ to: BOB, amount: 1n, fee: 1n }, "alice");
    expect(result).toEqual({ ok: false, error: { kind: "BadFee", expectedFee: 10n } });
  });

  it("rejects a duplicate inside the window", async () => {
    const args = { to: BOB, amount: 50n, createdAtTime: NOW - 1_000 };
    await ledger.transfer(args, "alice");

    now = NOW + 60_000;
    const result = await ledger.transfer(args, "alice");

    expect(result).toEqual({ ok: false, error: { kind: "Duplicate", duplicateOf: 0 } });
    expect(ledger.balanceOf(ALICE)).toBe(940n);
  });

  it("accepts the same arguments again without createdAtTime", async () => {
    await ledger.transfer({ to: BOB, amount: 50n }, "alice");
    const result = await ledger.transfer({ to: BOB, amount: 50n }, "alice");
    expect(result).toEqual({ ok: true, index: 1 });
  });
});

// ─── Mint and burn ───────────────────────────────────────────────────────

describe("TokenLedger mint and burn", () => {
  let ledger: TokenLedger;

  beforeEach(() => {
    ledger = makeLedger();
  });

  it("mints without a fee", async () => {
    const result = await ledger.mint({ to: BOB, amount: 500n }, "minter");

    expect(result).toEqual({ ok: true, index: 0 });
    expect(ledger.balanceOf(BOB)).toBe(500n);
    expect(ledger.totalMinted).toBe(1_500n);
    expect(await ledger.getTransaction(0)).toEqual({
      index: 0,
      kind: "mint",
      to: BOB,
      amount: 500n,
      timestamp: NOW,
    });
  });

  it("refuses to mint for anyone but the minting owner", async () => {
    const result = await ledger.mint({ to: BOB, amount: 500n }, "alice");

    expect(result).toEqual({
      ok: false,
      error: { kind: "Unauthorized", message: '"alice" may not mint' },
    });
    expect(ledger.totalSupply).toBe(1_000n);
  });

  it("refuses to mint past the max supply", async () => {
    const result = await ledger.mint({ to: BOB, amount: 999_001n }, "minter");
    expect(!result.ok && result.error.kind).toBe("GenericError");
  });

  it("burns from the caller", async () => {
    const result = await ledger.burn({ amount: 100n }, "alice");

    expect(result).toEqual({ ok: true, index: 0 });
    expect(ledger.balanceOf(ALICE)).toBe(900n);
    expect(ledger.totalBurned).toBe(100n);
    expect((await ledger.getTransaction(0))?.kind).toBe("burn");
  });

  it("treats a transfer to the minting account as a burn", async () => {
    await ledger.transfer({ to: MINTER, amount: 100n }, "alice");
    expect(ledger.balanceOf(ALICE)).toBe(900n);
    expect(ledger.balanceOf(MINTER)).toBe(0n);
  });

  it("rejects a burn below the minimum and changes nothing", async () => {
    const result = await ledger.burn({ amount: 5n }, "alice");

    expect(result).toEqual({ ok: false, error: { kind: "BadBurn", minBurnAmount: 10n } });
    expect(ledger.balanceOf(ALICE)).toBe(1_000n);
    expect(ledger.totalTransactions).toBe(0);
  });
});

// ─── Archive ─────────────────────────────────────────────────────────────

describe("TokenLedger archive migration", () => {
  it("migrates the full log on the 2000th commit, before the 2001st is written", async () => {
    // Migration runs after the commit that brings the log to capacity, so
    // the commit that follows it already lands in an empty log.
    const ledger = makeLedger();

    for (let i = 0; i < 1_999; i++) {
      await ledger.mint({ to: BOB, amount: 1n }, "minter");
    }
    expect(ledger.logSize).toBe(1_999);
    expect(provisioner.requests).toHaveLength(0);

    await ledger.mint({ to: BOB, amount: 1n }, "minter");

    expect(ledger.logSize).toBe(0);
    expect(ledger.archiveStatus().storedTxs).toBe(2_000);
    expect(provisioner.requests).toEqual([{ ledgerId: "ledger-1", cost: 100_000_000_000n }]);
    expect((await ledger.getTransaction(0))?.index).toBe(0);
    expect(await ledger.transfer({ to: ALICE, amount: 1n }, "bob")).toEqual({ ok: true, index: 2_000 });
    expect(ledger.logSize).toBe(1);
  });

  it("keeps committing while migration fails", async () => {
    const ledger = makeLedger({ maxLogSize: 2 });
    provisioner.archive.failNext("throw");

    await ledger.transfer({ to: BOB, amount: 1n }, "alice");
    await ledger.transfer({ to: BOB, amount: 1n }, "alice");
    const third = await ledger.transfer({ to: BOB, amount: 1n }, "alice");

    expect(third).toEqual({ ok: true, index: 2 });
    expect(ledger.logSize).toBe(3);
    expect(ledger.archiveStatus().consecutiveFailures).toBe(1);

    expect(await ledger.flushArchive()).toEqual({ status: "committed", count: 3, storedTxs: 3 });
    expect(ledger.totalTransactions).toBe(3);
  });

  it("answers range queries across the archive and the log", async () => {
    const ledger = makeLedger({ maxLogSize: 3 });
    for (let i = 0; i < 5; i++) {
      await ledger.transfer({ to: BOB, amount: 1n }, "alice");
    }

    const result = ledger.getTransactions(1, 10);

    expect(result.logLength).toBe(5);
    expect(result.length).toBe(4);
    expect(result.firstIndex).toBe(1);
    expect(result.archivedTransactions).toEqual([{ start: 1, length: 2 }]);
    expect(result.transactions.map((tx) => tx.index)).toEqual([3, 4]);

    const endpoint = ledger.archiveEndpoint();
    expect(endpoint).toBeDefined();
    if (endpoint !== undefined) {
      const archived = await fetchArchivedRanges(endpoint, result.archivedTransactions);
      expect(archived.map((tx) => tx.index)).toEqual([1, 2]);
    }
  });

  it("returns an empty range past the end", () => {
    const result = makeLedger().getTransactions(0, 10);
    expect(result.firstIndex).toBe(NO_INDEX);
    expect(result.length).toBe(0);
  });

  it("returns undefined for an index never assigned", async () => {
    expect(await makeLedger().getTransaction(5)).toBeUndefined();
  });

  it("flushes on request below capacity", async () => {
    const ledger = makeLedger();
    await ledger.transfer({ to: BOB, amount: 1n }, "alice");

    expect(await ledger.flushArchive()).toEqual({ status: "committed", count: 1, storedTxs: 1 });
    expect(ledger.archiveStatus()).toEqual({
      binding: "bound",
      archiveId: "fake-archive",
      storedTxs: 1,
      logSize: 0,
      state: "idle",
      consecutiveFailures: 0,
    });
  });
});
