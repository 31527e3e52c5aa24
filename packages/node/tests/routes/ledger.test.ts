/**
 * Tests for token and account routes.
 */

import { describe, it, expect } from "vitest";
import { createTestApp, asPrincipal } from "../setup.js";

describe("GET /api/v1/metadata", () => {
  it("describes the token", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/metadata");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: unknown };
    expect(body.data).toEqual({
      name: "Test Token",
      symbol: "TST",
      decimals: 8,
      fee: "10",
      mintingAccount: { owner: "minter" },
      minBurnAmount: "10",
      maxSupply: "1000000000000",
      totalSupply: "1000",
    });
  });
});

describe("GET /api/v1/accounts/:account/balance", () => {
  it("returns the balance of a funded account", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/accounts/alice/balance");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: unknown };
    expect(body.data).toEqual({ account: "alice", balance: "1000" });
  });

  it("returns zero for an account that never held tokens", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/accounts/carol/balance");

    const body = (await res.json()) as { data: unknown };
    expect(body.data).toEqual({ account: "carol", balance: "0" });
  });

  it("answers 400 for a malformed account key", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/accounts/UPPER/balance");

    expect(res.status).toBe(400);
    const body = (await res.json()) as { error: unknown };
    expect(body.error).toEqual({
      code: "INVALID_ACCOUNT",
      message: 'Invalid account: "UPPER"',
    });
  });
});

describe("GET /api/v1/supply", () => {
  it("counts initial balances as minted", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/supply");

    const body = (await res.json()) as { data: unknown };
    expect(body.data).toEqual({
      totalSupply: "1000",
      totalMinted: "1000",
      totalBurned: "0",
      totalTransactions: 0,
    });
  });

  it("burns the fee of a transfer", async () => {
    const { app } = createTestApp();
    await app.request(
      asPrincipal("alice", "/api/v1/transfers", "POST", { to: { owner: "bob" }, amount: "100" }),
    );

    const res = await app.request("/api/v1/supply");
    const body = (await res.json()) as { data: unknown };
    expect(body.data).toEqual({
      totalSupply: "990",
      totalMinted: "1000",
      totalBurned: "10",
      totalTransactions: 1,
    });
  });
});
