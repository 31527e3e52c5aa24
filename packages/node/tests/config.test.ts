/**
 * Tests for config.ts — parsing helpers and loadConfig.
 */

import { describe, it, expect } from "vitest";
import {
  loadConfig,
  parseApiKeys,
  parseInitialBalances,
  toLedgerServiceConfig,
} from "../src/config.js";

const SUBACCOUNT = "ab".repeat(32);

// =============================================================================
// parseApiKeys
// =============================================================================

describe("parseApiKeys", () => {
  it("returns empty array for empty string", () => {
    expect(parseApiKeys("")).toEqual([]);
    expect(parseApiKeys("   ")).toEqual([]);
  });

  it("parses multiple comma-separated entries", () => {
    const keys = parseApiKeys("k1:admin:alice, k2:viewer:bob");
    expect(keys).toEqual([
      { key: "k1", role: "admin", principal: "alice" },
      { key: "k2", role: "viewer", principal: "bob" },
    ]);
  });

  it("throws on wrong number of parts", () => {
    expect(() => parseApiKeys("badentry")).toThrow("Invalid API_KEYS entry");
    expect(() => parseApiKeys("a:b:c:d")).toThrow("Invalid API_KEYS entry");
  });

  it("throws on empty key", () => {
    expect(() => parseApiKeys(":admin:alice")).toThrow("API key cannot be empty");
  });

  it("throws on invalid role", () => {
    expect(() => parseApiKeys("k1:superuser:alice")).toThrow("Invalid role");
  });

  it("throws on empty principal", () => {
    expect(() => parseApiKeys("k1:admin:")).toThrow('Invalid principal ""');
  });

  it("throws on a principal that is not a valid owner", () => {
    expect(() => parseApiKeys("k:operator:Alice")).toThrow('Invalid principal "Alice"');
  });
});

// =============================================================================
// parseInitialBalances
// =============================================================================

describe("parseInitialBalances", () => {
  it("returns empty array for empty string", () => {
    expect(parseInitialBalances("")).toEqual([]);
  });

  it("parses encoded accounts with amounts", () => {
    expect(parseInitialBalances(`alice=100,bob.${SUBACCOUNT}=5`)).toEqual([
      { account: { owner: "alice" }, amount: 100n },
      { account: { owner: "bob", subaccount: SUBACCOUNT }, amount: 5n },
    ]);
  });

  it("throws on a missing amount", () => {
    expect(() => parseInitialBalances("alice")).toThrow("Invalid INITIAL_BALANCES entry");
    expect(() => parseInitialBalances("alice=ten")).toThrow("Invalid INITIAL_BALANCES entry");
  });

  it("throws on a malformed account", () => {
    expect(() => parseInitialBalances("Alice=1")).toThrow('Invalid account: "Alice"');
  });
});

// =============================================================================
// loadConfig
// =============================================================================

describe("loadConfig", () => {
  it("returns defaults when env is empty", () => {
    const config = loadConfig({});
    expect(config.PORT).toBe(3000);
    expect(config.HOST).toBe("0.0.0.0");
    expect(config.LOG_LEVEL).toBe("info");
    expect(config.NODE_ENV).toBe("development");
    expect(config.JWT_ISSUER).toBe("tokenledger");
    expect(config.TRANSFER_FEE).toBe(10_000n);
    expect(config.MAX_LOG_SIZE).toBe(2000);
    expect(config.MAX_QUERY_LENGTH).toBe(5000);
    expect(config.MIN_BURN_AMOUNT).toBeUndefined();
    expect(config.ARCHIVE_DIR).toBeUndefined();
  });

  it("parses overridden values", () => {
    const config = loadConfig({
      PORT: "8080",
      LOG_LEVEL: "debug",
      TRANSFER_FEE: "25",
      MAX_SUPPLY: "900000000",
    });
    expect(config.PORT).toBe(8080);
    expect(config.LOG_LEVEL).toBe("debug");
    expect(config.TRANSFER_FEE).toBe(25n);
    expect(config.MAX_SUPPLY).toBe(900_000_000n);
  });

  it("throws on invalid values", () => {
    expect(() => loadConfig({ PORT: "0" })).toThrow();
    expect(() => loadConfig({ TRANSFER_FEE: "-1" })).toThrow();
    expect(() => loadConfig({ MAX_LOG_SIZE: "0" })).toThrow();
  });
});

// =============================================================================
// toLedgerServiceConfig
// =============================================================================

describe("toLedgerServiceConfig", () => {
  it("maps env settings onto the ledger and archive", () => {
    const service = toLedgerServiceConfig(
      loadConfig({
        MINTING_ACCOUNT: "treasury",
        INITIAL_BALANCES: "alice=100",
        ARCHIVE_DIR: "/tmp/archives",
        PROVISIONING_BUDGET: "500",
        MIGRATION_ALERT_AFTER: "3",
      }),
    );

    expect(service.ledger.mintingAccount).toEqual({ owner: "treasury" });
    expect(service.ledger.initialBalances).toEqual([{ account: { owner: "alice" }, amount: 100n }]);
    expect(service.ledger.backoff).toEqual({
      baseDelayMs: 1000,
      maxDelayMs: 300_000,
      alertAfterFailures: 3,
    });
    expect(service.archive).toEqual({ directory: "/tmp/archives", budget: 500n });
  });
});
