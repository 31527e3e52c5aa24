import { describe, it, expect } from "vitest";
import { DedupIndex, requestHash } from "../src/dedup.js";
import { DEFAULT_SUBACCOUNT } from "../src/accounts.js";
import type { TransactionRequest } from "../src/types.js";

const REQUEST: TransactionRequest = {
  kind: "transfer",
  from: { owner: "alice" },
  to: { owner: "bob" },
  amount: 100n,
  createdAtTime: 1_700_000_000_000,
};

describe("requestHash", () => {
  it("is a hex SHA-256 digest", () => {
    expect(requestHash(REQUEST)).toMatch(/^[0-9a-f]{64}$/);
  });

  it("ignores how the default subaccount is spelled", () => {
    const spelled = { ...REQUEST, to: { owner: "bob", subaccount: DEFAULT_SUBACCOUNT } };
    expect(requestHash(spelled)).toBe(requestHash(REQUEST));
  });

  it("changes with the amount", () => {
    expect(requestHash({ ...REQUEST, amount: 101n })).not.toBe(requestHash(REQUEST));
  });

  it("distinguishes an explicit fee from an omitted one", () => {
    expect(requestHash({ ...REQUEST, fee: 10n })).not.toBe(requestHash(REQUEST));
  });
});

describe("DedupIndex", () => {
  it("finds recorded hashes", () => {
    const index = new DedupIndex();
    index.record("h1", 7, 1_000);

    expect(index.find("h1")).toBe(7);
    expect(index.find("h2")).toBeUndefined();
  });

  it("prunes entries created before the cut-off", () => {
    const index = new DedupIndex();
    index.record("old", 1, 1_000);
    index.record("edge", 2, 2_000);
    index.record("new", 3, 3_000);

    index.prune(2_000);

    expect(index.size).toBe(2);
    expect(index.find("old")).toBeUndefined();
    expect(index.find("edge")).toBe(2);
  });

  it("prunes in commit order and stops at the first entry inside the window", () => {
    const index = new DedupIndex();
    index.record("a", 1, 5_000);
    index.record("b", 2, 1_000);

    index.prune(2_000);
    expect(index.size).toBe(2);

    index.prune(6_000);
    expect(index.size).toBe(0);
    expect(index.find("a")).toBeUndefined();
    expect(index.find("b")).toBeUndefined();
  });

  it("keeps working across repeated prunes", () => {
    const index = new DedupIndex();
    for (let i = 0; i < 10; i++) {
      index.record(`h${i}`, i, i * 100);
    }

    index.prune(300);
    index.prune(700);
    index.record("late", 10, 2_000);
    index.prune(900);

    expect(index.size).toBe(2);
    expect(index.find("h9")).toBe(9);
    expect(index.find("late")).toBe(10);
    expect(index.find("h8")).toBeUndefined();
  });
});
