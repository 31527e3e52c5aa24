/**
 * Property-Based Tests for @tokenledger/ledger
 *
 * Uses fast-check to verify invariants that must hold for ANY sequence of
 * requests:
 *
 * 1. Conservation: sum(balances) + burned == minted
 * 2. Committed requests get gapless, increasing indices
 * 3. Rejected requests change nothing
 * 4. Log and archive together hold every committed transaction once
 * 5. Any range query returns exactly the requested window, archived
 *    part in descriptors no longer than the per-call limit
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { Principal } from "@tokenledger/types";
import { TokenLedger } from "../src/ledger.js";
import { fetchArchivedRanges } from "../src/range-resolver.js";
import { NO_INDEX } from "../src/types.js";
import { FakeProvisioner } from "./helpers.js";

// =============================================================================
// Arbitraries
// =============================================================================

const HOLDERS = ["alice", "bob", "carol"] as const;

type Op =
  | { readonly type: "transfer"; readonly from: Principal; readonly to: Principal; readonly amount: bigint }
  | { readonly type: "mint"; readonly to: Principal; readonly amount: bigint }
  | { readonly type: "burn"; readonly from: Principal; readonly amount: bigint };

const arbHolder = fc.constantFrom(...HOLDERS);
const arbAmount = fc.bigInt({ min: 0n, max: 600n });

const arbOp: fc.Arbitrary<Op> = fc.oneof(
  fc.record({ type: fc.constant("transfer" as const), from: arbHolder, to: arbHolder, amount: arbAmount }),
  fc.record({ type: fc.constant("mint" as const), to: arbHolder, amount: arbAmount }),
  fc.record({ type: fc.constant("burn" as const), from: arbHolder, amount: arbAmount }),
);

// =============================================================================
// Helpers
// =============================================================================

function makeLedger(maxLogSize: number, maxQueryLength?: number): TokenLedger {
  return new TokenLedger(
    {
      name: "Prop Token",
      symbol: "PRP",
      decimals: 0,
      fee: 3n,
      mintingAccount: { owner: "minter" },
      maxSupply: 50_000n,
      initialBalances: HOLDERS.map((owner) => ({ account: { owner }, amount: 500n })),
      maxLogSize,
      ...(maxQueryLength !== undefined ? { maxQueryLength } : {}),
    },
    { provisioner: new FakeProvisioner(), clock: () => 1_700_000_000_000 },
  );
}

function apply(ledger: TokenLedger, op: Op) {
  switch (op.type) {
    case "transfer":
      return ledger.transfer({ to: { owner: op.to }, amount: op.amount }, op.from);
    case "mint":
      return ledger.mint({ to: { owner: op.to }, amount: op.amount }, "minter");
    case "burn":
      return ledger.burn({ amount: op.amount }, op.from);
  }
}

function balances(ledger: TokenLedger): bigint[] {
  return HOLDERS.map((owner) => ledger.balanceOf({ owner }));
}

function sum(values: readonly bigint[]): bigint {
  return values.reduce((acc, v) => acc + v, 0n);
}

// =============================================================================
// Properties
// =============================================================================

describe("TokenLedger properties", () => {
  it("conserves supply after every request", async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(arbOp, { maxLength: 40 }), async (ops) => {
        const ledger = makeLedger(7);
        for (const op of ops) {
          await apply(ledger, op);
          expect(sum(balances(ledger)) + ledger.totalBurned).toBe(ledger.totalMinted);
          expect(ledger.totalSupply).toBe(sum(balances(ledger)));
        }
      }),
    );
  });

  it("assigns gapless indices and leaves state untouched on rejection", async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(arbOp, { maxLength: 40 }), async (ops) => {
        const ledger = makeLedger(5);
        let committed = 0;

        for (const op of ops) {
          const before = balances(ledger);
          const result = await apply(ledger, op);

          if (result.ok) {
            expect(result.index).toBe(committed);
            committed++;
          } else {
            expect(balances(ledger)).toEqual(before);
          }
          expect(ledger.totalTransactions).toBe(committed);
        }
      }),
    );
  });

  it("splits history between archive and log without loss or overlap", async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.array(arbOp, { minLength: 1, maxLength: 40 }),
        fc.integer({ min: 1, max: 6 }),
        async (ops, maxLogSize) => {
          const ledger = makeLedger(maxLogSize);
          for (const op of ops) {
            await apply(ledger, op);
          }

          const total = ledger.totalTransactions;
          const response = ledger.getTransactions(0, total + 5);
          expect(response.logLength).toBe(total);
          expect(response.length).toBe(total);

          const endpoint = ledger.archiveEndpoint();
          const archived =
            endpoint === undefined ? [] : await fetchArchivedRanges(endpoint, response.archivedTransactions);
          const indices = [...archived, ...response.transactions].map((tx) => tx.index);

          expect(indices).toEqual(Array.from({ length: total }, (_, i) => i));
          expect(ledger.logSize).toBeLessThan(maxLogSize);
        },
      ),
    );
  });

  it("answers any window with exactly the transactions inside it", async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.array(arbOp, { maxLength: 40 }),
        fc.integer({ min: 1, max: 6 }),
        fc.integer({ min: 1, max: 4 }),
        fc.nat({ max: 50 }),
        fc.nat({ max: 50 }),
        async (ops, maxLogSize, maxQueryLength, start, length) => {
          const ledger = makeLedger(maxLogSize, maxQueryLength);
          for (const op of ops) {
            await apply(ledger, op);
          }

          const total = ledger.totalTransactions;
          const end = Math.min(start + length, total);
          const expected = Array.from({ length: Math.max(end - start, 0) }, (_, i) => start + i);

          const response = ledger.getTransactions(start, length);
          expect(response.logLength).toBe(total);
          expect(response.length).toBe(expected.length);
          expect(response.firstIndex).toBe(expected.length > 0 ? start : NO_INDEX);

          const described: number[] = [];
          for (const range of response.archivedTransactions) {
            expect(range.length).toBeGreaterThan(0);
            expect(range.length).toBeLessThanOrEqual(maxQueryLength);
            for (let i = 0; i < range.length; i++) {
              described.push(range.start + i);
            }
          }
          const local = response.transactions.map((tx) => tx.index);
          expect([...described, ...local]).toEqual(expected);

          const endpoint = ledger.archiveEndpoint();
          if (endpoint !== undefined) {
            const fetched = await fetchArchivedRanges(endpoint, response.archivedTransactions);
            expect(fetched.map((tx) => tx.index)).toEqual(described);
          } else {
            expect(described).toEqual([]);
          }
        },
      ),
    );
  });
});
