/**
 * Token and account routes.
 *
 * GET /api/v1/metadata                  — Token description
 * GET /api/v1/accounts/:account/balance — Balance of an encoded account
 * GET /api/v1/supply                    — Supply counters
 */

import { Hono } from "hono";
import { encodeAccount } from "@tokenledger/ledger";
import type { AppEnv } from "../types/api-contract.js";
import { toMetadataDto } from "../types/dto.js";
import { requirePermission } from "../middleware/auth.js";

export function createLedgerRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/metadata", requirePermission("read"), (c) => {
    return c.json({ data: toMetadataDto(c.get("service").metadata()) });
  });

  routes.get("/accounts/:account/balance", requirePermission("read"), (c) => {
    const { account, balance } = c.get("service").balanceOf(c.req.param("account"));
    return c.json({
      data: { account: encodeAccount(account), balance: balance.toString() },
    });
  });

  routes.get("/supply", requirePermission("read"), (c) => {
    const supply = c.get("service").supply();
    return c.json({
      data: {
        totalSupply: supply.totalSupply.toString(),
        totalMinted: supply.totalMinted.toString(),
        totalBurned: supply.totalBurned.toString(),
        totalTransactions: supply.totalTransactions,
      },
    });
  });

  return routes;
}
