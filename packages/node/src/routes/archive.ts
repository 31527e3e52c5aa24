/**
 * Archive routes.
 *
 * GET  /api/v1/archive              — Binding, stored count and backlog
 * POST /api/v1/archive/flush        — Migrate the live log now (admin)
 * GET  /api/v1/archive/transactions — Archived transactions in a range
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ArchiveRangeQuerySchema, toTransactionDtos } from "../types/dto.js";
import { parseQuery } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";

export function createArchiveRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", requirePermission("read"), (c) => {
    return c.json({ data: c.get("service").archiveStatus() });
  });

  routes.post("/flush", requirePermission("admin"), async (c) => {
    const outcome = await c.get("service").flushArchive();
    return c.json({ data: outcome });
  });

  routes.get("/transactions", requirePermission("read"), async (c) => {
    const query = parseQuery(ArchiveRangeQuerySchema, c.req.query());
    if (!query.ok) {
      return c.json(query.envelope, 400);
    }

    const { start, length } = query.value;
    const archived = await c.get("service").archivedTransactions(start, length);
    return c.json({
      data: { start: archived.start, transactions: toTransactionDtos(archived.transactions) },
    });
  });

  return routes;
}
