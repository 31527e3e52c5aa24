/**
 * Transaction history routes.
 *
 * GET /api/v1/transactions?start&length — Range across archive and live log
 * GET /api/v1/transactions/:index       — Single transaction
 */

import { Hono } from "hono";
import { transactionToJson } from "@tokenledger/types";
import type { AppEnv } from "../types/api-contract.js";
import { RangeQuerySchema, TransactionIndexSchema, toTransactionsDto } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { parseQuery } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";

export function createTransactionRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.use("*", requirePermission("read"));

  routes.get("/", (c) => {
    const query = parseQuery(RangeQuerySchema, c.req.query());
    if (!query.ok) {
      return c.json(query.envelope, 400);
    }

    const { start, length } = query.value;
    return c.json({ data: toTransactionsDto(c.get("service").getTransactions(start, length)) });
  });

  routes.get("/:index", async (c) => {
    const raw = c.req.param("index");
    const parsed = TransactionIndexSchema.safeParse(raw);
    if (!parsed.success) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", `Invalid transaction index '${raw}'`), 400);
    }

    const tx = await c.get("service").getTransaction(parsed.data);
    if (tx === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", `Transaction ${parsed.data} not found`), 404);
    }
    return c.json({ data: transactionToJson(tx) });
  });

  return routes;
}
