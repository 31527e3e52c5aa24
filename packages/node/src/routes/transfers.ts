/**
 * Write routes. The caller is the authenticated principal.
 *
 * POST /api/v1/transfers — Transfer from one of the caller's accounts
 * POST /api/v1/mint      — Mint (minting account owner only)
 * POST /api/v1/burn      — Burn from one of the caller's accounts
 *
 * 201 { data: { index } } on commit; rejected requests answer with the
 * rejection kind as the error code.
 */

import { Hono } from "hono";
import type { Context, Env } from "hono";
import type { TransferResult } from "@tokenledger/types";
import type { AppEnv } from "../types/api-contract.js";
import { BurnSchema, MintSchema, TransferSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";
import { transferErrorResponse } from "../middleware/error-handler.js";

function respond<E extends Env>(c: Context<E>, result: TransferResult): Response {
  if (!result.ok) {
    const { status, envelope } = transferErrorResponse(result.error);
    return c.json(envelope, status);
  }
  return c.json({ data: { index: result.index } }, 201);
}

export function createTransferRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/transfers", requirePermission("write"), validateBody(TransferSchema), async (c) => {
    const result = await c.get("service").transfer(c.get("validatedBody"), c.get("auth").principal);
    return respond(c, result);
  });

  routes.post("/mint", requirePermission("write"), validateBody(MintSchema), async (c) => {
    const result = await c.get("service").mint(c.get("validatedBody"), c.get("auth").principal);
    return respond(c, result);
  });

  routes.post("/burn", requirePermission("write"), validateBody(BurnSchema), async (c) => {
    const result = await c.get("service").burn(c.get("validatedBody"), c.get("auth").principal);
    return respond(c, result);
  });

  return routes;
}
