/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (archive binding and migration backlog)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { LedgerService } from "../services/ledger-service.js";

export function createHealthRoutes(service: LedgerService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const archive = service.archiveStatus();
    const ready = service.isReady();

    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        archive: {
          binding: archive.binding,
          storedTxs: archive.storedTxs,
          backlog: archive.logSize,
          consecutiveFailures: archive.consecutiveFailures,
        },
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
