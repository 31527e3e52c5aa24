/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests can create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import pino from "pino";
import type { Logger } from "pino";
import type { AppEnv } from "./types/api-contract.js";
import { LedgerService } from "./services/ledger-service.js";
import type { LedgerServiceConfig } from "./services/ledger-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import { authMiddleware, unsecuredAuthMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createErrorEnvelope } from "./types/error.js";
import {
  createArchiveRoutes,
  createHealthRoutes,
  createLedgerRoutes,
  createTransactionRoutes,
  createTransferRoutes,
} from "./routes/index.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  /** Ledger service configuration; ignored when `service` is given */
  readonly serviceConfig?: LedgerServiceConfig | undefined;
  /** An already constructed service */
  readonly service?: LedgerService | undefined;
  /** Request and error logger. Default: silent */
  readonly logger?: Logger | undefined;
  /** Auth configuration. When provided, auth middleware is enabled. */
  readonly auth?: AuthConfig | undefined;
  /** Principal of unsecured requests without X-Principal. Default: "anonymous" */
  readonly defaultPrincipal?: string | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: LedgerService;
}

function resolveService(options: CreateAppOptions): LedgerService {
  if (options.service !== undefined) {
    return options.service;
  }
  if (options.serviceConfig === undefined) {
    throw new Error("createApp needs either service or serviceConfig");
  }
  return new LedgerService(options.serviceConfig);
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = resolveService(options);
  const logger = options.logger ?? pino({ level: "silent" });

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());
  app.use("*", loggerMiddleware(logger));

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(logger));
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  if (options.auth !== undefined) {
    app.use("/api/*", authMiddleware(options.auth));
  } else {
    // Unsecured mode (tests, dev): X-Principal header or default principal
    app.use("/api/*", unsecuredAuthMiddleware(options.defaultPrincipal ?? "anonymous"));
  }

  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  // Mount v1 API routes
  app.route("/api/v1", createLedgerRoutes());
  app.route("/api/v1", createTransferRoutes());
  app.route("/api/v1/transactions", createTransactionRoutes());
  app.route("/api/v1/archive", createArchiveRoutes());

  return { app, service };
}
