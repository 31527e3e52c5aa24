/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { LedgerService } from "../services/ledger-service.js";
import type { AuthContext } from "./auth.js";

/**
 * Hono environment type for the token ledger app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The ledger this node serves */
    service: LedgerService;

    /** Authenticated caller (set by auth middleware, or from X-Principal when unsecured) */
    auth: AuthContext;
  };
}
