/**
 * Middleware barrel — re-exports all middleware.
 */

export { createErrorHandler, transferErrorResponse } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody, parseQuery, formatZodErrors } from "./validate.js";
export type { ValidatedEnv } from "./validate.js";
export {
  authMiddleware,
  unsecuredAuthMiddleware,
  requirePermission,
  verifyJwt,
  signJwt,
  PRINCIPAL_HEADER,
} from "./auth.js";
export type { AuthConfig } from "./auth.js";
