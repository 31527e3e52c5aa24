/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps code-tagged domain errors (LedgerError, ArchiveError) to HTTP
 * status codes, and rejected transfers to 4xx answers.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { Logger } from "pino";
import type { AppEnv } from "../types/api-contract.js";
import type { TransferError, TransferErrorKind } from "@tokenledger/types";
import { createErrorEnvelope } from "../types/error.js";
import type { ErrorEnvelope } from "../types/error.js";
import { transferErrorDetails, transferErrorMessage } from "../types/dto.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Readonly<Record<string, ContentfulStatusCode>> = {
  // Ledger errors
  INSUFFICIENT_BALANCE: 422,
  INVALID_AMOUNT: 400,
  INVALID_ACCOUNT: 400,
  INVALID_RANGE: 400,
  ARCHIVE_UNAVAILABLE: 503,
  ARCHIVE_INCOMPLETE: 502,

  // Archive errors
  PROVISIONING_BUDGET_EXHAUSTED: 503,
  ARCHIVE_EXISTS: 503,
  CORRUPT_ARCHIVE: 500,
};

const TRANSFER_STATUS: Readonly<Record<TransferErrorKind, ContentfulStatusCode>> = {
  InsufficientFunds: 422,
  BadBurn: 422,
  BadFee: 400,
  GenericError: 400,
  TooOld: 400,
  CreatedInFuture: 400,
  Duplicate: 409,
  Unauthorized: 403,
};

function errorCode(err: Error): string | undefined {
  return "code" in err && typeof err.code === "string" ? err.code : undefined;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Create the global error handler, registered as Hono's onError handler.
 * Server-side failures are logged with the request id.
 */
export function createErrorHandler(logger: Logger): (err: Error, c: Context<AppEnv>) => Response {
  return (err, c) => {
    const code = errorCode(err);
    const status = (code !== undefined ? STATUS_MAP[code] : undefined) ?? 500;

    if (status >= 500) {
      logger.error({ err, requestId: c.get("requestId") }, "Request failed");
    }

    // Don't leak internal details
    if (status === 500 || code === undefined) {
      return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
    }
    return c.json(createErrorEnvelope(code, err.message), status);
  };
}

/**
 * Status and envelope for a rejected transfer, mint or burn.
 */
export function transferErrorResponse(
  error: TransferError,
): { status: ContentfulStatusCode; envelope: ErrorEnvelope } {
  return {
    status: TRANSFER_STATUS[error.kind],
    envelope: createErrorEnvelope(
      error.kind,
      transferErrorMessage(error),
      transferErrorDetails(error),
    ),
  };
}
