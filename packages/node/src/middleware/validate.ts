/**
 * Zod validation middleware.
 *
 * Validates request body against a Zod schema.
 * Returns 400 with error envelope on validation failure.
 */

import type { MiddlewareHandler } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

/**
 * Env of a handler that runs after validateBody: `validatedBody` holds
 * the parsed body with the schema's output type.
 */
export interface ValidatedEnv<T> {
  Variables: AppEnv["Variables"] & { validatedBody: T };
}

/**
 * Validate JSON request body against a Zod schema.
 *
 * On success, sets `validatedBody` in context variables.
 * On failure, returns 400 with structured validation errors.
 */
export function validateBody<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
): MiddlewareHandler<ValidatedEnv<T>> {
  return async (c, next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid JSON in request body"),
        400,
      );
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Request body validation failed", {
          issues: formatZodErrors(result.error),
        }),
        400,
      );
    }

    c.set("validatedBody", result.data);
    return next();
  };
}

/**
 * Validate query parameters against a Zod schema.
 *
 * @returns The parsed query, or an error envelope to answer with
 */
export function parseQuery<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  query: Record<string, string>,
): { ok: true; value: T } | { ok: false; envelope: ReturnType<typeof createErrorEnvelope> } {
  const result = schema.safeParse(query);
  if (!result.success) {
    return {
      ok: false,
      envelope: createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
        issues: formatZodErrors(result.error),
      }),
    };
  }
  return { ok: true, value: result.data };
}

export function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
