/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps known domain errors (ServiceError, LedgerError, StoreError)
 * to appropriate HTTP status codes.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { Logger } from "pino";
import { ServiceError } from "../services/errors.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Record<string, ContentfulStatusCode> = {
  // Service errors
  SHOP_EXISTS: 409,
  SHOP_NOT_FOUND: 404,
  INVALID_CREDENTIALS: 401,
  BANK_NOT_FOUND: 404,
  BANK_NAME_TAKEN: 409,
  ENTRY_NOT_FOUND: 404,
  PAST_ENTRY_LOCKED: 403,
  INSUFFICIENT_BALANCE: 422,
  RECALCULATION_FAILED: 503,

  // Ledger errors
  INVALID_RANGE: 400,

  // Store errors
  STORE_UNAVAILABLE: 503,
  DUPLICATE_KEY: 409,
};

function errorCode(err: Error): string | undefined {
  return "code" in err && typeof err.code === "string" ? err.code : undefined;
}

function getStatusCode(code: string | undefined): ContentfulStatusCode {
  return (code !== undefined ? STATUS_MAP[code] : undefined) ?? 500;
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Create the handler registered as Hono's onError. Unmapped errors
 * become 500s and are logged when a logger is given.
 */
export function createErrorHandler(
  logger?: Logger,
): (err: Error, c: Context) => Response {
  return (err, c) => {
    const code = errorCode(err);
    const status = getStatusCode(code);

    if (status === 500) {
      logger?.error({ err, path: c.req.path }, "Unhandled error");
      return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
    }

    const details = err instanceof ServiceError ? err.details : undefined;
    return c.json(createErrorEnvelope(code ?? "INTERNAL_ERROR", err.message, details), status);
  };
}

/** Handler without logging. */
export const handleError = createErrorHandler();
