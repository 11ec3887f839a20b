/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces a consistent
 * error envelope response. Known domain error codes map to HTTP statuses;
 * anything else is a 500 with no details.
 */

import type { Context } from "hono";
import { errorResponse } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

export type ErrorStatus = 400 | 403 | 404 | 409 | 422 | 500;

const STATUS_MAP: Readonly<Record<string, ErrorStatus>> = {
  // Vault errors
  NOT_OWNER: 403,
  APP_UNREGISTERED: 403,
  NO_LOCKER: 409,
  SESSION_ACTIVE: 409,
  UNKNOWN_CURRENCY: 404,
  CURRENCY_EXISTS: 409,
  SETTLE_NON_NATIVE_CURRENCY_WITH_VALUE: 422,
  INVALID_SNAPSHOT: 400,

  // Ledger errors
  ALREADY_LOCKED: 409,
  UNSETTLED_BALANCE: 409,
  ARITHMETIC_OVERFLOW: 422,
  ARITHMETIC_UNDERFLOW: 422,
  INVALID_AMOUNT: 400,

  // Custody / share token errors
  INSUFFICIENT_CUSTODY: 422,
  INSUFFICIENT_FUNDS: 422,
  INSUFFICIENT_BALANCE: 422,
  INSUFFICIENT_ALLOWANCE: 422,

  // Event store errors
  CONCURRENCY_CONFLICT: 409,
  INVALID_STREAM_ID: 400,
  INVALID_VERSION: 400,
  INVALID_EVENT: 400,
};

function codeOf(err: Error): string | undefined {
  return "code" in err && typeof err.code === "string" ? err.code : undefined;
}

/**
 * HTTP status for a domain error code; 500 when the code is unknown.
 */
export function statusFor(code: string | undefined): ErrorStatus {
  return (code !== undefined ? STATUS_MAP[code] : undefined) ?? 500;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  const code = codeOf(err);
  const status = statusFor(code);

  if (status === 500) {
    return c.json(errorResponse("INTERNAL_ERROR", "Internal server error"), status);
  }
  return c.json(errorResponse(code ?? "INTERNAL_ERROR", err.message), status);
}
