/**
 * Global error handler.
 *
 * Every package throws errors carrying a string `code`. This module maps
 * those codes to HTTP statuses in one table and renders the error
 * envelope. Anything without a known code is a 500 whose message is not
 * leaked.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { Logger } from "pino";
import { ApiError, createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

export const STATUS_MAP: Readonly<Record<string, ContentfulStatusCode>> = {
  // Malformed input
  VALIDATION_ERROR: 400,
  ZERO_AMOUNT: 400,
  BAD_ADDRESS: 400,
  INVALID_ADDRESS: 400,
  INVALID_AMOUNT: 400,
  INVALID_REFERRER: 400,
  INVALID_ROLE_MEMBER: 400,
  INVALID_CONFIG: 400,
  ZERO_VALUE: 400,
  INVALID_STREAM_ID: 400,
  INVALID_VERSION: 400,

  // Identity & permission
  UNAUTHENTICATED: 401,
  UNAUTHORIZED: 403,
  NOT_OWNER: 403,
  RESCUE_FORBIDDEN: 403,
  FAUCET_DISABLED: 403,

  // Missing
  NOT_FOUND: 404,
  REQUEST_NOT_FOUND: 404,
  ORACLE_NOT_FOUND: 404,

  // State machine
  ENFORCED_PAUSE: 409,
  EXPECTED_PAUSE: 409,
  REENTRANT_CALL: 409,
  REQUEST_CLOSED: 409,
  NOT_CLAIMABLE: 409,
  NO_PENDING_ORACLE: 409,
  ORACLE_TIMELOCKED: 409,
  ORACLE_EXISTS: 409,
  STALE_TIMESTAMP: 409,
  CONCURRENCY_CONFLICT: 409,

  // Economic guards
  SLIPPAGE_TOO_HIGH: 422,
  INSUFFICIENT_LIQUIDITY: 422,
  INSUFFICIENT_SHARES: 422,
  INSUFFICIENT_BALANCE: 422,
  INSUFFICIENT_ALLOWANCE: 422,
  TOO_LARGE_MOVE: 422,
  FEE_TOO_HIGH: 422,
  STALENESS_TOO_HIGH: 422,

  // Price freshness
  ORACLE_INVALID: 503,
  ORACLE_STALE: 503,
};

function errorCode(err: Error): string | undefined {
  return "code" in err && typeof err.code === "string" ? err.code : undefined;
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Build the app's onError handler. Unmapped errors are logged with their
 * stack when a logger is given.
 */
export function createErrorHandler(logger?: Logger): (err: Error, c: Context) => Response {
  return (err, c) => {
    const code = errorCode(err);
    const status = code === undefined ? undefined : STATUS_MAP[code];

    if (code === undefined || status === undefined) {
      logger?.error({ err, path: c.req.path }, "Unhandled error");
      return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
    }

    const details = err instanceof ApiError ? err.details : undefined;
    return c.json(createErrorEnvelope(code, err.message, details), status);
  };
}
