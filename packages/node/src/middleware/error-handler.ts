/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps ledger and price feed error codes to HTTP status codes.
 * Unknown errors, and domain codes with no mapping, become 500 with a
 * generic message.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { createErrorEnvelope } from "../types/error.js";
import type { DomainErrorCode } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Readonly<Record<DomainErrorCode, ContentfulStatusCode>> = {
  // Ledger errors
  INSUFFICIENT_CONTRIBUTION: 422,
  NOT_AUTHORIZED: 403,
  TRANSFER_FAILED: 502,
  INDEX_OUT_OF_RANGE: 404,
  INVALID_AMOUNT: 400,
  INVALID_IDENTITY: 400,

  // Price feed errors
  NON_POSITIVE_ANSWER: 503,
  INVALID_DECIMALS: 503,
  NOT_SYNCED: 503,
  ROUND_NOT_FOUND: 503,
  FEED_UNAVAILABLE: 503,
};

function domainCode(err: Error): DomainErrorCode | undefined {
  if ("code" in err && typeof err.code === "string" && isDomainErrorCode(err.code)) {
    return err.code;
  }
  return undefined;
}

function isDomainErrorCode(code: string): code is DomainErrorCode {
  return Object.hasOwn(STATUS_MAP, code);
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  const code = domainCode(err);

  // Don't leak internal details
  if (code === undefined) {
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }

  return c.json(createErrorEnvelope(code, err.message), STATUS_MAP[code]);
}
