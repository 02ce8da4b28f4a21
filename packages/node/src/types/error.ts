/**
 * Error envelope types for API responses.
 *
 * All error responses follow the shape:
 * { error: { code: string, message: string, details?: Record<string, unknown> } }
 */

import type { LedgerErrorCode } from "@pledgebook/ledger";
import type { OracleErrorCode } from "@pledgebook/price-feed";

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Codes raised by the HTTP layer itself.
 */
export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "UNAUTHORIZED"
  | "INTERNAL_ERROR";

/**
 * Domain codes surfaced to clients unchanged. Snapshot and address
 * errors never reach a request, so they stay internal.
 */
export type DomainErrorCode =
  | Exclude<LedgerErrorCode, "INVALID_SNAPSHOT">
  | Exclude<OracleErrorCode, "INVALID_ADDRESS">;

export type ErrorCode = ApiErrorCode | DomainErrorCode;

// =============================================================================
// Error Response
// =============================================================================

export interface ErrorDetail {
  readonly code: ErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

// =============================================================================
// Factory
// =============================================================================

export function createErrorEnvelope(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  const error: ErrorDetail = { code, message };
  if (details !== undefined) {
    return { error: { ...error, details } };
  }
  return { error };
}
