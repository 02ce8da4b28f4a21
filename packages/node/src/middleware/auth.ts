/**
 * Caller identification middleware.
 *
 * Supports two strategies:
 * 1. API key via X-Api-Key header → looked up in the configured key registry
 * 2. X-Caller-Id header → trusted as-is, only when no registry is configured
 *
 * On success, sets `c.set("caller", callerContext)`. Requests without an
 * identity pass through with `caller` unset; `requireCaller()` rejects
 * them on mutating routes.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord, CallerContext } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";
export const CALLER_ID_HEADER = "X-Caller-Id";

// =============================================================================
// Identify Middleware
// =============================================================================

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

/**
 * Create caller identification middleware.
 *
 * With `config`, only X-Api-Key is honoured and an unknown key is a 401.
 * Without it, X-Caller-Id names the caller directly.
 */
export function identifyCaller(config?: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    let caller: CallerContext | undefined;

    if (config !== undefined) {
      const apiKey = c.req.header(API_KEY_HEADER);
      if (apiKey !== undefined) {
        const record = config.apiKeys.get(apiKey);
        if (record === undefined) {
          return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
        }
        caller = { type: "api-key", identity: record.identity };
      }
    } else {
      const callerId = c.req.header(CALLER_ID_HEADER)?.trim();
      if (callerId !== undefined && callerId !== "") {
        caller = { type: "header", identity: callerId };
      }
    }

    c.set("caller", caller);
    return next();
  };
}

// =============================================================================
// Caller Guard
// =============================================================================

/**
 * Must run AFTER identifyCaller. Returns 401 when no caller was resolved,
 * otherwise exposes the identity as `callerIdentity`.
 */
export function requireCaller(): MiddlewareHandler<{
  Variables: { caller: CallerContext | undefined; callerIdentity: string };
}> {
  return async (c, next) => {
    const caller = c.get("caller");
    if (caller === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Caller identity required"),
        401,
      );
    }
    c.set("callerIdentity", caller.identity);
    return next();
  };
}
