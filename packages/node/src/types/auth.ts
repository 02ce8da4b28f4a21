/**
 * Caller identification types.
 *
 * A request acts on the ledger as one identity. The identity is resolved
 * by the identify middleware:
 * 1. API key via X-Api-Key header → looked up in the configured registry
 * 2. X-Caller-Id header, only when no key registry is configured (dev, tests)
 */

/**
 * Resolved caller, set by the identify middleware.
 */
export interface CallerContext {
  readonly type: "api-key" | "header";
  readonly identity: string;
}

/**
 * Registered API key and the identity it acts as.
 */
export interface ApiKeyRecord {
  readonly key: string;
  readonly identity: string;
}
