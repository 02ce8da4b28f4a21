/**
 * @pledgebook/price-feed — Types for price feed implementations.
 *
 * Rules:
 * - Feeds are read-only from the consumer's side
 * - Fail-closed: a feed that cannot answer throws, never returns a placeholder
 */

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for price feed operations. */
export type OracleErrorCode =
  | "NON_POSITIVE_ANSWER"
  | "INVALID_DECIMALS"
  | "NOT_SYNCED"
  | "ROUND_NOT_FOUND"
  | "FEED_UNAVAILABLE"
  | "INVALID_ADDRESS";

/**
 * Structured error raised when a feed cannot supply a usable answer.
 * Always thrown — never returns error codes silently.
 */
export class OracleError extends Error {
  public readonly code: OracleErrorCode;

  constructor(code: OracleErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "OracleError";
    this.code = code;
  }
}

/** Largest precision a feed may declare (the reference scale). */
export const MAX_FEED_DECIMALS = 18;

// ─── Feed Options ────────────────────────────────────────────────────────

/** Returns the current time in unix seconds. */
export type Clock = () => number;

export interface MockPriceFeedOptions {
  readonly description?: string | undefined;
  readonly clock?: Clock | undefined;
}

export interface EvmPriceFeedConfig {
  /** Address of the aggregator contract */
  readonly address: string;
  /** JSON-RPC endpoint */
  readonly rpcUrl: string;
  /** Request timeout in milliseconds (default: 30000) */
  readonly timeoutMs?: number | undefined;
}
