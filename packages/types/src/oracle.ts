/**
 * Price Feed Types
 *
 * The read surface of an external price oracle. Consumers only read
 * from a feed; nothing in this stack mutates one.
 *
 * Rules:
 * - Answers are signed integers scaled by the feed's own decimals
 * - Timestamps are unix seconds
 * - Round ids are unbounded integers (bigint)
 */

/**
 * One round of oracle data.
 */
export interface RoundData {
  /** Identifier of the round this answer belongs to */
  readonly roundId: bigint;

  /** Reported rate, scaled by the feed's decimals (e.g. 2000_00000000n for $2000 at 8 decimals) */
  readonly answer: bigint;

  /** Unix seconds when the round started */
  readonly startedAt: number;

  /** Unix seconds when the answer was last updated */
  readonly updatedAt: number;

  /** Round in which the answer was computed */
  readonly answeredInRound: bigint;
}

/**
 * An opaque handle to an external price source.
 *
 * Synchronous by contract: a ledger operation reads the feed once per
 * conversion and never suspends while doing so. Feeds backed by remote
 * data refresh a local copy out of band.
 */
export interface PriceFeed {
  /** Precision of raw answers. */
  decimals(): number;

  /** The most recent round. */
  latest(): RoundData;

  /** Human-readable pair name, e.g. "ETH / USD". */
  description(): string;

  /** Version of the feed implementation. */
  version(): number;
}
