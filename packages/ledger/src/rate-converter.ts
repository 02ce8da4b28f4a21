/**
 * @pledgebook/ledger — Rate conversion.
 *
 * Stateless conversion of raw native amounts into reference-currency
 * units using a price feed's latest answer. The feed is passed in
 * explicitly and read once per call; nothing here is cached.
 *
 * All values are 18-decimal fixed-point bigints.
 */

import type { PriceFeed } from "@pledgebook/types";
import { OracleError, MAX_FEED_DECIMALS } from "@pledgebook/price-feed";
import { PRECISION, REFERENCE_DECIMALS } from "./types.js";

/**
 * The feed's latest answer rescaled to 18 decimals.
 *
 * No staleness check is applied. A non-positive answer is unusable and
 * throws.
 */
export function normalizedRate(feed: PriceFeed): bigint {
  const decimals = feed.decimals();
  if (!Number.isInteger(decimals) || decimals < 0 || decimals > MAX_FEED_DECIMALS) {
    throw new OracleError(
      "INVALID_DECIMALS",
      `Feed decimals must be an integer in [0, ${String(MAX_FEED_DECIMALS)}], got ${String(decimals)}`,
    );
  }

  const { answer, roundId } = feed.latest();
  if (answer <= 0n) {
    throw new OracleError(
      "NON_POSITIVE_ANSWER",
      `Feed answered ${answer.toString()} in round ${roundId.toString()}`,
    );
  }

  return answer * 10n ** BigInt(REFERENCE_DECIMALS - decimals);
}

/**
 * Value of `rawAmount` in reference units: `rawAmount * rate / 1e18`,
 * truncated toward zero.
 */
export function convert(rawAmount: bigint, feed: PriceFeed): bigint {
  return (rawAmount * normalizedRate(feed)) / PRECISION;
}

/**
 * Version reported by the feed implementation.
 */
export function feedVersion(feed: PriceFeed): number {
  return feed.version();
}
