/**
 * @pledgebook/price-feed — Price feed implementations.
 *
 * - MockPriceFeed: deterministic, settable feed for tests and local runs
 * - EvmPriceFeed: read-only AggregatorV3 reader backed by viem
 */

export { MockPriceFeed } from "./mock-feed.js";
export { EvmPriceFeed } from "./evm-feed.js";

export type {
  OracleErrorCode,
  Clock,
  MockPriceFeedOptions,
  EvmPriceFeedConfig,
} from "./types.js";

export { OracleError, MAX_FEED_DECIMALS } from "./types.js";
