/**
 * EVM price feed — reads an AggregatorV3-style contract.
 *
 * Uses viem for all chain interactions. Reads are async, while the
 * PriceFeed contract is synchronous, so the feed keeps a cached copy of
 * the latest round: `sync()` refreshes it, the read surface serves it.
 *
 * Non-capabilities:
 * - No signing
 * - No transaction submission
 * - No staleness policy (consumers decide)
 */

import { createPublicClient, http, isAddress, parseAbi, type Address } from "viem";
import type { PriceFeed, RoundData } from "@pledgebook/types";
import type { EvmPriceFeedConfig } from "./types.js";
import { OracleError } from "./types.js";

// AggregatorV3Interface fragments (read-only)
const AGGREGATOR_V3_ABI = parseAbi([
  "function decimals() view returns (uint8)",
  "function description() view returns (string)",
  "function version() view returns (uint256)",
  "function latestRoundData() view returns (uint80 roundId, int256 answer, uint256 startedAt, uint256 updatedAt, uint80 answeredInRound)",
]);

function createFeedClient(rpcUrl: string, timeoutMs: number) {
  return createPublicClient({
    transport: http(rpcUrl, { timeout: timeoutMs }),
  });
}

type FeedClient = ReturnType<typeof createFeedClient>;

interface FeedState {
  readonly decimals: number;
  readonly description: string;
  readonly version: number;
  readonly round: RoundData;
  readonly syncedAt: string;
}

export class EvmPriceFeed implements PriceFeed {
  readonly address: Address;
  private readonly client: FeedClient;
  private state: FeedState | null = null;

  constructor(config: EvmPriceFeedConfig) {
    if (!isAddress(config.address)) {
      throw new OracleError(
        "INVALID_ADDRESS",
        `EvmPriceFeed: '${config.address}' is not a valid address`,
      );
    }
    this.address = config.address;
    this.client = createFeedClient(config.rpcUrl, config.timeoutMs ?? 30_000);
  }

  /**
   * Fetch the feed's metadata and latest round, replacing the cached copy.
   * The cached copy is left untouched when any read fails.
   */
  async sync(): Promise<RoundData> {
    const [decimals, description, version, latest] = await this.readAggregator().catch(
      (err: unknown) => {
        throw new OracleError(
          "FEED_UNAVAILABLE",
          `EvmPriceFeed: failed to read ${this.address}: ${err instanceof Error ? err.message : String(err)}`,
          { cause: err },
        );
      },
    );
    const [roundId, answer, startedAt, updatedAt, answeredInRound] = latest;

    const round: RoundData = {
      roundId,
      answer,
      startedAt: Number(startedAt),
      updatedAt: Number(updatedAt),
      answeredInRound,
    };

    this.state = {
      decimals,
      description,
      version: Number(version),
      round,
      syncedAt: new Date().toISOString(),
    };
    return round;
  }

  private readAggregator() {
    return Promise.all([
      this.client.readContract({
        address: this.address,
        abi: AGGREGATOR_V3_ABI,
        functionName: "decimals",
      }),
      this.client.readContract({
        address: this.address,
        abi: AGGREGATOR_V3_ABI,
        functionName: "description",
      }),
      this.client.readContract({
        address: this.address,
        abi: AGGREGATOR_V3_ABI,
        functionName: "version",
      }),
      this.client.readContract({
        address: this.address,
        abi: AGGREGATOR_V3_ABI,
        functionName: "latestRoundData",
      }),
    ]);
  }

  /** ISO timestamp of the last successful sync, if any. */
  get syncedAt(): string | undefined {
    return this.state?.syncedAt;
  }

  decimals(): number {
    return this.requireState().decimals;
  }

  description(): string {
    return this.requireState().description;
  }

  version(): number {
    return this.requireState().version;
  }

  latest(): RoundData {
    return this.requireState().round;
  }

  private requireState(): FeedState {
    if (this.state === null) {
      throw new OracleError(
        "NOT_SYNCED",
        `EvmPriceFeed: ${this.address} has not been synced. Call sync() first.`,
      );
    }
    return this.state;
  }
}
