/**
 * Mock price feed — deterministic, settable oracle.
 *
 * Mirrors the production aggregator's read surface so the ledger can be
 * exercised without a live oracle. Answers and round metadata are set
 * explicitly; every round written is kept for `getRoundData()`.
 */

import type { PriceFeed, RoundData } from "@pledgebook/types";
import type { Clock, MockPriceFeedOptions } from "./types.js";
import { MAX_FEED_DECIMALS, OracleError } from "./types.js";

const systemClock: Clock = () => Math.floor(Date.now() / 1000);

export class MockPriceFeed implements PriceFeed {
  private readonly _decimals: number;
  private readonly _description: string;
  private readonly _clock: Clock;
  private readonly _rounds: Map<bigint, RoundData> = new Map();
  private _latestRound = 0n;

  constructor(decimals: number, initialAnswer: bigint, options?: MockPriceFeedOptions) {
    if (!Number.isInteger(decimals) || decimals < 0 || decimals > MAX_FEED_DECIMALS) {
      throw new OracleError(
        "INVALID_DECIMALS",
        `Feed decimals must be an integer in [0, ${String(MAX_FEED_DECIMALS)}], got ${String(decimals)}`,
      );
    }
    this._decimals = decimals;
    this._description = options?.description ?? "mock price feed";
    this._clock = options?.clock ?? systemClock;
    this.updateAnswer(initialAnswer);
  }

  // ─── Read surface ────────────────────────────────────────────────────

  decimals(): number {
    return this._decimals;
  }

  description(): string {
    return this._description;
  }

  version(): number {
    return 0;
  }

  latest(): RoundData {
    return this.getRoundData(this._latestRound);
  }

  getRoundData(roundId: bigint): RoundData {
    const round = this._rounds.get(roundId);
    if (round === undefined) {
      throw new OracleError("ROUND_NOT_FOUND", `No data for round ${roundId.toString()}`);
    }
    return round;
  }

  get latestRound(): bigint {
    return this._latestRound;
  }

  get latestAnswer(): bigint {
    return this.latest().answer;
  }

  get latestTimestamp(): number {
    return this.latest().updatedAt;
  }

  // ─── Write surface (tests only) ──────────────────────────────────────

  /**
   * Report a new answer in the next round, stamped with the clock's time.
   */
  updateAnswer(answer: bigint): RoundData {
    const now = this._clock();
    return this.updateRoundData(this._latestRound + 1n, answer, now, now);
  }

  /**
   * Write a round with explicit metadata and make it the latest.
   */
  updateRoundData(
    roundId: bigint,
    answer: bigint,
    updatedAt: number,
    startedAt: number,
  ): RoundData {
    const round: RoundData = {
      roundId,
      answer,
      startedAt,
      updatedAt,
      answeredInRound: roundId,
    };
    this._rounds.set(roundId, round);
    this._latestRound = roundId;
    return round;
  }
}
