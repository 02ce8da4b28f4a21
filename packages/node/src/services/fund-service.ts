/**
 * FundService — Wires the contribution ledger for the HTTP surface.
 *
 * Owns one ContributionLedger and translates between its bigint API and
 * the decimal-string DTOs the routes speak. Logs every mutation.
 */

import type { Logger } from "pino";
import type {
  ContributionReceipt,
  ContributorId,
  PriceFeed,
  WithdrawalReceipt,
} from "@pledgebook/types";
import {
  ContributionLedger,
  InMemorySettlement,
  LedgerError,
  MINIMUM_CONTRIBUTION,
  NATIVE_DECIMALS,
  REFERENCE_DECIMALS,
  feedVersion,
  formatAmount,
  normalizedRate,
  parseAmount,
} from "@pledgebook/ledger";
import type { ValueSink } from "@pledgebook/ledger";
import type {
  ContributionDto,
  LedgerSummaryDto,
  WithdrawalDto,
  WithdrawDto,
} from "../types/dto.js";

// =============================================================================
// Config
// =============================================================================

export interface FundServiceConfig {
  readonly owner: ContributorId;
  readonly priceFeed: PriceFeed;
  readonly logger: Logger;
  /** Defaults to an InMemorySettlement */
  readonly settlement?: ValueSink | undefined;
}

export interface FeedStatus {
  readonly ready: boolean;
  readonly detail?: string | undefined;
}

// =============================================================================
// Service
// =============================================================================

export class FundService {
  readonly ledger: ContributionLedger;
  private readonly log: Logger;

  constructor(config: FundServiceConfig) {
    this.ledger = new ContributionLedger({
      owner: config.owner,
      priceFeed: config.priceFeed,
      settlement: config.settlement ?? new InMemorySettlement(),
    });
    this.log = config.logger.child({ component: "fund-service" });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Mutations
  // ───────────────────────────────────────────────────────────────────────

  contribute(contributor: ContributorId, amount: string): ContributionDto {
    const raw = parseAmount(amount, NATIVE_DECIMALS);

    let receipt: ContributionReceipt;
    try {
      receipt = this.ledger.contribute(contributor, raw);
    } catch (err: unknown) {
      if (err instanceof LedgerError && err.code === "INSUFFICIENT_CONTRIBUTION") {
        this.log.warn({ contributor, amount }, "Contribution below minimum rejected");
      }
      throw err;
    }

    const dto: ContributionDto = {
      contributor: receipt.contributor,
      amount: formatAmount(receipt.amount, NATIVE_DECIMALS),
      referenceValue: formatAmount(receipt.referenceValue, REFERENCE_DECIMALS),
      position: receipt.position,
      cumulative: formatAmount(receipt.cumulative, NATIVE_DECIMALS),
    };
    this.log.info(dto, "Contribution recorded");
    return dto;
  }

  withdraw(caller: ContributorId, mode: WithdrawDto["mode"]): WithdrawalDto {
    let receipt: WithdrawalReceipt;
    try {
      receipt =
        mode === "compact"
          ? this.ledger.cheaperWithdraw(caller)
          : this.ledger.withdraw(caller);
    } catch (err: unknown) {
      if (err instanceof LedgerError && err.code === "TRANSFER_FAILED") {
        this.log.error({ caller, err }, "Withdrawal release failed; books restored");
      } else if (err instanceof LedgerError && err.code === "NOT_AUTHORIZED") {
        this.log.warn({ caller }, "Withdrawal by non-owner rejected");
      }
      throw err;
    }

    const dto: WithdrawalDto = {
      recipient: receipt.recipient,
      amount: formatAmount(receipt.amount, NATIVE_DECIMALS),
      contributorsCleared: receipt.contributorsCleared,
      mode,
    };
    this.log.info(dto, "Withdrawal released");
    return dto;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  getContribution(contributor: ContributorId): string {
    return formatAmount(this.ledger.getAmountContributed(contributor), NATIVE_DECIMALS);
  }

  getContributor(index: number): ContributorId {
    return this.ledger.getContributor(index);
  }

  summary(): LedgerSummaryDto {
    const feed = this.ledger.getPriceFeed();
    const round = feed.latest();
    return {
      owner: this.ledger.getOwner(),
      balance: formatAmount(this.ledger.balance, NATIVE_DECIMALS),
      contributorCount: this.ledger.contributorCount,
      minimumContribution: formatAmount(MINIMUM_CONTRIBUTION, REFERENCE_DECIMALS),
      priceFeed: {
        description: feed.description(),
        decimals: feed.decimals(),
        version: feedVersion(feed),
        roundId: round.roundId.toString(),
        answer: round.answer.toString(),
        updatedAt: round.updatedAt,
      },
    };
  }

  /**
   * Whether the feed currently yields a usable rate.
   */
  feedStatus(): FeedStatus {
    try {
      normalizedRate(this.ledger.getPriceFeed());
      return { ready: true };
    } catch (err: unknown) {
      const detail = err instanceof Error ? err.message : String(err);
      this.log.warn({ detail }, "Price feed not ready");
      return { ready: false, detail };
    }
  }
}
