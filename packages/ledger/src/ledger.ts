/**
 * @pledgebook/ledger — Core ContributionLedger class.
 *
 * Records contributions that clear a minimum value in the reference
 * currency and lets a single owner sweep the held balance out.
 *
 * API surface:
 * - contribute() — Price and record a contribution
 * - receive() — Inbound value with no explicit call; same rules as contribute()
 * - withdraw() / cheaperWithdraw() — Owner-only sweep of the held balance
 * - getAmountContributed(), getContributor(), getOwner(), getPriceFeed()
 * - snapshot() / fromSnapshot() — Serialize and restore the books
 *
 * Withdrawal clears the books before value is released, so anything the
 * release triggers sees an empty ledger. A failed release restores the
 * cleared books: reset and release fail together.
 */

import type {
  ContributionReceipt,
  ContributorId,
  PriceFeed,
  WithdrawalReceipt,
} from "@pledgebook/types";
import { isContributorId, isRawAmount } from "@pledgebook/types";
import { convert } from "./rate-converter.js";
import type { ValueSink } from "./settlement.js";
import type { ContributionLedgerOptions, LedgerSnapshot } from "./types.js";
import { LedgerError, MINIMUM_CONTRIBUTION, NATIVE_DECIMALS, REFERENCE_DECIMALS } from "./types.js";
import { formatAmount } from "./units.js";

/** Books taken off the ledger by a withdrawal, kept until release succeeds. */
interface ClearedBooks {
  readonly records: ReadonlyMap<ContributorId, bigint>;
  readonly sequence: readonly ContributorId[];
  readonly amount: bigint;
}

export class ContributionLedger {
  private readonly _owner: ContributorId;
  private readonly _priceFeed: PriceFeed;
  private readonly _settlement: ValueSink;
  private readonly _amounts: Map<ContributorId, bigint> = new Map();
  private _contributors: ContributorId[] = [];
  private _balance = 0n;

  constructor(options: ContributionLedgerOptions) {
    if (!isContributorId(options.owner)) {
      throw new LedgerError("INVALID_IDENTITY", "Owner identity must be a non-empty string");
    }
    this._owner = options.owner;
    this._priceFeed = options.priceFeed;
    this._settlement = options.settlement;
  }

  // ─── Contributions ───────────────────────────────────────────────────

  /**
   * Record a contribution of `rawAmount` native units.
   *
   * Rejected with INSUFFICIENT_CONTRIBUTION when the amount is worth less
   * than MINIMUM_CONTRIBUTION at the feed's latest rate. Oracle failures
   * propagate as OracleError. Nothing changes on any failure.
   */
  contribute(contributor: ContributorId, rawAmount: bigint): ContributionReceipt {
    if (!isContributorId(contributor)) {
      throw new LedgerError("INVALID_IDENTITY", "Contributor identity must be a non-empty string");
    }
    if (!isRawAmount(rawAmount)) {
      throw new LedgerError(
        "INVALID_AMOUNT",
        `Contribution must be a non-negative bigint, got ${String(rawAmount)}`,
      );
    }

    const referenceValue = convert(rawAmount, this._priceFeed);
    if (referenceValue < MINIMUM_CONTRIBUTION) {
      throw new LedgerError(
        "INSUFFICIENT_CONTRIBUTION",
        `Contribution of ${formatAmount(rawAmount, NATIVE_DECIMALS)} is worth ${formatAmount(referenceValue, REFERENCE_DECIMALS)}, below the minimum of ${formatAmount(MINIMUM_CONTRIBUTION, REFERENCE_DECIMALS)}`,
      );
    }

    const cumulative = this.getAmountContributed(contributor) + rawAmount;
    this._amounts.set(contributor, cumulative);
    this._contributors.push(contributor);
    this._balance += rawAmount;

    return {
      contributor,
      amount: rawAmount,
      referenceValue,
      position: this._contributors.length - 1,
      cumulative,
    };
  }

  /**
   * Value arriving without an explicit contribution call.
   * There is no other way in: it goes through contribute().
   */
  receive(contributor: ContributorId, rawAmount: bigint): ContributionReceipt {
    return this.contribute(contributor, rawAmount);
  }

  // ─── Withdrawal ──────────────────────────────────────────────────────

  /**
   * Release the whole held balance to the owner.
   */
  withdraw(caller: ContributorId): WithdrawalReceipt {
    this._assertOwner(caller);
    return this._release(this._clearBooks(this._contributors));
  }

  /**
   * Same as withdraw(), walking a local copy of the contributor sequence.
   */
  cheaperWithdraw(caller: ContributorId): WithdrawalReceipt {
    this._assertOwner(caller);
    const contributors = [...this._contributors];
    return this._release(this._clearBooks(contributors));
  }

  private _assertOwner(caller: ContributorId): void {
    if (caller !== this._owner) {
      throw new LedgerError(
        "NOT_AUTHORIZED",
        `Only the owner may withdraw; "${String(caller)}" is not the owner`,
      );
    }
  }

  private _clearBooks(contributors: readonly ContributorId[]): ClearedBooks {
    const records = new Map<ContributorId, bigint>();
    for (const contributor of contributors) {
      if (!records.has(contributor)) {
        records.set(contributor, this.getAmountContributed(contributor));
        this._amounts.delete(contributor);
      }
    }

    const sequence = this._contributors;
    const amount = this._balance;
    this._contributors = [];
    this._balance = 0n;

    return { records, sequence, amount };
  }

  private _release(cleared: ClearedBooks): WithdrawalReceipt {
    let accepted: boolean;
    try {
      accepted = this._settlement.release(this._owner, cleared.amount);
    } catch (err: unknown) {
      this._restoreBooks(cleared);
      throw new LedgerError(
        "TRANSFER_FAILED",
        `Release of ${formatAmount(cleared.amount, NATIVE_DECIMALS)} to "${this._owner}" failed: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }

    if (!accepted) {
      this._restoreBooks(cleared);
      throw new LedgerError(
        "TRANSFER_FAILED",
        `Release of ${formatAmount(cleared.amount, NATIVE_DECIMALS)} to "${this._owner}" was refused`,
      );
    }

    return {
      recipient: this._owner,
      amount: cleared.amount,
      contributorsCleared: cleared.sequence.length,
    };
  }

  /**
   * Put cleared books back. Contributions made while the release was in
   * flight are kept; the restored books are merged in front of them.
   */
  private _restoreBooks(cleared: ClearedBooks): void {
    for (const [contributor, amount] of cleared.records) {
      this._amounts.set(contributor, this.getAmountContributed(contributor) + amount);
    }
    this._contributors = [...cleared.sequence, ...this._contributors];
    this._balance += cleared.amount;
  }

  // ─── Query Operations ────────────────────────────────────────────────

  /**
   * Cumulative raw amount recorded for a contributor (0 if none).
   */
  getAmountContributed(contributor: ContributorId): bigint {
    return this._amounts.get(contributor) ?? 0n;
  }

  /**
   * Contributor at a position in the contribution sequence.
   */
  getContributor(index: number): ContributorId {
    const contributor =
      Number.isInteger(index) && index >= 0 ? this._contributors[index] : undefined;
    if (contributor === undefined) {
      throw new LedgerError(
        "INDEX_OUT_OF_RANGE",
        `No contributor at index ${String(index)} (sequence length ${String(this._contributors.length)})`,
      );
    }
    return contributor;
  }

  /**
   * Full contribution sequence, in order.
   */
  getContributors(): readonly ContributorId[] {
    return [...this._contributors];
  }

  getOwner(): ContributorId {
    return this._owner;
  }

  getPriceFeed(): PriceFeed {
    return this._priceFeed;
  }

  /** Raw amount currently held. */
  get balance(): bigint {
    return this._balance;
  }

  /** Length of the contribution sequence. */
  get contributorCount(): number {
    return this._contributors.length;
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  /**
   * Create a serializable snapshot of the books.
   * Can be restored with ContributionLedger.fromSnapshot().
   */
  snapshot(): LedgerSnapshot {
    return {
      version: 1,
      owner: this._owner,
      records: [...this._amounts].map(([contributor, amount]) => [contributor, amount.toString()] as const),
      contributors: [...this._contributors],
      balance: this._balance.toString(),
      createdAt: new Date().toISOString(),
    };
  }

  /**
   * Restore a ledger from a snapshot, re-checking its invariants:
   * every sequence entry is a valid identity with exactly one record,
   * every record is positive and appears in the sequence, and the
   * records sum to the balance.
   */
  static fromSnapshot(
    snapshot: LedgerSnapshot,
    wiring: Omit<ContributionLedgerOptions, "owner">,
  ): ContributionLedger {
    if (snapshot.version !== 1) {
      throw new LedgerError(
        "INVALID_SNAPSHOT",
        `Unsupported snapshot version: ${String(snapshot.version)}`,
      );
    }

    const ledger = new ContributionLedger({ ...wiring, owner: snapshot.owner });
    for (const contributor of snapshot.contributors) {
      if (!isContributorId(contributor)) {
        throw new LedgerError(
          "INVALID_SNAPSHOT",
          `Invalid contributor in sequence: "${String(contributor)}"`,
        );
      }
    }
    const sequence = new Set(snapshot.contributors);
    let sum = 0n;

    for (const [contributor, raw] of snapshot.records) {
      if (ledger._amounts.has(contributor)) {
        throw new LedgerError("INVALID_SNAPSHOT", `Duplicate record for "${contributor}"`);
      }
      const amount = parseSnapshotAmount(raw, `record for "${contributor}"`);
      if (amount <= 0n || !sequence.has(contributor)) {
        throw new LedgerError(
          "INVALID_SNAPSHOT",
          `Record for "${contributor}" must be positive and appear in the contributor sequence`,
        );
      }
      ledger._amounts.set(contributor, amount);
      sum += amount;
    }

    for (const contributor of sequence) {
      if (!ledger._amounts.has(contributor)) {
        throw new LedgerError(
          "INVALID_SNAPSHOT",
          `Contributor "${contributor}" appears in the sequence without a record`,
        );
      }
    }

    const balance = parseSnapshotAmount(snapshot.balance, "balance");
    if (balance !== sum) {
      throw new LedgerError(
        "INVALID_SNAPSHOT",
        `Records sum to ${sum.toString()} but balance is ${balance.toString()}`,
      );
    }

    ledger._contributors = [...snapshot.contributors];
    ledger._balance = balance;
    return ledger;
  }
}

function parseSnapshotAmount(raw: string, label: string): bigint {
  if (!/^\d+$/.test(raw)) {
    throw new LedgerError("INVALID_SNAPSHOT", `Invalid ${label}: "${raw}"`);
  }
  return BigInt(raw);
}
