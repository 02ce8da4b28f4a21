/**
 * @pledgebook/ledger — Value release.
 *
 * The ledger only keeps books; moving value out is delegated to a
 * ValueSink. A sink may run arbitrary code while releasing, including
 * calls back into the ledger, so the ledger finishes all bookkeeping
 * before it calls `release()`.
 */

import type { ContributorId } from "@pledgebook/types";

/**
 * Destination-side of a withdrawal.
 *
 * Returns false (or throws) when the recipient cannot accept the value.
 */
export interface ValueSink {
  release(recipient: ContributorId, amount: bigint): boolean;
}

/**
 * A single completed release.
 */
export interface ReleaseRecord {
  readonly recipient: ContributorId;
  readonly amount: bigint;
  readonly releasedAt: string;
}

/**
 * In-process settlement: credits released value to per-recipient
 * balances. Recipients can be marked as refusing to simulate a
 * destination that cannot receive value.
 */
export class InMemorySettlement implements ValueSink {
  private readonly _balances: Map<ContributorId, bigint> = new Map();
  private readonly _refusing: Set<ContributorId> = new Set();
  private readonly _history: ReleaseRecord[] = [];

  release(recipient: ContributorId, amount: bigint): boolean {
    if (this._refusing.has(recipient)) {
      return false;
    }

    this._balances.set(recipient, this.balanceOf(recipient) + amount);
    this._history.push({
      recipient,
      amount,
      releasedAt: new Date().toISOString(),
    });
    return true;
  }

  /** Make every future release to `recipient` fail. */
  refuse(recipient: ContributorId): void {
    this._refusing.add(recipient);
  }

  /** Undo `refuse()`. */
  accept(recipient: ContributorId): void {
    this._refusing.delete(recipient);
  }

  balanceOf(recipient: ContributorId): bigint {
    return this._balances.get(recipient) ?? 0n;
  }

  get totalReleased(): bigint {
    let total = 0n;
    for (const amount of this._balances.values()) {
      total += amount;
    }
    return total;
  }

  getHistory(): readonly ReleaseRecord[] {
    return [...this._history];
  }
}
