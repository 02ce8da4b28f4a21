/**
 * Contribution Types
 *
 * Results of the two mutating ledger operations. Amounts are bigint:
 * raw amounts in native units (wei, 18 decimals), reference values in
 * the reference currency (USD, 18 decimals).
 */

/**
 * Identity of a contributor or caller (an address or principal).
 */
export type ContributorId = string;

/**
 * Outcome of an accepted contribution.
 */
export interface ContributionReceipt {
  readonly contributor: ContributorId;

  /** Raw amount accepted by this call */
  readonly amount: bigint;

  /** The amount converted to reference units at call time */
  readonly referenceValue: bigint;

  /** Position of this contribution in the contributor sequence */
  readonly position: number;

  /** Contributor's cumulative raw amount after this call */
  readonly cumulative: bigint;
}

/**
 * Outcome of a successful withdrawal.
 */
export interface WithdrawalReceipt {
  readonly recipient: ContributorId;

  /** Raw amount released to the recipient */
  readonly amount: bigint;

  /** Number of sequence entries cleared */
  readonly contributorsCleared: number;
}
