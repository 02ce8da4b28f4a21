/**
 * @pledgebook/ledger — Internal types for the contribution ledger.
 *
 * Rules:
 * - All exposed types are readonly
 * - Fail-closed: invalid operations throw, never silently succeed
 * - Every failure leaves the ledger exactly as it was
 */

import type { ContributorId, PriceFeed } from "@pledgebook/types";
import type { ValueSink } from "./settlement.js";

// ─── Constants ───────────────────────────────────────────────────────────

/** Decimals of the native (raw) unit. */
export const NATIVE_DECIMALS = 18;

/** Decimals of the reference currency. */
export const REFERENCE_DECIMALS = 18;

/** One reference unit (or one native unit) in fixed-point. */
export const PRECISION = 10n ** 18n;

/** Smallest accepted contribution: 5 reference units. */
export const MINIMUM_CONTRIBUTION = 5n * PRECISION;

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INSUFFICIENT_CONTRIBUTION"
  | "NOT_AUTHORIZED"
  | "TRANSFER_FAILED"
  | "INDEX_OUT_OF_RANGE"
  | "INVALID_AMOUNT"
  | "INVALID_IDENTITY"
  | "INVALID_SNAPSHOT";

/**
 * Structured error from the ledger.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Construction ────────────────────────────────────────────────────────

export interface ContributionLedgerOptions {
  /** The only identity allowed to withdraw. Fixed for the ledger's lifetime. */
  readonly owner: ContributorId;
  /** Oracle used to price every contribution. */
  readonly priceFeed: PriceFeed;
  /** Receives the held balance on withdrawal. */
  readonly settlement: ValueSink;
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * Serializable snapshot of the ledger state.
 * Amounts are decimal strings of raw units so the snapshot survives JSON.
 */
export interface LedgerSnapshot {
  readonly version: 1;
  readonly owner: ContributorId;
  readonly records: readonly (readonly [ContributorId, string])[];
  readonly contributors: readonly ContributorId[];
  readonly balance: string;
  readonly createdAt: string;
}
