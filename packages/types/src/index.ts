/**
 * @pledgebook/types — Shared domain types for the Pledgebook stack.
 *
 * These types are used across all Pledgebook packages:
 * - Price feed round data and the feed capability
 * - Contribution and withdrawal receipts
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Oracle types
export type { RoundData, PriceFeed } from "./oracle.js";

// Contribution types
export type {
  ContributorId,
  ContributionReceipt,
  WithdrawalReceipt,
} from "./contribution.js";

// Runtime guards
export {
  isContributorId,
  isRawAmount,
} from "./guards.js";
