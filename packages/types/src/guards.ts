/**
 * Runtime Type Guards
 *
 * Narrowing functions for Pledgebook domain types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, deserialized data, external integrations).
 */

import type { ContributorId } from "./contribution.js";

// =============================================================================
// Contribution guards
// =============================================================================

export function isContributorId(value: unknown): value is ContributorId {
  return typeof value === "string" && value.trim().length > 0;
}

/** Non-negative integer amount in raw units. */
export function isRawAmount(value: unknown): value is bigint {
  return typeof value === "bigint" && value >= 0n;
}
