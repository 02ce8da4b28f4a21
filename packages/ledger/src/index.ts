/**
 * @pledgebook/ledger — Contribution accounting engine.
 *
 * A pure TypeScript ledger with zero runtime dependencies beyond the
 * Pledgebook packages. Enforces:
 * - Contributions are priced through a feed and must clear a minimum
 * - Held balance always equals the sum of contributor records
 * - Only the owner, fixed at construction, can withdraw
 * - Books are cleared before value is released
 * - All monetary arithmetic uses bigint (no floating point)
 */

// Core engine
export { ContributionLedger } from "./ledger.js";

// Rate conversion
export { normalizedRate, convert, feedVersion } from "./rate-converter.js";

// Value release
export { InMemorySettlement } from "./settlement.js";
export type { ValueSink, ReleaseRecord } from "./settlement.js";

// Units
export { parseAmount, formatAmount } from "./units.js";

// Types
export type {
  LedgerErrorCode,
  ContributionLedgerOptions,
  LedgerSnapshot,
} from "./types.js";

export {
  LedgerError,
  MINIMUM_CONTRIBUTION,
  NATIVE_DECIMALS,
  REFERENCE_DECIMALS,
  PRECISION,
} from "./types.js";
