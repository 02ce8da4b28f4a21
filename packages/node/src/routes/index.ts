/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createContributionRoutes } from "./contributions.js";
export { createWithdrawalRoutes } from "./withdrawals.js";
export { createContributorRoutes } from "./contributors.js";
export { createLedgerRoutes } from "./ledger.js";
