/**
 * Type barrel — re-exports all public types from @pledgebook/node.
 */

// DTOs
export {
  AmountSchema,
  ContributeSchema,
  WithdrawSchema,
  ContributorIndexSchema,
} from "./dto.js";
export type {
  ContributeDto,
  WithdrawDto,
  ContributorIndexParams,
  ContributionDto,
  WithdrawalDto,
  PriceFeedDto,
  LedgerSummaryDto,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type {
  ApiErrorCode,
  DomainErrorCode,
  ErrorCode,
  ErrorDetail,
  ErrorEnvelope,
} from "./error.js";

// Auth
export type { CallerContext, ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
