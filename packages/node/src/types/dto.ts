/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Each request DTO has a Zod schema and a derived TypeScript type.
 * Response DTOs carry amounts as decimal strings, never bigints.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

/** Decimal string in native units, e.g. "0.1". */
export const AmountSchema = z
  .string()
  .trim()
  .regex(/^\d+(\.\d{1,18})?$/, "Amount must be a non-negative decimal with at most 18 fractional digits");

// =============================================================================
// Request DTOs
// =============================================================================

export const ContributeSchema = z.object({
  amount: AmountSchema,
});

export type ContributeDto = z.infer<typeof ContributeSchema>;

export const WithdrawSchema = z.object({
  mode: z.enum(["standard", "compact"]).default("standard"),
});

export type WithdrawDto = z.infer<typeof WithdrawSchema>;

export const ContributorIndexSchema = z.object({
  index: z
    .string()
    .regex(/^\d+$/, "Index must be a non-negative integer")
    .transform(Number)
    .refine(Number.isSafeInteger, "Index is too large"),
});

export type ContributorIndexParams = z.infer<typeof ContributorIndexSchema>;

// =============================================================================
// Response DTOs
// =============================================================================

export interface ContributionDto {
  readonly contributor: string;
  readonly amount: string;
  readonly referenceValue: string;
  readonly position: number;
  readonly cumulative: string;
}

export interface WithdrawalDto {
  readonly recipient: string;
  readonly amount: string;
  readonly contributorsCleared: number;
  readonly mode: WithdrawDto["mode"];
}

export interface PriceFeedDto {
  readonly description: string;
  readonly decimals: number;
  readonly version: number;
  readonly roundId: string;
  readonly answer: string;
  readonly updatedAt: number;
}

export interface LedgerSummaryDto {
  readonly owner: string;
  readonly balance: string;
  readonly contributorCount: number;
  readonly minimumContribution: string;
  readonly priceFeed: PriceFeedDto;
}
