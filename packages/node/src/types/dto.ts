/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Request DTOs have a Zod schema and a derived TypeScript type.
 * Response DTOs carry amounts as strings of stroops, since JSON has no
 * integer type wide enough for u64.
 */

import { z } from "zod";

// =============================================================================
// Requests
// =============================================================================

export const DepositSchema = z.object({
  user: z.string().trim().min(1).max(128),

  /** "low" | "medium" | "high", their initials or 1-3 */
  riskLevel: z.string().min(1).max(16),

  /** XLM as a decimal string, at most 7 fractional digits */
  amount: z.string().min(1).max(40),
});

export type DepositDto = z.infer<typeof DepositSchema>;

// =============================================================================
// Responses
// =============================================================================

export interface DepositReceiptDto {
  readonly depositId: string;
  readonly user: string;
  readonly riskLevel: string;
  readonly grossAmount: string;
  readonly insuranceCut: string;
  readonly netAmount: string;
  readonly sharesMinted: string;
  readonly sharePrice: string;
  readonly transactionId: string;
  readonly idempotencyKey?: string | undefined;
  readonly replayed: boolean;
  readonly completedAt: string;
}

export interface InsurancePoolDto {
  /** Stroops */
  readonly total: string;

  /** Same amount in XLM, seven decimals */
  readonly totalXlm: string;
}
