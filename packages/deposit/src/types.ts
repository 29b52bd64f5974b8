/**
 * Deposit Types
 *
 * Requests, receipts and the collaborator contracts of the deposit engine.
 *
 * Rules:
 * - Amounts are bigint stroops
 * - The custody transport is the only thing that moves the asset
 * - A receipt exists only for a deposit whose transfer confirmed and
 *   whose shares were minted
 */

import type { AccountId, RiskLevel } from "@tiervault/types";

// =============================================================================
// Custody transport — the external ledger network
// =============================================================================

export interface TransferRequest {
  readonly from: AccountId;
  readonly to: AccountId;
  readonly amount: bigint;
}

/**
 * Proof that the network accepted a transfer.
 */
export interface TransferConfirmation {
  /** Network transaction identifier */
  readonly transactionId: string;
  readonly from: AccountId;
  readonly to: AccountId;
  readonly amount: bigint;
  readonly confirmedAt: string;
}

/**
 * Client of the network that holds the base asset.
 *
 * Both calls may be slow and may fail. Signing keys are the
 * implementation's concern; the engine names accounts only.
 */
export interface CustodyTransport {
  getBalance(account: AccountId): Promise<bigint>;
  transfer(request: TransferRequest): Promise<TransferConfirmation>;
}

// =============================================================================
// Deposits
// =============================================================================

export interface DepositRequest {
  readonly user: AccountId;
  readonly riskLevel: RiskLevel;

  /** Amount leaving the user's account, before the insurance fee */
  readonly grossAmount: bigint;

  /**
   * Caller-chosen key. A retried deposit with the same key returns the
   * first receipt instead of transferring and minting again.
   */
  readonly idempotencyKey?: string | undefined;
}

/**
 * Outcome of a completed deposit.
 */
export interface DepositReceipt {
  readonly depositId: string;
  readonly user: AccountId;
  readonly riskLevel: RiskLevel;
  readonly grossAmount: bigint;
  readonly insuranceCut: bigint;
  readonly netAmount: bigint;
  readonly sharesMinted: bigint;

  /** Share price the deposit was minted at (before it applied) */
  readonly sharePrice: bigint;
  readonly confirmation: TransferConfirmation;
  readonly idempotencyKey?: string | undefined;

  /** True when this receipt was returned for a repeated idempotency key */
  readonly replayed: boolean;
  readonly completedAt: string;
}

// =============================================================================
// Logging
// =============================================================================

/**
 * Structured logger accepted by the engine. A pino logger satisfies it.
 */
export interface DepositLogger {
  info(obj: Record<string, unknown>, msg: string): void;
  warn(obj: Record<string, unknown>, msg: string): void;
}
