/**
 * Vault Types
 *
 * Domain types for the risk-tiered vaults.
 * The registry operates three kinds of state:
 *
 * 1. Vaults — one per risk tier, each with weighted strategies
 * 2. Positions — shares held per (user, risk tier)
 * 3. Insurance pool — fee cuts collected across all tiers
 *
 * Rules:
 * - Configuration is readonly after construction
 * - Snapshot amounts are integer strings of stroops (JSON-safe)
 * - Live amounts are bigint
 */

import type { RiskLevel, StrategyKind, AccountId } from "@tiervault/types";

// =============================================================================
// Configuration
// =============================================================================

/**
 * A yield venue and its fixed share of every net deposit.
 */
export interface StrategyConfig {
  readonly kind: StrategyKind;

  /** Display name of the venue (e.g., "Aqua Liquidity Pool") */
  readonly name: string;

  /** Whole percent of each net deposit routed here (0-100) */
  readonly allocationPercentage: number;

  /** Advertised yield in basis points. Informational only. */
  readonly apyBps: number;
}

/**
 * Fixed configuration of one risk tier.
 */
export interface VaultConfig {
  readonly riskLevel: RiskLevel;

  /** Insurance fee in basis points (50 = 0.50%), below 10000 */
  readonly insuranceFeeBps: number;

  /** Ordered strategies; percentages must sum to exactly 100 */
  readonly strategies: readonly StrategyConfig[];
}

// =============================================================================
// Snapshots — read models and persistence
// =============================================================================

export interface StrategySnapshot extends StrategyConfig {
  /** Cumulative stroops routed to this strategy */
  readonly totalAllocated: string;

  /** Reserved for yield accrual; always "0" */
  readonly currentYield: string;
}

/**
 * Live read model of a strategy. A copy: holding one never lets a
 * caller change the vault it came from.
 */
export interface StrategyView extends StrategyConfig {
  readonly totalAllocated: bigint;
  readonly currentYield: bigint;
}

/**
 * Point-in-time view of a vault.
 */
export interface VaultSnapshot {
  readonly riskLevel: RiskLevel;
  readonly totalValue: string;
  readonly totalShares: string;

  /** Price of one share in stroops (10000000 = 1.0) */
  readonly sharePrice: string;
  readonly insuranceFeeBps: number;
  readonly strategies: readonly StrategySnapshot[];

  /**
   * Floor-rounding remainder: totalValue minus the sum of
   * strategy allocations. Held by the vault, routed to no strategy.
   */
  readonly unallocated: string;
}

/**
 * Shares a user holds in one tier.
 */
export interface PositionSnapshot {
  readonly user: AccountId;
  readonly riskLevel: RiskLevel;
  readonly shares: string;

  /** Reserved for yield accrual; always "0" */
  readonly accumulatedYield: string;
}

/**
 * Complete registry state for persistence.
 */
export interface RegistrySnapshot {
  readonly version: 1;
  readonly vaults: readonly VaultSnapshot[];
  readonly positions: readonly PositionSnapshot[];
  readonly insurancePool: string;
  readonly savedAt: string;
}

// =============================================================================
// Deposit preview
// =============================================================================

/**
 * What a net deposit would do to a vault, computed without mutation.
 */
export interface DepositPreview {
  /** Share price before the deposit */
  readonly sharePrice: bigint;
  readonly sharesMinted: bigint;

  /** Per-strategy allocation, in strategy order */
  readonly allocations: readonly bigint[];

  /** netAmount minus the sum of allocations */
  readonly remainder: bigint;
}
