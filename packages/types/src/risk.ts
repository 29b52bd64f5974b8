/**
 * Risk & Strategy Types
 *
 * The set of risk tiers and yield venues is closed and known up front,
 * so both are string unions rather than extensible hierarchies.
 *
 * Rules:
 * - Tier order is Low → Medium → High everywhere (listing, snapshots)
 * - Strategy kinds are descriptive only; accounting never branches on them
 */

/**
 * A risk tier. Each tier owns exactly one vault.
 */
export type RiskLevel = "low" | "medium" | "high";

/** All risk tiers in canonical order. */
export const RISK_LEVELS: readonly RiskLevel[] = ["low", "medium", "high"] as const;

/**
 * The kind of yield venue a strategy routes funds to.
 */
export type StrategyKind =
  | "liquidity-pool"   // AMM liquidity provision
  | "lending-market"   // Over-collateralized lending
  | "money-market";    // Short-duration money market

export const STRATEGY_KINDS: readonly StrategyKind[] = [
  "liquidity-pool",
  "lending-market",
  "money-market",
] as const;

/** Human-readable tier label ("Low", "Medium", "High"). */
export function riskLevelLabel(level: RiskLevel): string {
  switch (level) {
    case "low":
      return "Low";
    case "medium":
      return "Medium";
    case "high":
      return "High";
  }
}
