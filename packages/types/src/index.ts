/**
 * @tiervault/types — Shared domain types for the TierVault stack.
 *
 * Design rules:
 * - Closed unions for tiers and strategy kinds
 * - No runtime dependencies
 * - Guards validate data crossing a process boundary
 */

// Risk tiers & strategies
export type { RiskLevel, StrategyKind } from "./risk.js";
export { RISK_LEVELS, STRATEGY_KINDS, riskLevelLabel } from "./risk.js";

// Financial primitives
export type { Stroops, AccountId } from "./financial.js";
export { BASE_ASSET, BASE_ASSET_DECIMALS } from "./financial.js";

// Runtime type guards
export {
  isRiskLevel,
  isStrategyKind,
  parseRiskLevel,
  isIntegerString,
} from "./guards.js";
