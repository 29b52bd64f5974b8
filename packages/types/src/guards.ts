/**
 * Runtime Type Guards
 *
 * Narrowing functions for TierVault domain types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, deserialized snapshots, configuration files).
 */

import type { RiskLevel, StrategyKind } from "./risk.js";
import { RISK_LEVELS, STRATEGY_KINDS } from "./risk.js";

// =============================================================================
// Risk guards
// =============================================================================

const RISK_LEVEL_SET = new Set<string>(RISK_LEVELS);
const STRATEGY_KIND_SET = new Set<string>(STRATEGY_KINDS);

/**
 * Shorthands accepted when a human types a tier.
 */
const RISK_ALIASES: ReadonlyMap<string, RiskLevel> = new Map<string, RiskLevel>([
  ["low", "low"],
  ["l", "low"],
  ["1", "low"],
  ["medium", "medium"],
  ["m", "medium"],
  ["2", "medium"],
  ["high", "high"],
  ["h", "high"],
  ["3", "high"],
]);

export function isRiskLevel(value: unknown): value is RiskLevel {
  return typeof value === "string" && RISK_LEVEL_SET.has(value);
}

export function isStrategyKind(value: unknown): value is StrategyKind {
  return typeof value === "string" && STRATEGY_KIND_SET.has(value);
}

/**
 * Parse user-supplied tier text ("Low", "m", "3", ...).
 * Returns undefined when the text names no tier.
 */
export function parseRiskLevel(input: string): RiskLevel | undefined {
  return RISK_ALIASES.get(input.trim().toLowerCase());
}

// =============================================================================
// Amount guards
// =============================================================================

/**
 * True for a non-negative integer string ("0", "995000000").
 * Used for stroop amounts carried as strings in snapshots.
 */
export function isIntegerString(value: unknown): value is string {
  return typeof value === "string" && /^\d+$/.test(value);
}
