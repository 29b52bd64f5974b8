/**
 * Default tier configuration.
 *
 * Low    — 0.50% insurance, all funds to YieldBlox lending
 * Medium — 1.00% insurance, 60% Aqua liquidity pool / 40% YieldBlox lending
 * High   — 2.00% insurance, all funds to a money market
 */

import type { VaultConfig } from "./types.js";

export const DEFAULT_TIERS: readonly VaultConfig[] = [
  {
    riskLevel: "low",
    insuranceFeeBps: 50,
    strategies: [
      {
        kind: "lending-market",
        name: "YieldBlox Lending",
        allocationPercentage: 100,
        apyBps: 350,
      },
    ],
  },
  {
    riskLevel: "medium",
    insuranceFeeBps: 100,
    strategies: [
      {
        kind: "liquidity-pool",
        name: "Aqua Liquidity Pool",
        allocationPercentage: 60,
        apyBps: 850,
      },
      {
        kind: "lending-market",
        name: "YieldBlox Lending",
        allocationPercentage: 40,
        apyBps: 400,
      },
    ],
  },
  {
    riskLevel: "high",
    insuranceFeeBps: 200,
    strategies: [
      {
        kind: "money-market",
        name: "Money Market",
        allocationPercentage: 100,
        apyBps: 1500,
      },
    ],
  },
];
