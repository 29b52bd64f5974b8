/**
 * Property-Based Tests for @tiervault/vault
 *
 * Uses fast-check to verify invariants over arbitrary deposit sequences,
 * starting from vaults that already hold value above one stroop per share:
 *
 * 1. totalValue and totalShares never decrease
 * 2. Share price never decreases
 * 3. Minted shares never exceed the exact entitlement
 * 4. totalValue = sum(strategy allocations) + unallocated, remainder bounded
 * 5. Pricing is idempotent
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { Vault } from "../src/vault.js";
import { DEFAULT_TIERS } from "../src/tiers.js";
import type { VaultConfig } from "../src/types.js";

interface SeedState {
  readonly shares: bigint;
  readonly value: bigint;
}

// =============================================================================
// Arbitraries
// =============================================================================

const UNIT = 10_000_000n;

/** Net deposits from one stroop up to a billion XLM. */
const arbNetAmount = fc.bigInt({ min: 1n, max: 10n ** 16n });

const arbDeposits = fc.array(arbNetAmount, { minLength: 1, maxLength: 25 });

const arbTier = fc.constantFrom(...DEFAULT_TIERS);

/**
 * Outstanding shares worth 1.01x to 10x their face value, so the
 * starting price sits strictly above UNIT.
 */
const arbSeedState: fc.Arbitrary<SeedState> = fc
  .tuple(fc.bigInt({ min: 10_000n, max: 10n ** 14n }), fc.integer({ min: 101, max: 1000 }))
  .map(([shares, percent]) => ({ shares, value: (shares * BigInt(percent)) / 100n }));

function seededVault(config: VaultConfig, state: SeedState): Vault {
  const empty = new Vault(config).snapshot();
  return Vault.fromSnapshot({
    ...empty,
    totalValue: state.value.toString(),
    totalShares: state.shares.toString(),
  });
}

/** A strategy mix with 1-4 weights summing to 100. */
const arbSplitConfig: fc.Arbitrary<VaultConfig> = fc
  .array(fc.integer({ min: 1, max: 97 }), { minLength: 0, maxLength: 3 })
  .map((cuts) => {
    const points = [...new Set(cuts)].sort((a, b) => a - b);
    const bounds = [0, ...points, 100];
    const weights = bounds.slice(1).map((b, i) => b - (bounds[i] ?? 0));
    return {
      riskLevel: "medium" as const,
      insuranceFeeBps: 100,
      strategies: weights.map((w, i) => ({
        kind: "liquidity-pool" as const,
        name: `S${String(i)}`,
        allocationPercentage: w,
        apyBps: 0,
      })),
    };
  });

// =============================================================================
// Properties
// =============================================================================

describe("property: monotonic totals", () => {
  it("totalValue, totalShares and share price never decrease", () => {
    fc.assert(
      fc.property(arbTier, arbSeedState, arbDeposits, (config, state, deposits) => {
        const vault = seededVault(config, state);
        expect(vault.getSharePrice() > UNIT).toBe(true);

        let value = vault.totalValue;
        let shares = vault.totalShares;
        let price = vault.getSharePrice();

        for (const net of deposits) {
          vault.allocateDeposit(net);
          expect(vault.totalValue >= value).toBe(true);
          expect(vault.totalShares >= shares).toBe(true);
          expect(vault.getSharePrice() >= price).toBe(true);
          value = vault.totalValue;
          shares = vault.totalShares;
          price = vault.getSharePrice();
        }
      }),
      { numRuns: 200 },
    );
  });
});

describe("property: floor minting", () => {
  it("minted shares never exceed net * UNIT / price in exact arithmetic", () => {
    fc.assert(
      fc.property(arbTier, arbSeedState, arbDeposits, (config, state, deposits) => {
        const vault = seededVault(config, state);
        for (const net of deposits) {
          const price = vault.getSharePrice();
          const minted = vault.allocateDeposit(net);
          // minted <= net * UNIT / price  ⇔  minted * price <= net * UNIT
          expect(minted * price <= net * UNIT).toBe(true);
          expect((minted + 1n) * price > net * UNIT).toBe(true);
          expect(vault.getSharePrice() >= price).toBe(true);
        }
      }),
      { numRuns: 200 },
    );
  });
});

describe("property: allocation accounting", () => {
  it("totalValue equals allocations plus a remainder of fewer stroops than strategies per deposit", () => {
    fc.assert(
      fc.property(arbSplitConfig, arbDeposits, (config, deposits) => {
        const vault = new Vault(config);
        for (const net of deposits) {
          vault.allocateDeposit(net);
        }

        const allocated = vault.strategies.reduce((s, st) => s + st.totalAllocated, 0n);
        expect(allocated + vault.unallocated()).toBe(vault.totalValue);
        expect(vault.unallocated() >= 0n).toBe(true);
        const slack = BigInt(deposits.length * (config.strategies.length - 1));
        expect(vault.unallocated() <= slack).toBe(true);
      }),
      { numRuns: 200 },
    );
  });

  it("percentages of every generated mix sum to 100", () => {
    fc.assert(
      fc.property(arbSplitConfig, (config) => {
        const vault = new Vault(config);
        const total = vault.strategies.reduce((s, st) => s + st.allocationPercentage, 0);
        expect(total).toBe(100);
      }),
    );
  });
});

describe("property: pricing is idempotent", () => {
  it("two reads with no deposit between them agree", () => {
    fc.assert(
      fc.property(arbTier, arbSeedState, arbDeposits, (config, state, deposits) => {
        const vault = seededVault(config, state);
        for (const net of deposits) {
          vault.allocateDeposit(net);
        }
        expect(vault.getSharePrice()).toBe(vault.getSharePrice());
      }),
    );
  });
});
