/**
 * Vault — one risk tier's pool of shares.
 *
 * Holds the tier's total value, shares outstanding and weighted
 * strategies. Prices shares and applies net deposits.
 *
 * Rules:
 * - Strategy percentages sum to exactly 100 (checked at construction)
 * - Share price = totalValue * UNIT / totalShares, or UNIT when empty
 * - Minting floors: a depositor never receives more than their entitlement
 * - Each strategy slice floors independently; the remainder stays in
 *   totalValue and is routed to no strategy
 * - A deposit is fully validated before any field changes
 */

import {
  UNIT,
  addU64,
  assertU64,
  mulDiv,
  parseStroops,
  LedgerError,
} from "@tiervault/ledger";
import {
  isRiskLevel,
  isStrategyKind,
  isIntegerString,
} from "@tiervault/types";
import type { RiskLevel } from "@tiervault/types";
import { Strategy } from "./strategy.js";
import type {
  VaultConfig,
  VaultSnapshot,
  DepositPreview,
  StrategyView,
} from "./types.js";

// =============================================================================
// Error
// =============================================================================

export class VaultError extends Error {
  public readonly code: VaultErrorCode;
  constructor(code: VaultErrorCode, message: string) {
    super(message);
    this.name = "VaultError";
    this.code = code;
  }
}

export type VaultErrorCode =
  | "INVALID_CONFIGURATION"
  | "VAULT_NOT_FOUND"
  | "INVALID_AMOUNT"
  | "INVALID_SNAPSHOT";

// =============================================================================
// Configuration checks
// =============================================================================

function isWholeNumber(value: number, min: number, max: number): boolean {
  return Number.isInteger(value) && value >= min && value <= max;
}

/**
 * Reject a tier configuration the accounting cannot honour.
 */
export function validateVaultConfig(config: VaultConfig): void {
  const tier = String(config.riskLevel);

  if (!isRiskLevel(config.riskLevel)) {
    throw new VaultError("INVALID_CONFIGURATION", `Unknown risk level '${tier}'`);
  }

  if (!isWholeNumber(config.insuranceFeeBps, 0, 9_999)) {
    throw new VaultError(
      "INVALID_CONFIGURATION",
      `Vault '${tier}': insurance fee must be an integer in [0, 10000) bps, got ${String(config.insuranceFeeBps)}`,
    );
  }

  if (config.strategies.length === 0) {
    throw new VaultError("INVALID_CONFIGURATION", `Vault '${tier}' has no strategies`);
  }

  let totalPercentage = 0;
  for (const strategy of config.strategies) {
    if (!isStrategyKind(strategy.kind)) {
      throw new VaultError(
        "INVALID_CONFIGURATION",
        `Vault '${tier}': unknown strategy kind '${String(strategy.kind)}'`,
      );
    }
    if (!isWholeNumber(strategy.allocationPercentage, 0, 100)) {
      throw new VaultError(
        "INVALID_CONFIGURATION",
        `Vault '${tier}': allocation for '${strategy.name}' must be an integer 0-100, got ${String(strategy.allocationPercentage)}`,
      );
    }
    if (!isWholeNumber(strategy.apyBps, 0, Number.MAX_SAFE_INTEGER)) {
      throw new VaultError(
        "INVALID_CONFIGURATION",
        `Vault '${tier}': APY for '${strategy.name}' must be a non-negative integer of bps`,
      );
    }
    totalPercentage += strategy.allocationPercentage;
  }

  if (totalPercentage !== 100) {
    throw new VaultError(
      "INVALID_CONFIGURATION",
      `Vault '${tier}': strategy allocations total ${String(totalPercentage)}%, expected 100%`,
    );
  }
}

// =============================================================================
// Vault
// =============================================================================

export class Vault {
  readonly riskLevel: RiskLevel;
  readonly insuranceFeeBps: number;
  private readonly _strategies: readonly Strategy[];
  /** Running total per strategy, same order as _strategies */
  private _allocated: readonly bigint[];
  private _totalValue = 0n;
  private _totalShares = 0n;

  constructor(config: VaultConfig) {
    validateVaultConfig(config);
    this.riskLevel = config.riskLevel;
    this.insuranceFeeBps = config.insuranceFeeBps;
    this._strategies = config.strategies.map((s) => new Strategy(s));
    this._allocated = this._strategies.map(() => 0n);
  }

  get totalValue(): bigint {
    return this._totalValue;
  }

  get totalShares(): bigint {
    return this._totalShares;
  }

  get strategies(): readonly StrategyView[] {
    return this._strategies.map((s, i) => s.view(this.allocatedTo(i)));
  }

  private allocatedTo(index: number): bigint {
    return this._allocated[index] ?? 0n;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Pricing
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Price of one share in stroops. UNIT for an empty vault.
   */
  getSharePrice(): bigint {
    if (this._totalShares === 0n) {
      return UNIT;
    }
    return mulDiv(this._totalValue, UNIT, this._totalShares);
  }

  /**
   * Compute shares and strategy slices for a net deposit without
   * touching state. Throws if the resulting totals would not fit u64.
   */
  previewDeposit(netAmount: bigint): DepositPreview {
    if (netAmount <= 0n) {
      throw new VaultError(
        "INVALID_AMOUNT",
        `Vault '${this.riskLevel}': net deposit must be positive, got ${netAmount.toString()}`,
      );
    }
    assertU64(netAmount, "net amount");

    const sharePrice = this.getSharePrice();
    const sharesMinted = mulDiv(netAmount, UNIT, sharePrice);

    addU64(this._totalValue, netAmount);
    addU64(this._totalShares, sharesMinted);

    const allocations = this._strategies.map((strategy, i) => {
      const slice = strategy.sliceOf(netAmount);
      addU64(this.allocatedTo(i), slice);
      return slice;
    });
    const allocated = allocations.reduce((sum, a) => sum + a, 0n);

    return {
      sharePrice,
      sharesMinted,
      allocations,
      remainder: netAmount - allocated,
    };
  }

  /**
   * Apply a net (post-fee) deposit and return the shares minted.
   */
  allocateDeposit(netAmount: bigint): bigint {
    const preview = this.previewDeposit(netAmount);

    this._totalValue += netAmount;
    this._totalShares += preview.sharesMinted;

    this._allocated = this._allocated.map((total, i) => total + (preview.allocations[i] ?? 0n));

    return preview.sharesMinted;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Stroops held by the vault but routed to no strategy.
   */
  unallocated(): bigint {
    const allocated = this._allocated.reduce((sum, total) => sum + total, 0n);
    return this._totalValue - allocated;
  }

  snapshot(): VaultSnapshot {
    return {
      riskLevel: this.riskLevel,
      totalValue: this._totalValue.toString(),
      totalShares: this._totalShares.toString(),
      sharePrice: this.getSharePrice().toString(),
      insuranceFeeBps: this.insuranceFeeBps,
      strategies: this._strategies.map((s, i) => s.snapshot(this.allocatedTo(i))),
      unallocated: this.unallocated().toString(),
    };
  }

  /**
   * Rebuild a vault from a snapshot, re-validating its configuration
   * and the accounting relations between its totals.
   */
  static fromSnapshot(snapshot: VaultSnapshot): Vault {
    let vault: Vault;
    try {
      vault = new Vault({
        riskLevel: snapshot.riskLevel,
        insuranceFeeBps: snapshot.insuranceFeeBps,
        strategies: snapshot.strategies.map((s) => ({
          kind: s.kind,
          name: s.name,
          allocationPercentage: s.allocationPercentage,
          apyBps: s.apyBps,
        })),
      });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new VaultError("INVALID_SNAPSHOT", `Invalid vault configuration in snapshot: ${reason}`);
    }

    const tier = snapshot.riskLevel;
    const totalValue = readStroops(snapshot.totalValue, `${tier}.totalValue`);
    const totalShares = readStroops(snapshot.totalShares, `${tier}.totalShares`);

    const totals = snapshot.strategies.map((s, i) =>
      readStroops(s.totalAllocated, `${tier}.strategies[${String(i)}].totalAllocated`),
    );
    const allocated = totals.reduce((sum, total) => sum + total, 0n);

    if (allocated > totalValue) {
      throw new VaultError(
        "INVALID_SNAPSHOT",
        `Vault '${tier}': strategy allocations (${allocated.toString()}) exceed total value (${totalValue.toString()})`,
      );
    }
    if (totalShares === 0n && totalValue > 0n) {
      throw new VaultError(
        "INVALID_SNAPSHOT",
        `Vault '${tier}': holds value but has no shares outstanding`,
      );
    }
    if (totalShares > 0n && totalValue * UNIT < totalShares) {
      throw new VaultError(
        "INVALID_SNAPSHOT",
        `Vault '${tier}': share price would round to zero`,
      );
    }

    vault._allocated = totals;
    vault._totalValue = totalValue;
    vault._totalShares = totalShares;
    return vault;
  }
}

/**
 * Read a stroop amount from snapshot data, mapping failures to INVALID_SNAPSHOT.
 */
export function readStroops(value: unknown, field: string): bigint {
  if (!isIntegerString(value)) {
    throw new VaultError("INVALID_SNAPSHOT", `Snapshot field ${field} must be an integer string`);
  }
  try {
    return parseStroops(value);
  } catch (err) {
    if (err instanceof LedgerError) {
      throw new VaultError("INVALID_SNAPSHOT", `Snapshot field ${field}: ${err.message}`);
    }
    throw err;
  }
}
