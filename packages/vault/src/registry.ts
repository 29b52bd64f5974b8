/**
 * VaultRegistry — owns every tier's vault, the user positions and
 * the shared insurance pool.
 *
 * Constructed explicitly and handed to whoever processes deposits;
 * there is no process-wide instance.
 *
 * Rules:
 * - Exactly one vault per configured risk level
 * - Positions are created on first credit and never removed
 * - The insurance pool only grows
 */

import { addU64, assertU64 } from "@tiervault/ledger";
import { RISK_LEVELS, isRiskLevel } from "@tiervault/types";
import type { AccountId, RiskLevel } from "@tiervault/types";
import { Vault, VaultError, readStroops } from "./vault.js";
import { DEFAULT_TIERS } from "./tiers.js";
import type {
  VaultConfig,
  VaultSnapshot,
  PositionSnapshot,
  RegistrySnapshot,
} from "./types.js";

/**
 * Key for a position: one per user per tier.
 */
function positionKey(user: AccountId, riskLevel: RiskLevel): string {
  return `${user}::${riskLevel}`;
}

interface PositionRecord {
  readonly user: AccountId;
  readonly riskLevel: RiskLevel;
  shares: bigint;
  accumulatedYield: bigint;
}

function toPositionSnapshot(record: PositionRecord): PositionSnapshot {
  return {
    user: record.user,
    riskLevel: record.riskLevel,
    shares: record.shares.toString(),
    accumulatedYield: record.accumulatedYield.toString(),
  };
}

export class VaultRegistry {
  private readonly vaults: Map<RiskLevel, Vault> = new Map();
  private readonly positions: Map<string, PositionRecord> = new Map();
  private _insurancePool = 0n;

  constructor(configs: readonly VaultConfig[] = DEFAULT_TIERS) {
    for (const config of configs) {
      this.addVault(new Vault(config));
    }
  }

  private addVault(vault: Vault): void {
    if (this.vaults.has(vault.riskLevel)) {
      throw new VaultError(
        "INVALID_CONFIGURATION",
        `Duplicate vault for risk level '${vault.riskLevel}'`,
      );
    }
    this.vaults.set(vault.riskLevel, vault);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Vaults
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Get the vault for a tier. Throws VAULT_NOT_FOUND if unconfigured.
   */
  getVault(riskLevel: RiskLevel): Vault {
    const vault = this.vaults.get(riskLevel);
    if (vault === undefined) {
      throw new VaultError("VAULT_NOT_FOUND", `No vault configured for risk level '${riskLevel}'`);
    }
    return vault;
  }

  hasVault(riskLevel: RiskLevel): boolean {
    return this.vaults.has(riskLevel);
  }

  /** Configured tiers in canonical Low → High order. */
  riskLevels(): readonly RiskLevel[] {
    return RISK_LEVELS.filter((level) => this.vaults.has(level));
  }

  getVaultSnapshot(riskLevel: RiskLevel): VaultSnapshot {
    return this.getVault(riskLevel).snapshot();
  }

  listVaultSnapshots(): readonly VaultSnapshot[] {
    return this.riskLevels().map((level) => this.getVaultSnapshot(level));
  }

  // ───────────────────────────────────────────────────────────────────────
  // Insurance pool
  // ───────────────────────────────────────────────────────────────────────

  get insurancePool(): bigint {
    return this._insurancePool;
  }

  /**
   * Add a fee cut to the shared pool.
   */
  collectInsurance(cut: bigint): bigint {
    this._insurancePool = addU64(this._insurancePool, cut);
    return this._insurancePool;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Positions
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Current share balance of a user in a tier (0n when no position exists).
   */
  sharesOf(user: AccountId, riskLevel: RiskLevel): bigint {
    return this.positions.get(positionKey(user, riskLevel))?.shares ?? 0n;
  }

  /**
   * Credit minted shares, creating the position on first use.
   */
  creditShares(user: AccountId, riskLevel: RiskLevel, shares: bigint): PositionSnapshot {
    this.getVault(riskLevel);
    assertU64(shares, "shares");

    const key = positionKey(user, riskLevel);
    let record = this.positions.get(key);
    if (record === undefined) {
      record = { user, riskLevel, shares: 0n, accumulatedYield: 0n };
      this.positions.set(key, record);
    }
    record.shares = addU64(record.shares, shares);
    return toPositionSnapshot(record);
  }

  /**
   * Position of a user in a tier, or undefined when they never deposited there.
   */
  getPosition(user: AccountId, riskLevel: RiskLevel): PositionSnapshot | undefined {
    const record = this.positions.get(positionKey(user, riskLevel));
    return record === undefined ? undefined : toPositionSnapshot(record);
  }

  /**
   * All positions of a user, in tier order.
   */
  listPositions(user: AccountId): readonly PositionSnapshot[] {
    const result: PositionSnapshot[] = [];
    for (const level of RISK_LEVELS) {
      const position = this.getPosition(user, level);
      if (position !== undefined) {
        result.push(position);
      }
    }
    return result;
  }

  get positionCount(): number {
    return this.positions.size;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot (persistence)
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Take a full registry snapshot for persistence.
   */
  snapshot(): RegistrySnapshot {
    return {
      version: 1,
      vaults: this.listVaultSnapshots(),
      positions: [...this.positions.values()].map(toPositionSnapshot),
      insurancePool: this._insurancePool.toString(),
      savedAt: new Date().toISOString(),
    };
  }

  /**
   * Restore registry state from a snapshot.
   * Throws INVALID_SNAPSHOT on any malformed or inconsistent field.
   */
  static restore(snapshot: RegistrySnapshot): VaultRegistry {
    if (snapshot.version !== 1) {
      throw new VaultError(
        "INVALID_SNAPSHOT",
        `Unsupported snapshot version: ${String(snapshot.version)}`,
      );
    }

    const registry = new VaultRegistry([]);
    for (const vaultSnapshot of snapshot.vaults) {
      const vault = Vault.fromSnapshot(vaultSnapshot);
      if (registry.vaults.has(vault.riskLevel)) {
        throw new VaultError(
          "INVALID_SNAPSHOT",
          `Snapshot contains two vaults for risk level '${vault.riskLevel}'`,
        );
      }
      registry.vaults.set(vault.riskLevel, vault);
    }

    const sharesPerTier = new Map<RiskLevel, bigint>();
    for (const position of snapshot.positions) {
      if (!isRiskLevel(position.riskLevel) || !registry.vaults.has(position.riskLevel)) {
        throw new VaultError(
          "INVALID_SNAPSHOT",
          `Position for '${position.user}' references unknown risk level '${String(position.riskLevel)}'`,
        );
      }
      const key = positionKey(position.user, position.riskLevel);
      if (registry.positions.has(key)) {
        throw new VaultError("INVALID_SNAPSHOT", `Duplicate position '${key}'`);
      }
      const shares = readStroops(position.shares, `positions['${key}'].shares`);
      const accumulatedYield = readStroops(
        position.accumulatedYield,
        `positions['${key}'].accumulatedYield`,
      );
      registry.positions.set(key, {
        user: position.user,
        riskLevel: position.riskLevel,
        shares,
        accumulatedYield,
      });
      sharesPerTier.set(
        position.riskLevel,
        (sharesPerTier.get(position.riskLevel) ?? 0n) + shares,
      );
    }

    for (const [level, vault] of registry.vaults) {
      const held = sharesPerTier.get(level) ?? 0n;
      if (held !== vault.totalShares) {
        throw new VaultError(
          "INVALID_SNAPSHOT",
          `Vault '${level}': positions hold ${held.toString()} shares, vault reports ${vault.totalShares.toString()}`,
        );
      }
    }

    registry._insurancePool = readStroops(snapshot.insurancePool, "insurancePool");
    return registry;
  }
}
