/**
 * @tiervault/vault — Risk-tiered vaults.
 *
 * One vault per risk tier, each pricing its shares from total value
 * and shares outstanding and splitting net deposits across weighted
 * strategies. The registry owns the vaults, the per-user positions
 * and the shared insurance pool.
 *
 * Design rules:
 * - Closed set of tiers; configuration fixed at construction
 * - All arithmetic via @tiervault/ledger fixed-point math
 * - All state is snapshot-able and restorable
 */

// Registry
export { VaultRegistry } from "./registry.js";

// Vaults & strategies
export { Vault, VaultError, validateVaultConfig } from "./vault.js";
export type { VaultErrorCode } from "./vault.js";
export { DEFAULT_TIERS } from "./tiers.js";

// Types
export type {
  StrategyConfig,
  VaultConfig,
  StrategySnapshot,
  StrategyView,
  VaultSnapshot,
  PositionSnapshot,
  RegistrySnapshot,
  DepositPreview,
} from "./types.js";
