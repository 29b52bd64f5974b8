/**
 * Financial Types
 *
 * Core financial primitives for the vault ledger.
 *
 * Rules:
 * - Every amount is an unsigned integer count of stroops (1 XLM = 10^7)
 * - In memory amounts are bigint; on the wire they are decimal strings
 * - No floating point anywhere in the ledger path
 */

/** Ticker of the single base asset the vaults accept. */
export const BASE_ASSET = "XLM";

/** Decimal places of the base asset (stroops). */
export const BASE_ASSET_DECIMALS = 7;

/**
 * A scaled-integer amount in stroops.
 * Alias kept for readability at API seams.
 */
export type Stroops = bigint;

/**
 * Identifier of an account on the external ledger network
 * (a depositor or the vault's custody account).
 */
export type AccountId = string;
