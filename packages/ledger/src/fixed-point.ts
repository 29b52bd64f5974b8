/**
 * @tiervault/ledger — Deterministic fixed-point arithmetic.
 *
 * Every amount and share count is an unsigned integer scaled by 10^7
 * (one XLM = 10,000,000 stroops). Ratios are computed as a widened
 * `a * b / d` on bigint, floor-divided, then narrowed back to the
 * unsigned 64-bit range the ledger stores.
 *
 * Rules:
 * - No floating-point operations
 * - Division always floors (truncates toward zero on non-negatives)
 * - Results outside [0, 2^64) throw AMOUNT_OVERFLOW
 * - Zero runtime dependencies
 */

import { BASE_ASSET_DECIMALS } from "@tiervault/types";
import { LedgerError } from "./types.js";

// ─── Constants ───────────────────────────────────────────────────────────

/** One whole unit of the base asset, in stroops. Also the bootstrap share price. */
export const UNIT = 10_000_000n;

/** Largest value the ledger can store (u64::MAX). */
export const MAX_AMOUNT = 2n ** 64n - 1n;

/** Denominator for basis-point rates. */
export const BPS_DENOMINATOR = 10_000n;

/** Denominator for whole-percent weights. */
export const PERCENT_DENOMINATOR = 100n;

// ─── Bounds ──────────────────────────────────────────────────────────────

/**
 * Assert a value fits the stored unsigned 64-bit range.
 * Returns the value unchanged so it can wrap an expression.
 */
export function assertU64(value: bigint, label = "amount"): bigint {
  if (value < 0n) {
    throw new LedgerError("INVALID_AMOUNT", `${label} must not be negative, got ${value.toString()}`);
  }
  if (value > MAX_AMOUNT) {
    throw new LedgerError("AMOUNT_OVERFLOW", `${label} exceeds u64 range: ${value.toString()}`);
  }
  return value;
}

// ─── Ratio Math ──────────────────────────────────────────────────────────

/**
 * Compute floor(a * b / d) and narrow the result to u64.
 *
 * Operands are checked before the multiply; the intermediate product
 * may exceed u64, the quotient may not.
 */
export function mulDiv(a: bigint, b: bigint, d: bigint): bigint {
  assertU64(a, "multiplicand");
  assertU64(b, "multiplier");
  if (d <= 0n) {
    throw new LedgerError("DIVISION_BY_ZERO", `Divisor must be positive, got ${d.toString()}`);
  }
  return assertU64((a * b) / d, "quotient");
}

/**
 * Fee cut of an amount at a basis-point rate: floor(amount * bps / 10000).
 */
export function bpsOf(amount: bigint, bps: number): bigint {
  return mulDiv(amount, BigInt(bps), BPS_DENOMINATOR);
}

/**
 * Weighted slice of an amount: floor(amount * percent / 100).
 */
export function percentOf(amount: bigint, percent: number): bigint {
  return mulDiv(amount, BigInt(percent), PERCENT_DENOMINATOR);
}

/**
 * Checked addition for stored totals.
 */
export function addU64(a: bigint, b: bigint): bigint {
  return assertU64(assertU64(a) + assertU64(b), "sum");
}

// ─── Parsing & Formatting ────────────────────────────────────────────────

/**
 * Parse a non-negative decimal string into stroops.
 *
 * "100" → 1000000000n
 * "0.5" → 5000000n
 * "1.0000001" → 10000001n
 */
export function parseAmount(amount: string, decimals: number = BASE_ASSET_DECIMALS): bigint {
  const trimmed = amount.trim();
  if (trimmed === "") {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${amount}"`);
  }

  // Digits with an optional fractional part; no sign, no exponent
  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const [intPart = "0", fracPart = ""] = trimmed.split(".");

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but the asset allows ${String(decimals)}`,
    );
  }

  const scaled = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  return assertU64(scaled);
}

/**
 * Convert stroops back to a fixed-width decimal string.
 *
 * 1000000000n → "100.0000000"
 * 5n → "0.0000005"
 */
export function formatAmount(scaled: bigint, decimals: number = BASE_ASSET_DECIMALS): string {
  assertU64(scaled);
  if (decimals === 0) {
    return scaled.toString();
  }

  const str = scaled.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  return `${intPart}.${fracPart}`;
}

/**
 * Parse a stored integer string ("995000000") back into stroops.
 */
export function parseStroops(value: string): bigint {
  if (!/^\d+$/.test(value)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid stroop amount: "${value}"`);
  }
  return assertU64(BigInt(value));
}
