/**
 * @tiervault/ledger — Error types for the fixed-point layer.
 *
 * Rules:
 * - Fail-closed: an amount that cannot be represented exactly throws
 * - Errors carry a machine-readable code
 */

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for fixed-point operations. */
export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "AMOUNT_OVERFLOW"
  | "DIVISION_BY_ZERO";

/**
 * Structured error from the fixed-point layer.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
