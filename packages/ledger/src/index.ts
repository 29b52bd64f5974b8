/**
 * @tiervault/ledger — Fixed-point arithmetic for vault accounting.
 *
 * Scaled-integer math at seven decimal places (stroops):
 * - Widened multiply-then-divide with floor rounding
 * - Fee (basis point) and weight (percent) slices
 * - u64 bounds on every stored result
 * - Decimal string parsing and formatting
 *
 * Design rules:
 * - No floating point
 * - Fail-closed: unrepresentable amounts throw
 * - Zero runtime dependencies
 */

export {
  UNIT,
  MAX_AMOUNT,
  BPS_DENOMINATOR,
  PERCENT_DENOMINATOR,
  assertU64,
  mulDiv,
  bpsOf,
  percentOf,
  addU64,
  parseAmount,
  formatAmount,
  parseStroops,
} from "./fixed-point.js";

export type { LedgerErrorCode } from "./types.js";
export { LedgerError } from "./types.js";
