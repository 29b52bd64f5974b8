/**
 * @tiervault/deposit — Deposit pipeline.
 *
 * Moves a user's XLM to the custody account, takes the tier's
 * insurance fee, mints shares on the remainder and routes it across
 * the tier's strategies.
 *
 * Design rules:
 * - No registry change before the transfer confirms
 * - Deposits into one tier are serialized; tiers run independently
 * - The network client sits behind the CustodyTransport interface
 */

// Engine
export { DepositEngine, DepositError } from "./deposit-engine.js";
export type {
  DepositEngineOptions,
  DepositErrorCode,
  DepositErrorDetails,
} from "./deposit-engine.js";

// Collaborators
export { TierLock } from "./tier-lock.js";
export { InMemoryReceiptStore, DEFAULT_RECEIPT_TTL_MS } from "./receipts.js";
export type { ReceiptStore, StoredReceipt } from "./receipts.js";
export { InMemoryTransport, TransportError } from "./transport.js";
export type { InMemoryTransportOptions, TransportErrorCode } from "./transport.js";

// Types
export type {
  TransferRequest,
  TransferConfirmation,
  CustodyTransport,
  DepositRequest,
  DepositReceipt,
  DepositLogger,
} from "./types.js";
