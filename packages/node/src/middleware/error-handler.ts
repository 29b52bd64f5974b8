/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps known domain errors (LedgerError, VaultError, DepositError)
 * to HTTP status codes by their `code`.
 */

import type { Context, ErrorHandler } from "hono";
import { DepositError } from "@tiervault/deposit";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

type ErrorStatus = 400 | 404 | 409 | 422 | 500 | 502;

const STATUS_MAP: Readonly<Record<string, ErrorStatus>> = {
  // Ledger errors
  INVALID_AMOUNT: 400,
  AMOUNT_OVERFLOW: 400,
  DIVISION_BY_ZERO: 500,

  // Vault errors
  INVALID_CONFIGURATION: 500,
  VAULT_NOT_FOUND: 404,
  INVALID_SNAPSHOT: 400,

  // Deposit errors
  INVALID_USER: 400,
  INSUFFICIENT_FUNDS: 422,
  TRANSFER_FAILED: 502,
  IDEMPOTENCY_CONFLICT: 409,
};

function getErrorCode(error: Error): string | undefined {
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Build the app's onError handler. `onUnexpected` receives every error
 * answered with 500, since its message is not sent to the client.
 */
export function createErrorHandler(
  onUnexpected?: (err: Error, c: Context<AppEnv>) => void,
): ErrorHandler<AppEnv> {
  return (err, c) => {
    const code = getErrorCode(err);
    const status = (code !== undefined ? STATUS_MAP[code] : undefined) ?? 500;

    if (status === 500) {
      onUnexpected?.(err, c);
      return c.json(
        createErrorEnvelope(code ?? "INTERNAL_ERROR", "Internal server error"),
        500,
      );
    }

    const details = err instanceof DepositError ? { ...err.details } : undefined;
    return c.json(createErrorEnvelope(code ?? "INTERNAL_ERROR", err.message, details), status);
  };
}
