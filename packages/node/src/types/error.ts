/**
 * Error envelope types for API responses.
 *
 * All error responses follow the shape:
 * { error: { code, message, details? } }
 *
 * `code` is either one of the HTTP-layer codes below or the `code` of
 * the domain error that failed the request.
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Codes produced by the HTTP layer itself. Domain codes
 * (VAULT_NOT_FOUND, TRANSFER_FAILED, ...) pass through unchanged.
 */
export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "INTERNAL_ERROR";

// =============================================================================
// Error Response
// =============================================================================

export interface ErrorDetail {
  readonly code: ApiErrorCode | string;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Build an envelope. Empty details are left out.
 */
export function createErrorEnvelope(
  code: ApiErrorCode | string,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  if (details === undefined || Object.keys(details).length === 0) {
    return { error: { code, message } };
  }
  return { error: { code, message, details } };
}
