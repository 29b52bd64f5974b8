/**
 * Type barrel — re-exports all public types from @tiervault/node.
 */

// DTOs
export { DepositSchema } from "./dto.js";
export type { DepositDto, DepositReceiptDto, InsurancePoolDto } from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export { IDEMPOTENCY_KEY_HEADER, IDEMPOTENT_REPLAY_HEADER } from "./api-contract.js";
export type { AppEnv } from "./api-contract.js";
