/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 */

import type { VaultService } from "../services/vault-service.js";

/** Request header carrying the caller's deposit idempotency key */
export const IDEMPOTENCY_KEY_HEADER = "Idempotency-Key";

/** Response header set to "true" when a deposit was answered from a stored receipt */
export const IDEMPOTENT_REPLAY_HEADER = "X-Idempotent-Replay";

export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** Vault and deposit operations (set for every /api route) */
    service: VaultService;
  };
}
