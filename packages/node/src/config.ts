/**
 * @tiervault/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * XLM amounts are given as decimal strings and parsed to stroops.
 */

import { z } from "zod";
import { parseAmount, LedgerError } from "@tiervault/ledger";

// =============================================================================
// Amount fields
// =============================================================================

/**
 * Decimal XLM string ("1", "0.5") parsed to a stroop bigint.
 */
function xlmAmount(defaultValue: string) {
  return z
    .string()
    .default(defaultValue)
    .transform((value, ctx) => {
      try {
        return parseAmount(value);
      } catch (err) {
        if (!(err instanceof LedgerError)) {
          throw err;
        }
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: err.message });
        return z.NEVER;
      }
    });
}

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Custody
  CUSTODY_ADDRESS: z.string().trim().min(1).default("tiervault-custody"),
  MIN_RESERVE: xlmAmount("1"),

  // In-memory transport (development)
  DEV_STARTING_BALANCE: xlmAmount("10000"),
  TRANSFER_LATENCY_MS: z.coerce.number().int().min(0).default(0),

  // Idempotency
  IDEMPOTENCY_TTL_MS: z.coerce.number().int().min(1000).default(86400000),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if an env var is invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
