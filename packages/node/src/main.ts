/**
 * @tiervault/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { pathToFileURL } from "node:url";
import { serve } from "@hono/node-server";
import pino from "pino";
import { formatAmount } from "@tiervault/ledger";
import { InMemoryTransport } from "@tiervault/deposit";
import { loadConfig } from "./config.js";
import { createApp } from "./app.js";

// =============================================================================
// Re-exports (package public API)
// =============================================================================

export { VaultService, toReceiptDto } from "./services/vault-service.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp, DEFAULT_CUSTODY_ADDRESS } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./types/index.js";

// =============================================================================
// Bootstrap
// =============================================================================

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  // No network client is bundled; deposits settle in process
  const transport = new InMemoryTransport({
    startingBalance: config.DEV_STARTING_BALANCE,
    latencyMs: config.TRANSFER_LATENCY_MS,
  });
  logger.warn(
    { startingBalance: formatAmount(config.DEV_STARTING_BALANCE) },
    "Using in-memory custody transport",
  );

  const { app, registry } = createApp({
    transport,
    custodyAddress: config.CUSTODY_ADDRESS,
    minReserve: config.MIN_RESERVE,
    idempotencyTtlMs: config.IDEMPOTENCY_TTL_MS,
    logger: logger.child({ component: "deposit-engine" }),
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    onUnexpectedError: (err, c) => {
      logger.error({ err, requestId: c.get("requestId") }, "Unhandled error");
    },
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      custody: config.CUSTODY_ADDRESS,
      tiers: registry.riskLevels(),
    },
    "TierVault node started",
  );

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
      logger.info(
        { insurancePool: formatAmount(registry.insurancePool), positions: registry.positionCount },
        "Shutdown complete",
      );
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

// Only run when executed directly (not when imported)
const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  main().catch((err: unknown) => {
    // eslint-disable-next-line no-console
    console.error("Fatal startup error:", err);
    process.exit(1);
  });
}
