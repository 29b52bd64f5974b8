/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests can create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { Context } from "hono";
import { VaultRegistry } from "@tiervault/vault";
import { DepositEngine, InMemoryReceiptStore } from "@tiervault/deposit";
import type { CustodyTransport, DepositLogger } from "@tiervault/deposit";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import { VaultService } from "./services/vault-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { createHealthRoutes } from "./routes/health.js";
import { createVaultRoutes } from "./routes/vaults.js";
import { createDepositRoutes } from "./routes/deposits.js";
import { createPositionRoutes } from "./routes/positions.js";
import { createInsuranceRoutes } from "./routes/insurance.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  /** Network client moving deposits into custody */
  readonly transport: CustodyTransport;

  /** Vault state. Default: a fresh registry with the default tiers */
  readonly registry?: VaultRegistry | undefined;
  readonly custodyAddress?: string | undefined;
  readonly minReserve?: bigint | undefined;
  readonly idempotencyTtlMs?: number | undefined;

  /** Per-request log entries */
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;

  /** Deposit engine logger */
  readonly logger?: DepositLogger | undefined;

  /** Errors answered with 500 */
  readonly onUnexpectedError?: ((err: Error, c: Context<AppEnv>) => void) | undefined;
}

export const DEFAULT_CUSTODY_ADDRESS = "tiervault-custody";

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly registry: VaultRegistry;
  readonly engine: DepositEngine;
  readonly service: VaultService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const registry = options.registry ?? new VaultRegistry();
  const engine = new DepositEngine({
    registry,
    transport: options.transport,
    custodyAddress: options.custodyAddress ?? DEFAULT_CUSTODY_ADDRESS,
    minReserve: options.minReserve,
    receipts: new InMemoryReceiptStore(options.idempotencyTtlMs),
    logger: options.logger,
  });
  const service = new VaultService(registry, engine);

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(createErrorHandler(options.onUnexpectedError));
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Health ─────────────────────────────────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1/vaults", createVaultRoutes());
  app.route("/api/v1/deposits", createDepositRoutes());
  app.route("/api/v1/positions", createPositionRoutes());
  app.route("/api/v1/insurance", createInsuranceRoutes());

  return { app, registry, engine, service };
}
