/**
 * Request logging middleware.
 *
 * Hands one entry per request to a log function; main.ts routes it
 * to pino, tests leave it out.
 */

import type { MiddlewareHandler } from "hono";
import { IDEMPOTENT_REPLAY_HEADER } from "../types/api-contract.js";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;

  /** Set when a deposit answered from a stored receipt */
  readonly replayed?: true | undefined;
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    log({
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
      requestId: c.get("requestId"),
      replayed: c.res.headers.get(IDEMPOTENT_REPLAY_HEADER) === "true" ? true : undefined,
    });
  };
}
