/**
 * Deposit routes.
 *
 * POST /api/v1/deposits — Deposit XLM into a risk tier
 *
 * An Idempotency-Key header is passed to the deposit engine; a repeated
 * key returns the first receipt with X-Idempotent-Replay: true.
 */

import { Hono } from "hono";
import { IDEMPOTENCY_KEY_HEADER, IDEMPOTENT_REPLAY_HEADER } from "../types/api-contract.js";
import type { AppEnv } from "../types/api-contract.js";
import { DepositSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createDepositRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(DepositSchema), async (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");

    const header = c.req.header(IDEMPOTENCY_KEY_HEADER)?.trim();
    const idempotencyKey = header === undefined || header === "" ? undefined : header;

    const receipt = await service.deposit(body, idempotencyKey);

    if (receipt.replayed) {
      c.header(IDEMPOTENT_REPLAY_HEADER, "true");
    }
    return c.json({ data: receipt }, 201);
  });

  return routes;
}
