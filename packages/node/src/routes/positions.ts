/**
 * Position routes.
 *
 * GET /api/v1/positions/:user             — All positions of a user
 * GET /api/v1/positions/:user/:riskLevel  — One position
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export function createPositionRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:user", (c) => {
    const service = c.get("service");
    return c.json({ data: service.listPositions(c.req.param("user")) });
  });

  routes.get("/:user/:riskLevel", (c) => {
    const service = c.get("service");
    const user = c.req.param("user");
    const riskLevel = c.req.param("riskLevel");
    const position = service.getPosition(user, riskLevel);

    if (position === undefined) {
      return c.json(
        createErrorEnvelope("NOT_FOUND", `No ${riskLevel} position for '${user}'`),
        404,
      );
    }

    return c.json({ data: position });
  });

  return routes;
}
