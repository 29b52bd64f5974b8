/**
 * GET /api/v1/insurance — Insurance pool total
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createInsuranceRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => c.json({ data: c.get("service").insurancePool() }));

  return routes;
}
