/**
 * Vault routes.
 *
 * GET /api/v1/vaults             — Snapshots of every tier
 * GET /api/v1/vaults/:riskLevel  — One tier's snapshot
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createVaultRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const service = c.get("service");
    return c.json({ data: service.listVaults() });
  });

  // Unknown tiers throw VAULT_NOT_FOUND → 404
  routes.get("/:riskLevel", (c) => {
    const service = c.get("service");
    return c.json({ data: service.getVault(c.req.param("riskLevel")) });
  });

  return routes;
}
