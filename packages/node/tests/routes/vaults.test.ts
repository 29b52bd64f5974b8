/**
 * Tests for vault snapshot routes.
 */

import { describe, it, expect } from "vitest";
import { createTestApp, depositRequest } from "../setup.js";
import type { ErrorBody } from "../setup.js";
import type { VaultSnapshot } from "@tiervault/vault";

describe("GET /api/v1/vaults", () => {
  it("lists every tier in order", async () => {
    const { app } = createTestApp();

    const res = await app.request("/api/v1/vaults");

    expect(res.status).toBe(200);
    const { data } = (await res.json()) as { data: VaultSnapshot[] };
    expect(data.map((v) => v.riskLevel)).toEqual(["low", "medium", "high"]);
    expect(data.map((v) => v.sharePrice)).toEqual(["10000000", "10000000", "10000000"]);
  });
});

describe("GET /api/v1/vaults/:riskLevel", () => {
  it("returns one tier's snapshot", async () => {
    const { app } = createTestApp();

    const res = await app.request("/api/v1/vaults/medium");

    expect(res.status).toBe(200);
    const { data } = (await res.json()) as { data: VaultSnapshot };
    expect(data.insuranceFeeBps).toBe(100);
    expect(data.strategies.map((s) => [s.name, s.allocationPercentage])).toEqual([
      ["Aqua Liquidity Pool", 60],
      ["YieldBlox Lending", 40],
    ]);
  });

  it("resolves menu numbers", async () => {
    const { app } = createTestApp();

    const res = await app.request("/api/v1/vaults/3");

    const { data } = (await res.json()) as { data: VaultSnapshot };
    expect(data.riskLevel).toBe("high");
  });

  it("reflects deposits in totals and allocations", async () => {
    const { app } = createTestApp();
    await app.request(depositRequest({ user: "alice", riskLevel: "medium", amount: "10" }));

    const res = await app.request("/api/v1/vaults/medium");

    const { data } = (await res.json()) as { data: VaultSnapshot };
    // 10 XLM less 1%
    expect(data.totalValue).toBe("99000000");
    expect(data.totalShares).toBe("99000000");
    expect(data.strategies.map((s) => s.totalAllocated)).toEqual(["59400000", "39600000"]);
    expect(data.unallocated).toBe("0");
  });

  it("returns 404 for an unknown tier", async () => {
    const { app } = createTestApp();

    const res = await app.request("/api/v1/vaults/extreme");

    expect(res.status).toBe(404);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("VAULT_NOT_FOUND");
  });
});
