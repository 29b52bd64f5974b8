/**
 * Tests for logger middleware.
 */

import { describe, it, expect } from "vitest";
import { createTestApp, depositRequest } from "../setup.js";
import type { RequestLogEntry } from "../../src/middleware/logger.js";

describe("loggerMiddleware", () => {
  it("calls logFn with request details", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });

    await app.request("/health", { headers: { "X-Request-Id": "req-1" } });

    expect(entries).toEqual([
      {
        method: "GET",
        path: "/health",
        status: 200,
        durationMs: expect.any(Number),
        requestId: "req-1",
        replayed: undefined,
      },
    ]);
  });

  it("logs the status of a failed request", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });

    await app.request(depositRequest({ user: "alice", riskLevel: "extreme", amount: "1" }));

    expect(entries[0]?.method).toBe("POST");
    expect(entries[0]?.status).toBe(404);
  });

  it("flags replayed deposits", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });
    const headers = { "Idempotency-Key": "log-1" };
    const body = { user: "alice", riskLevel: "low", amount: "1" };

    await app.request(depositRequest(body, headers));
    await app.request(depositRequest(body, headers));

    expect(entries.map((e) => [e.status, e.replayed])).toEqual([
      [201, undefined],
      [201, true],
    ]);
  });
});
