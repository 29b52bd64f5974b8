/**
 * Test helpers for @tiervault/node.
 *
 * Provides a test app factory that creates a Hono app with
 * all middleware and routes, but no HTTP server. Deposits settle
 * through an in-memory transport the test can steer.
 */

import { UNIT } from "@tiervault/ledger";
import { InMemoryTransport } from "@tiervault/deposit";
import { createApp } from "../src/app.js";
import type { AppInstance, CreateAppOptions } from "../src/app.js";

export interface TestApp extends AppInstance {
  readonly transport: InMemoryTransport;
}

/**
 * Create a test app whose accounts start with 1,000 XLM.
 */
export function createTestApp(
  overrides: Partial<Omit<CreateAppOptions, "transport">> = {},
  transport: InMemoryTransport = new InMemoryTransport({ startingBalance: 1_000n * UNIT }),
): TestApp {
  return { ...createApp({ ...overrides, transport }), transport };
}

/**
 * JSON request helper.
 */
export function jsonRequest(
  path: string,
  method: string = "GET",
  body?: unknown,
  headers?: Record<string, string>,
): Request {
  const init: RequestInit = {
    method,
    headers: {
      "Content-Type": "application/json",
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }

  return new Request(`http://localhost${path}`, init);
}

export interface ErrorBody {
  error: { code: string; message: string; details?: Record<string, unknown> };
}

/**
 * POST /api/v1/deposits.
 */
export function depositRequest(
  body: Record<string, unknown>,
  headers?: Record<string, string>,
): Request {
  return jsonRequest("/api/v1/deposits", "POST", body, headers);
}
