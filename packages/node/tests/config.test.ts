/**
 * Tests for config.ts — loadConfig.
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("returns defaults for empty env", () => {
    const config = loadConfig({});

    expect(config.PORT).toBe(3000);
    expect(config.HOST).toBe("0.0.0.0");
    expect(config.LOG_LEVEL).toBe("info");
    expect(config.NODE_ENV).toBe("development");
    expect(config.CUSTODY_ADDRESS).toBe("tiervault-custody");
    expect(config.MIN_RESERVE).toBe(10_000_000n);
    expect(config.DEV_STARTING_BALANCE).toBe(100_000_000_000n);
    expect(config.TRANSFER_LATENCY_MS).toBe(0);
    expect(config.IDEMPOTENCY_TTL_MS).toBe(86400000);
  });

  it("coerces numeric strings", () => {
    const config = loadConfig({ PORT: "8080", TRANSFER_LATENCY_MS: "250" });

    expect(config.PORT).toBe(8080);
    expect(config.TRANSFER_LATENCY_MS).toBe(250);
  });

  it("parses XLM amounts to stroops", () => {
    const config = loadConfig({ MIN_RESERVE: "0.5", DEV_STARTING_BALANCE: "12.0000001" });

    expect(config.MIN_RESERVE).toBe(5_000_000n);
    expect(config.DEV_STARTING_BALANCE).toBe(120_000_001n);
  });

  it("rejects an XLM amount with too many decimals", () => {
    expect(() => loadConfig({ MIN_RESERVE: "0.00000001" })).toThrow(
      "has 8 decimal places, but the asset allows 7",
    );
  });

  it("rejects a negative amount", () => {
    expect(() => loadConfig({ DEV_STARTING_BALANCE: "-5" })).toThrow(ZodError);
  });

  it("rejects an invalid port", () => {
    expect(() => loadConfig({ PORT: "0" })).toThrow(ZodError);
    expect(() => loadConfig({ PORT: "70000" })).toThrow(ZodError);
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow(ZodError);
  });

  it("rejects a blank custody address", () => {
    expect(() => loadConfig({ CUSTODY_ADDRESS: "   " })).toThrow(ZodError);
  });

  it("rejects a TTL below one second", () => {
    expect(() => loadConfig({ IDEMPOTENCY_TTL_MS: "10" })).toThrow(ZodError);
  });
});
