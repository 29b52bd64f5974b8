import { describe, it, expect, afterEach, vi } from "vitest";
import { InMemoryReceiptStore } from "../src/receipts.js";
import type { StoredReceipt } from "../src/receipts.js";

function entry(storedAt: number): StoredReceipt {
  return {
    fingerprint: "alice|low|100000000",
    storedAt,
    receipt: {
      depositId: "dep-1",
      user: "alice",
      riskLevel: "low",
      grossAmount: 100_000_000n,
      insuranceCut: 500_000n,
      netAmount: 99_500_000n,
      sharesMinted: 99_500_000n,
      sharePrice: 10_000_000n,
      confirmation: {
        transactionId: "mem-00000001",
        from: "alice",
        to: "custody",
        amount: 100_000_000n,
        confirmedAt: "2026-01-01T00:00:00.000Z",
      },
      replayed: false,
      completedAt: "2026-01-01T00:00:00.000Z",
    },
  };
}

describe("InMemoryReceiptStore", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("returns a stored entry", () => {
    const store = new InMemoryReceiptStore();
    store.set("key-1", entry(Date.now()));

    expect(store.get("key-1")?.receipt.depositId).toBe("dep-1");
    expect(store.get("key-2")).toBeUndefined();
    expect(store.size).toBe(1);
  });

  it("evicts entries older than the TTL", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-01-01T00:00:00.000Z"));
    const store = new InMemoryReceiptStore(1_000);
    store.set("key-1", entry(Date.now()));

    vi.setSystemTime(new Date("2026-01-01T00:00:01.000Z"));
    expect(store.get("key-1")).toBeDefined();

    vi.setSystemTime(new Date("2026-01-01T00:00:01.001Z"));
    expect(store.get("key-1")).toBeUndefined();
    expect(store.size).toBe(0);
  });

  it("drops expired entries on the next write without re-reading them", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-01-01T00:00:00.000Z"));
    const store = new InMemoryReceiptStore(1_000);
    for (let i = 0; i < 50; i++) {
      store.set(`old-${String(i)}`, entry(Date.now()));
    }
    expect(store.size).toBe(50);

    vi.setSystemTime(new Date("2026-01-01T00:00:05.000Z"));
    store.set("fresh", entry(Date.now()));

    expect(store.size).toBe(1);
    expect(store.get("fresh")).toBeDefined();
  });

  it("keeps live entries when sweeping", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-01-01T00:00:00.000Z"));
    const store = new InMemoryReceiptStore(1_000);
    store.set("first", entry(Date.now()));

    vi.setSystemTime(new Date("2026-01-01T00:00:00.800Z"));
    store.set("second", entry(Date.now()));

    vi.setSystemTime(new Date("2026-01-01T00:00:01.500Z"));
    store.set("third", entry(Date.now()));

    expect(store.size).toBe(2);
    expect(store.get("first")).toBeUndefined();
    expect(store.get("second")).toBeDefined();
  });

  it("clears every entry", () => {
    const store = new InMemoryReceiptStore();
    store.set("a", entry(Date.now()));
    store.set("b", entry(Date.now()));

    store.clear();

    expect(store.size).toBe(0);
  });
});
