import { describe, it, expect, beforeEach } from "vitest";
import { InMemoryTransport, TransportError } from "../src/transport.js";

describe("InMemoryTransport", () => {
  let transport: InMemoryTransport;

  beforeEach(() => {
    transport = new InMemoryTransport({ startingBalance: 50n });
  });

  it("gives unseen accounts the starting balance", async () => {
    expect(await transport.getBalance("anyone")).toBe(50n);
  });

  it("moves funds and records a confirmation", async () => {
    transport.setBalance("alice", 100n);

    const confirmation = await transport.transfer({ from: "alice", to: "custody", amount: 40n });

    expect(confirmation.transactionId).toBe("mem-00000001");
    expect(confirmation.amount).toBe(40n);
    expect(transport.balanceOf("alice")).toBe(60n);
    expect(transport.balanceOf("custody")).toBe(90n);
    expect(transport.history).toEqual([confirmation]);
  });

  it("rejects a transfer the sender cannot cover", async () => {
    await expect(
      transport.transfer({ from: "alice", to: "custody", amount: 51n }),
    ).rejects.toThrow("Account alice holds 50, transfer needs 51");
    expect(transport.history).toHaveLength(0);
  });

  it("rejects a non-positive transfer", async () => {
    await expect(
      transport.transfer({ from: "alice", to: "custody", amount: 0n }),
    ).rejects.toBeInstanceOf(TransportError);
  });

  it("fails only the next transfer when asked", async () => {
    transport.failNextTransfer();

    await expect(
      transport.transfer({ from: "alice", to: "custody", amount: 1n }),
    ).rejects.toThrow("Transfer rejected by network");
    expect(transport.balanceOf("alice")).toBe(50n);

    await expect(
      transport.transfer({ from: "alice", to: "custody", amount: 1n }),
    ).resolves.toMatchObject({ transactionId: "mem-00000001" });
  });

  it("fails only the next balance lookup when asked", async () => {
    transport.failNextBalanceLookup(new Error("horizon down"));

    await expect(transport.getBalance("alice")).rejects.toThrow("horizon down");
    await expect(transport.getBalance("alice")).resolves.toBe(50n);
  });
});
