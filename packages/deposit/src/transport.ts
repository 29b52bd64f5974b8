/**
 * InMemoryTransport — in-process custody transport.
 *
 * Holds balances in a map and settles transfers instantly (or after a
 * configured latency). Used by tests and by development runs where no
 * network client is wired in.
 *
 * Failure injection:
 * - failNextTransfer(): the next transfer rejects, balances untouched
 * - failNextBalanceLookup(): the next getBalance rejects
 */

import { setTimeout as sleep } from "node:timers/promises";
import type { AccountId } from "@tiervault/types";
import type {
  CustodyTransport,
  TransferConfirmation,
  TransferRequest,
} from "./types.js";

// =============================================================================
// Error
// =============================================================================

export class TransportError extends Error {
  public readonly code: TransportErrorCode;
  constructor(code: TransportErrorCode, message: string) {
    super(message);
    this.name = "TransportError";
    this.code = code;
  }
}

export type TransportErrorCode =
  | "TRANSFER_REJECTED"
  | "UNDERFUNDED"
  | "BALANCE_UNAVAILABLE";

// =============================================================================
// Transport
// =============================================================================

export interface InMemoryTransportOptions {
  /** Balance of an account the transport has not seen before. Default 0. */
  readonly startingBalance?: bigint | undefined;

  /** Delay applied to every call, in ms. Default 0. */
  readonly latencyMs?: number | undefined;
}

export class InMemoryTransport implements CustodyTransport {
  private readonly balances = new Map<AccountId, bigint>();
  private readonly transfers: TransferConfirmation[] = [];
  private readonly startingBalance: bigint;
  private readonly latencyMs: number;
  private pendingTransferFailure: Error | undefined;
  private pendingBalanceFailure: Error | undefined;

  constructor(options: InMemoryTransportOptions = {}) {
    this.startingBalance = options.startingBalance ?? 0n;
    this.latencyMs = options.latencyMs ?? 0;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Test & dev controls
  // ───────────────────────────────────────────────────────────────────────

  setBalance(account: AccountId, amount: bigint): void {
    this.balances.set(account, amount);
  }

  balanceOf(account: AccountId): bigint {
    return this.balances.get(account) ?? this.startingBalance;
  }

  failNextTransfer(
    error: Error = new TransportError("TRANSFER_REJECTED", "Transfer rejected by network"),
  ): void {
    this.pendingTransferFailure = error;
  }

  failNextBalanceLookup(
    error: Error = new TransportError("BALANCE_UNAVAILABLE", "Account lookup timed out"),
  ): void {
    this.pendingBalanceFailure = error;
  }

  /** Confirmed transfers, oldest first. */
  get history(): readonly TransferConfirmation[] {
    return this.transfers;
  }

  // ───────────────────────────────────────────────────────────────────────
  // CustodyTransport
  // ───────────────────────────────────────────────────────────────────────

  async getBalance(account: AccountId): Promise<bigint> {
    await this.delay();

    const failure = this.pendingBalanceFailure;
    if (failure !== undefined) {
      this.pendingBalanceFailure = undefined;
      throw failure;
    }

    return this.balanceOf(account);
  }

  async transfer(request: TransferRequest): Promise<TransferConfirmation> {
    await this.delay();

    const failure = this.pendingTransferFailure;
    if (failure !== undefined) {
      this.pendingTransferFailure = undefined;
      throw failure;
    }

    if (request.amount <= 0n) {
      throw new TransportError("TRANSFER_REJECTED", "Transfer amount must be positive");
    }

    const available = this.balanceOf(request.from);
    if (available < request.amount) {
      throw new TransportError(
        "UNDERFUNDED",
        `Account ${request.from} holds ${available.toString()}, transfer needs ${request.amount.toString()}`,
      );
    }

    this.balances.set(request.from, available - request.amount);
    this.balances.set(request.to, this.balanceOf(request.to) + request.amount);

    const confirmation: TransferConfirmation = {
      transactionId: `mem-${String(this.transfers.length + 1).padStart(8, "0")}`,
      from: request.from,
      to: request.to,
      amount: request.amount,
      confirmedAt: new Date().toISOString(),
    };
    this.transfers.push(confirmation);
    return confirmation;
  }

  private async delay(): Promise<void> {
    if (this.latencyMs > 0) {
      await sleep(this.latencyMs);
    }
  }
}
