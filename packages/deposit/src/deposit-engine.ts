/**
 * Deposit Engine — turns a confirmed transfer into shares.
 *
 * For each deposit, in order:
 *   1. validate the request and resolve the tier's vault
 *   2. pre-flight: user balance covers amount + reserve
 *   3. transfer the gross amount to the custody account
 *   4. split off the insurance cut, mint shares on the net amount,
 *      allocate across strategies, credit the user's position
 *
 * Rules:
 * - Steps run inside the tier's lock; tiers never block each other
 * - Nothing in the registry changes until the transfer has confirmed
 * - Step 4 is synchronous and fully checked up front, so it either
 *   applies completely or not at all
 * - A deposit with an idempotency key mints at most once per key
 */

import { randomUUID } from "node:crypto";
import { UNIT, addU64, assertU64, bpsOf, LedgerError } from "@tiervault/ledger";
import { isRiskLevel } from "@tiervault/types";
import type { RiskLevel } from "@tiervault/types";
import { VaultError } from "@tiervault/vault";
import type { Vault, VaultRegistry } from "@tiervault/vault";
import { TierLock } from "./tier-lock.js";
import { InMemoryReceiptStore } from "./receipts.js";
import type { ReceiptStore } from "./receipts.js";
import type {
  CustodyTransport,
  DepositLogger,
  DepositReceipt,
  DepositRequest,
  TransferConfirmation,
} from "./types.js";

// =============================================================================
// Error
// =============================================================================

export type DepositErrorCode =
  | "INVALID_AMOUNT"
  | "AMOUNT_OVERFLOW"
  | "INVALID_USER"
  | "VAULT_NOT_FOUND"
  | "INSUFFICIENT_FUNDS"
  | "TRANSFER_FAILED"
  | "IDEMPOTENCY_CONFLICT";

/**
 * Context attached to a failed deposit, enough to decide on a retry.
 */
export interface DepositErrorDetails {
  readonly user?: string | undefined;
  readonly riskLevel?: string | undefined;
  readonly amount?: string | undefined;
  readonly [key: string]: string | undefined;
}

export class DepositError extends Error {
  public readonly code: DepositErrorCode;
  public readonly details: DepositErrorDetails;

  constructor(code: DepositErrorCode, message: string, details: DepositErrorDetails = {}) {
    super(message);
    this.name = "DepositError";
    this.code = code;
    this.details = details;
  }
}

// =============================================================================
// Configuration
// =============================================================================

export interface DepositEngineOptions {
  readonly registry: VaultRegistry;
  readonly transport: CustodyTransport;

  /** Account receiving every deposit */
  readonly custodyAddress: string;

  /**
   * Balance a depositor must keep after the transfer. Default 1 XLM,
   * the network's base reserve.
   */
  readonly minReserve?: bigint | undefined;
  readonly receipts?: ReceiptStore | undefined;
  readonly logger?: DepositLogger | undefined;
}

const silentLogger: DepositLogger = {
  info: () => undefined,
  warn: () => undefined,
};

interface PendingDeposit {
  readonly fingerprint: string;
  readonly promise: Promise<DepositReceipt>;
}

interface SettlementPlan {
  readonly insuranceCut: bigint;
  readonly netAmount: bigint;
}

function fingerprintOf(request: DepositRequest): string {
  return `${request.user}|${request.riskLevel}|${request.grossAmount.toString()}`;
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// =============================================================================
// Engine
// =============================================================================

export class DepositEngine {
  private readonly registry: VaultRegistry;
  private readonly transport: CustodyTransport;
  private readonly custodyAddress: string;
  private readonly minReserve: bigint;
  private readonly receipts: ReceiptStore;
  private readonly logger: DepositLogger;
  private readonly locks = new TierLock<RiskLevel>();
  private readonly pending = new Map<string, PendingDeposit>();

  constructor(options: DepositEngineOptions) {
    this.registry = options.registry;
    this.transport = options.transport;
    this.custodyAddress = options.custodyAddress;
    this.minReserve = assertU64(options.minReserve ?? UNIT, "minimum reserve");
    this.receipts = options.receipts ?? new InMemoryReceiptStore();
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Process a deposit end to end. Resolves with the receipt once the
   * transfer confirmed and the shares are credited.
   *
   * @throws {DepositError} before any ledger change
   */
  async processDeposit(request: DepositRequest): Promise<DepositReceipt> {
    this.validate(request);
    this.resolveVault(request);

    const key = request.idempotencyKey;
    if (key === undefined) {
      return this.locks.run(request.riskLevel, () => this.execute(request));
    }

    const fingerprint = fingerprintOf(request);

    const stored = this.receipts.get(key);
    if (stored !== undefined) {
      this.assertSameRequest(key, stored.fingerprint, request);
      this.logger.info({ idempotencyKey: key, depositId: stored.receipt.depositId }, "Deposit replayed");
      return { ...stored.receipt, replayed: true };
    }

    const inFlight = this.pending.get(key);
    if (inFlight !== undefined) {
      this.assertSameRequest(key, inFlight.fingerprint, request);
      const receipt = await inFlight.promise;
      return { ...receipt, replayed: true };
    }

    const promise = this.locks
      .run(request.riskLevel, () => this.execute(request))
      .then((receipt) => {
        this.receipts.set(key, { receipt, fingerprint, storedAt: Date.now() });
        return receipt;
      })
      .finally(() => {
        this.pending.delete(key);
      });

    this.pending.set(key, { fingerprint, promise });
    return promise;
  }

  /**
   * Whether a deposit into the tier is running or queued.
   */
  isBusy(riskLevel: RiskLevel): boolean {
    return this.locks.isLocked(riskLevel);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Critical section
  // ───────────────────────────────────────────────────────────────────────

  private async execute(request: DepositRequest): Promise<DepositReceipt> {
    const vault = this.resolveVault(request);
    const context = {
      user: request.user,
      riskLevel: request.riskLevel,
      amount: request.grossAmount.toString(),
    };

    this.logger.info(context, "Deposit started");

    // Fail on unrepresentable totals before any asset moves
    const plan = this.planSettlement(vault, request);

    await this.checkBalance(request);

    let confirmation: TransferConfirmation;
    try {
      confirmation = await this.transport.transfer({
        from: request.user,
        to: this.custodyAddress,
        amount: request.grossAmount,
      });
    } catch (err) {
      this.logger.warn({ ...context, err: messageOf(err) }, "Deposit transfer failed");
      throw new DepositError(
        "TRANSFER_FAILED",
        `Transfer of ${request.grossAmount.toString()} stroops into the ${request.riskLevel} vault failed: ${messageOf(err)}`,
        { ...context, cause: messageOf(err) },
      );
    }

    const receipt = this.settle(vault, request, plan, confirmation);

    this.logger.info(
      {
        ...context,
        depositId: receipt.depositId,
        transactionId: confirmation.transactionId,
        insuranceCut: receipt.insuranceCut.toString(),
        sharesMinted: receipt.sharesMinted.toString(),
      },
      "Deposit completed",
    );
    return receipt;
  }

  private async checkBalance(request: DepositRequest): Promise<void> {
    let balance: bigint;
    try {
      balance = await this.transport.getBalance(request.user);
    } catch (err) {
      // The transfer itself still guards against an empty account
      this.logger.warn(
        { user: request.user, riskLevel: request.riskLevel, err: messageOf(err) },
        "Balance lookup failed, continuing to transfer",
      );
      return;
    }

    const required = request.grossAmount + this.minReserve;
    if (balance < required) {
      throw new DepositError(
        "INSUFFICIENT_FUNDS",
        `Balance ${balance.toString()} does not cover ${request.grossAmount.toString()} plus the ${this.minReserve.toString()} reserve`,
        {
          user: request.user,
          riskLevel: request.riskLevel,
          amount: request.grossAmount.toString(),
          balance: balance.toString(),
          required: required.toString(),
        },
      );
    }
  }

  /**
   * Fee split and overflow checks for a deposit, without mutation.
   */
  private planSettlement(vault: Vault, request: DepositRequest): SettlementPlan {
    const insuranceCut = bpsOf(request.grossAmount, vault.insuranceFeeBps);
    const netAmount = request.grossAmount - insuranceCut;

    try {
      const preview = vault.previewDeposit(netAmount);
      addU64(this.registry.insurancePool, insuranceCut);
      addU64(this.registry.sharesOf(request.user, request.riskLevel), preview.sharesMinted);
    } catch (err) {
      if (err instanceof LedgerError || err instanceof VaultError) {
        throw new DepositError(
          err.code === "AMOUNT_OVERFLOW" ? "AMOUNT_OVERFLOW" : "INVALID_AMOUNT",
          `Deposit of ${request.grossAmount.toString()} cannot be recorded in the ${request.riskLevel} vault: ${err.message}`,
          { user: request.user, riskLevel: request.riskLevel, amount: request.grossAmount.toString() },
        );
      }
      throw err;
    }

    return { insuranceCut, netAmount };
  }

  /**
   * Apply a confirmed deposit to the registry. Synchronous: no other
   * deposit can observe a partial update. Takes the plan checked
   * before the transfer, under the same tier lock.
   */
  private settle(
    vault: Vault,
    request: DepositRequest,
    plan: SettlementPlan,
    confirmation: TransferConfirmation,
  ): DepositReceipt {
    const { insuranceCut, netAmount } = plan;
    const sharePrice = vault.getSharePrice();

    this.registry.collectInsurance(insuranceCut);
    const sharesMinted = vault.allocateDeposit(netAmount);
    this.registry.creditShares(request.user, request.riskLevel, sharesMinted);

    return {
      depositId: randomUUID(),
      user: request.user,
      riskLevel: request.riskLevel,
      grossAmount: request.grossAmount,
      insuranceCut,
      netAmount,
      sharesMinted,
      sharePrice,
      confirmation,
      idempotencyKey: request.idempotencyKey,
      replayed: false,
      completedAt: new Date().toISOString(),
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Validation
  // ───────────────────────────────────────────────────────────────────────

  private validate(request: DepositRequest): void {
    const amount = request.grossAmount.toString();

    if (request.user.trim() === "") {
      throw new DepositError("INVALID_USER", "Depositor account must be a non-empty identifier", {
        riskLevel: request.riskLevel,
        amount,
      });
    }

    if (request.grossAmount <= 0n) {
      throw new DepositError("INVALID_AMOUNT", `Deposit amount must be positive, got ${amount}`, {
        user: request.user,
        riskLevel: request.riskLevel,
        amount,
      });
    }

    try {
      assertU64(request.grossAmount, "deposit amount");
    } catch (err) {
      throw new DepositError("AMOUNT_OVERFLOW", messageOf(err), {
        user: request.user,
        riskLevel: request.riskLevel,
        amount,
      });
    }
  }

  private resolveVault(request: DepositRequest): Vault {
    const level: unknown = request.riskLevel;
    if (!isRiskLevel(level) || !this.registry.hasVault(level)) {
      throw new DepositError(
        "VAULT_NOT_FOUND",
        `No vault configured for risk level '${String(level)}'`,
        { user: request.user, riskLevel: String(level), amount: request.grossAmount.toString() },
      );
    }
    return this.registry.getVault(level);
  }

  private assertSameRequest(key: string, fingerprint: string, request: DepositRequest): void {
    if (fingerprint !== fingerprintOf(request)) {
      throw new DepositError(
        "IDEMPOTENCY_CONFLICT",
        `Idempotency key '${key}' was already used for a different deposit`,
        { user: request.user, riskLevel: request.riskLevel, amount: request.grossAmount.toString() },
      );
    }
  }
}
