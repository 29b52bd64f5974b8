/**
 * VaultService — composition root for the vault packages.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. It owns the risk-level parsing of path and body
 * input and the bigint → string conversion of everything it returns.
 */

import { formatAmount, parseAmount } from "@tiervault/ledger";
import { parseRiskLevel } from "@tiervault/types";
import type { AccountId, RiskLevel } from "@tiervault/types";
import { VaultError } from "@tiervault/vault";
import type { PositionSnapshot, VaultRegistry, VaultSnapshot } from "@tiervault/vault";
import type { DepositEngine, DepositReceipt } from "@tiervault/deposit";
import type { DepositDto, DepositReceiptDto, InsurancePoolDto } from "../types/dto.js";

export function toReceiptDto(receipt: DepositReceipt): DepositReceiptDto {
  return {
    depositId: receipt.depositId,
    user: receipt.user,
    riskLevel: receipt.riskLevel,
    grossAmount: receipt.grossAmount.toString(),
    insuranceCut: receipt.insuranceCut.toString(),
    netAmount: receipt.netAmount.toString(),
    sharesMinted: receipt.sharesMinted.toString(),
    sharePrice: receipt.sharePrice.toString(),
    transactionId: receipt.confirmation.transactionId,
    idempotencyKey: receipt.idempotencyKey,
    replayed: receipt.replayed,
    completedAt: receipt.completedAt,
  };
}

export class VaultService {
  private readonly registry: VaultRegistry;
  private readonly engine: DepositEngine;

  constructor(registry: VaultRegistry, engine: DepositEngine) {
    this.registry = registry;
    this.engine = engine;
  }

  // ─── Vaults ─────────────────────────────────────────────────────────

  listVaults(): readonly VaultSnapshot[] {
    return this.registry.listVaultSnapshots();
  }

  getVault(riskLevel: string): VaultSnapshot {
    return this.registry.getVaultSnapshot(this.resolveLevel(riskLevel));
  }

  tierCount(): number {
    return this.registry.riskLevels().length;
  }

  // ─── Deposits ───────────────────────────────────────────────────────

  /**
   * Run a deposit. The amount is XLM in decimal form.
   *
   * @throws {LedgerError} for a malformed amount
   * @throws {VaultError} for an unknown risk level
   * @throws {DepositError} from the engine
   */
  async deposit(input: DepositDto, idempotencyKey?: string): Promise<DepositReceiptDto> {
    const riskLevel = this.resolveLevel(input.riskLevel);
    const grossAmount = parseAmount(input.amount);

    const receipt = await this.engine.processDeposit({
      user: input.user,
      riskLevel,
      grossAmount,
      idempotencyKey,
    });
    return toReceiptDto(receipt);
  }

  // ─── Positions ──────────────────────────────────────────────────────

  listPositions(user: AccountId): readonly PositionSnapshot[] {
    return this.registry.listPositions(user);
  }

  getPosition(user: AccountId, riskLevel: string): PositionSnapshot | undefined {
    return this.registry.getPosition(user, this.resolveLevel(riskLevel));
  }

  // ─── Insurance ──────────────────────────────────────────────────────

  insurancePool(): InsurancePoolDto {
    const total = this.registry.insurancePool;
    return { total: total.toString(), totalXlm: formatAmount(total) };
  }

  private resolveLevel(input: string): RiskLevel {
    const level = parseRiskLevel(input);
    if (level === undefined || !this.registry.hasVault(level)) {
      throw new VaultError("VAULT_NOT_FOUND", `No vault configured for risk level '${input}'`);
    }
    return level;
  }
}
