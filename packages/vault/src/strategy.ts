/**
 * Strategy — a weighted yield venue owned by one vault.
 *
 * Immutable: the running total of stroops routed to the venue lives in
 * the owning Vault, which hands out copies through StrategyView.
 */

import { percentOf } from "@tiervault/ledger";
import type { StrategyKind } from "@tiervault/types";
import type { StrategyConfig, StrategySnapshot, StrategyView } from "./types.js";

export class Strategy {
  readonly kind: StrategyKind;
  readonly name: string;
  readonly allocationPercentage: number;
  readonly apyBps: number;

  constructor(config: StrategyConfig) {
    this.kind = config.kind;
    this.name = config.name;
    this.allocationPercentage = config.allocationPercentage;
    this.apyBps = config.apyBps;
  }

  /**
   * This strategy's slice of a net deposit (floor).
   */
  sliceOf(netAmount: bigint): bigint {
    return percentOf(netAmount, this.allocationPercentage);
  }

  view(totalAllocated: bigint): StrategyView {
    return Object.freeze({
      kind: this.kind,
      name: this.name,
      allocationPercentage: this.allocationPercentage,
      apyBps: this.apyBps,
      totalAllocated,
      currentYield: 0n,
    });
  }

  snapshot(totalAllocated: bigint): StrategySnapshot {
    return {
      kind: this.kind,
      name: this.name,
      allocationPercentage: this.allocationPercentage,
      apyBps: this.apyBps,
      totalAllocated: totalAllocated.toString(),
      currentYield: "0",
    };
  }
}
