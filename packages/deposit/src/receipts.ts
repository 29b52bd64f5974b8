/**
 * Deposit receipt store.
 *
 * Remembers completed deposits by idempotency key so a retried
 * deposit returns the original receipt. Entries expire after a TTL.
 */

import type { DepositReceipt } from "./types.js";

// =============================================================================
// Store Interface
// =============================================================================

export interface StoredReceipt {
  readonly receipt: DepositReceipt;

  /** Identity of the request that produced the receipt */
  readonly fingerprint: string;
  readonly storedAt: number;
}

export interface ReceiptStore {
  get(key: string): StoredReceipt | undefined;
  set(key: string, entry: StoredReceipt): void;
}

// =============================================================================
// In-Memory Store
// =============================================================================

export const DEFAULT_RECEIPT_TTL_MS = 86_400_000;

export class InMemoryReceiptStore implements ReceiptStore {
  private readonly _entries = new Map<string, StoredReceipt>();
  private readonly _ttlMs: number;

  constructor(ttlMs: number = DEFAULT_RECEIPT_TTL_MS) {
    this._ttlMs = ttlMs;
  }

  get(key: string): StoredReceipt | undefined {
    const entry = this._entries.get(key);
    if (entry === undefined) {
      return undefined;
    }

    if (Date.now() - entry.storedAt > this._ttlMs) {
      this._entries.delete(key);
      return undefined;
    }

    return entry;
  }

  /**
   * Store an entry and drop expired ones from the oldest end, so keys
   * that are never retried do not outlive the TTL.
   */
  set(key: string, entry: StoredReceipt): void {
    this.evictExpired(Date.now());
    // Re-insert so iteration order stays oldest first
    this._entries.delete(key);
    this._entries.set(key, entry);
  }

  get size(): number {
    return this._entries.size;
  }

  clear(): void {
    this._entries.clear();
  }

  private evictExpired(now: number): void {
    for (const [key, entry] of this._entries) {
      if (now - entry.storedAt <= this._ttlMs) {
        return;
      }
      this._entries.delete(key);
    }
  }
}
