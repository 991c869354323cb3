/**
 * Intent Store
 *
 * One record per idempotency key: the request body that every attempt
 * re-sends, the last payment observed for it and any outstanding challenge.
 *
 * Synchronous on purpose: the blocking path cannot await.
 */

import { isTerminalStatus } from './state.js';
import type { Challenge, Payment, PaymentRequestBody } from './types.js';

export interface IntentRecord {
  idempotency_key: string;
  body: PaymentRequestBody;
  payment: Payment | null;
  challenge: Challenge | null;
  /** Challenges already answered; a stale read repeating one is ignored */
  resolved_challenges: Challenge[];
  created_at: number;
  updated_at: number;
}

export type IntentPatch = Partial<Pick<IntentRecord, 'body' | 'payment' | 'challenge' | 'resolved_challenges'>>;

export interface IntentStore {
  /**
   * Throws if the key already has a record.
   */
  create(record: IntentRecord): void;

  load(idempotencyKey: string): IntentRecord | null;

  /**
   * Look up by payment id, falling back to the idempotency key for intents
   * the ledger challenged before assigning an id.
   */
  findByPaymentRef(ref: string): IntentRecord | null;

  update(idempotencyKey: string, patch: IntentPatch): void;
}

// =============================================================================
// IN-MEMORY IMPLEMENTATION
// =============================================================================

export interface InMemoryIntentStoreOptions {
  /** Records kept before the least recently used ones are evicted */
  maxEntries?: number;
}

export const DEFAULT_MAX_INTENTS = 10_000;

/**
 * Bounded by `maxEntries`. Eviction takes the least recently used record
 * whose payment is terminal, or the least recently used record when none
 * is. An evicted key can still be reused: the intent is re-sent under the
 * same key and the ledger answers with the payment it already holds.
 */
export class InMemoryIntentStore implements IntentStore {
  // Map order is recency order: oldest first
  private intents: Map<string, IntentRecord> = new Map();
  private byPaymentId: Map<string, string> = new Map();
  private maxEntries: number;

  constructor(options: InMemoryIntentStoreOptions = {}) {
    const maxEntries = options.maxEntries ?? DEFAULT_MAX_INTENTS;
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new Error(`maxEntries must be a positive integer, got ${maxEntries}`);
    }
    this.maxEntries = maxEntries;
  }

  create(record: IntentRecord): void {
    if (this.intents.has(record.idempotency_key)) {
      throw new Error(`Intent ${record.idempotency_key} already exists`);
    }
    // Clone to prevent external mutation
    this.intents.set(record.idempotency_key, structuredClone(record));
    this.index(record);
    this.evictOverflow(record.idempotency_key);
  }

  load(idempotencyKey: string): IntentRecord | null {
    const record = this.touch(idempotencyKey);
    return record ? structuredClone(record) : null;
  }

  findByPaymentRef(ref: string): IntentRecord | null {
    const key = this.byPaymentId.get(ref) ?? ref;
    return this.load(key);
  }

  update(idempotencyKey: string, patch: IntentPatch): void {
    const record = this.touch(idempotencyKey);
    if (!record) {
      throw new Error(`Intent ${idempotencyKey} not found`);
    }
    if (patch.body !== undefined) record.body = structuredClone(patch.body);
    if (patch.payment !== undefined) record.payment = structuredClone(patch.payment);
    if (patch.challenge !== undefined) record.challenge = structuredClone(patch.challenge);
    if (patch.resolved_challenges !== undefined) {
      record.resolved_challenges = structuredClone(patch.resolved_challenges);
    }
    record.updated_at = Date.now();
    this.index(record);
  }

  size(): number {
    return this.intents.size;
  }

  // For testing: clear all data
  clear(): void {
    this.intents.clear();
    this.byPaymentId.clear();
  }

  private touch(idempotencyKey: string): IntentRecord | undefined {
    const record = this.intents.get(idempotencyKey);
    if (record) {
      this.intents.delete(idempotencyKey);
      this.intents.set(idempotencyKey, record);
    }
    return record;
  }

  private index(record: IntentRecord): void {
    const paymentId = record.payment?.id;
    if (paymentId && paymentId !== record.idempotency_key) {
      this.byPaymentId.set(paymentId, record.idempotency_key);
    }
  }

  private evictOverflow(keep: string): void {
    while (this.intents.size > this.maxEntries) {
      const candidates = [...this.intents.values()].filter((r) => r.idempotency_key !== keep);
      const victim =
        candidates.find((r) => r.payment !== null && isTerminalStatus(r.payment.status)) ?? candidates[0];
      if (!victim) return;
      this.intents.delete(victim.idempotency_key);
      const paymentId = victim.payment?.id;
      if (paymentId && this.byPaymentId.get(paymentId) === victim.idempotency_key) {
        this.byPaymentId.delete(paymentId);
      }
    }
  }
}
