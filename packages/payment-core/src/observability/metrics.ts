/**
 * Metrics Interface
 *
 * Write-only signals for observability. The retry engine and the lifecycle
 * controller report here and never read anything back.
 *
 * Default implementation is no-op.
 */

import type { PaymentStatus } from '../payments/types.js';

// =============================================================================
// METRICS INTERFACE
// =============================================================================

/**
 * All methods are fire-and-forget. Implementations must never throw.
 */
export interface PaymentMetrics {
  // =========================================================================
  // Attempts
  // =========================================================================

  /** One transport attempt finished (any outcome) */
  attemptCompleted(operation: string, outcome: string, durationMs: number): void;

  /** A retryable failure will be retried after `delayMs` */
  attemptRetried(operation: string, attempt: number, errorKind: string, delayMs: number): void;

  retriesExhausted(operation: string, attempts: number, errorKind: string): void;

  // =========================================================================
  // Lifecycle
  // =========================================================================

  statusObserved(status: PaymentStatus): void;

  challengeRaised(reason: string): void;

  challengeResolved(outcome: 'resubmitted' | 'expired'): void;

  pollTimedOut(maxWaitMs: number): void;

  // =========================================================================
  // Audit
  // =========================================================================

  traceEmitted(operation: string, outcome: 'success' | 'error'): void;

  traceSinkFailed(sink: string): void;
}

// =============================================================================
// NO-OP IMPLEMENTATION (Default)
// =============================================================================

export class NoOpMetrics implements PaymentMetrics {
  attemptCompleted(_operation: string, _outcome: string, _durationMs: number): void {}
  attemptRetried(_operation: string, _attempt: number, _errorKind: string, _delayMs: number): void {}
  retriesExhausted(_operation: string, _attempts: number, _errorKind: string): void {}

  statusObserved(_status: PaymentStatus): void {}
  challengeRaised(_reason: string): void {}
  challengeResolved(_outcome: 'resubmitted' | 'expired'): void {}
  pollTimedOut(_maxWaitMs: number): void {}

  traceEmitted(_operation: string, _outcome: 'success' | 'error'): void {}
  traceSinkFailed(_sink: string): void {}
}

// =============================================================================
// CONSOLE METRICS (for development)
// =============================================================================

export class ConsoleMetrics implements PaymentMetrics {
  private log(category: string, event: string, data: Record<string, unknown>): void {
    console.log(JSON.stringify({
      timestamp: new Date().toISOString(),
      category,
      event,
      ...data,
    }));
  }

  attemptCompleted(operation: string, outcome: string, durationMs: number): void {
    this.log('attempt', 'completed', { operation, outcome, durationMs });
  }

  attemptRetried(operation: string, attempt: number, errorKind: string, delayMs: number): void {
    this.log('attempt', 'retried', { operation, attempt, errorKind, delayMs });
  }

  retriesExhausted(operation: string, attempts: number, errorKind: string): void {
    this.log('attempt', 'exhausted', { operation, attempts, errorKind });
  }

  statusObserved(status: PaymentStatus): void {
    this.log('payment', 'status_observed', { status });
  }

  challengeRaised(reason: string): void {
    this.log('challenge', 'raised', { reason });
  }

  challengeResolved(outcome: 'resubmitted' | 'expired'): void {
    this.log('challenge', 'resolved', { outcome });
  }

  pollTimedOut(maxWaitMs: number): void {
    this.log('poll', 'timed_out', { maxWaitMs });
  }

  traceEmitted(operation: string, outcome: 'success' | 'error'): void {
    this.log('audit', 'emitted', { operation, outcome });
  }

  traceSinkFailed(sink: string): void {
    this.log('audit', 'sink_failed', { sink });
  }
}
