/**
 * Retry Engine
 *
 * Wraps one logical request in bounded, backed-off retries.
 *
 * - Retryable: 5xx, NetworkError, TimeoutError
 * - Never retried: challenges, 4xx, auth failures, malformed success bodies
 * - Every attempt of one call carries the same idempotency key
 * - Backoff delays never decrease within one call
 *
 * The engine produces a Program, so it suspends only through SEND and SLEEP
 * and runs unchanged under either runner.
 */

import {
  ChallengedError,
  FatalError,
  NotFoundError,
  RetriesExhaustedError,
  ServerError,
  isRetryableError,
  type RetryableErrorKind,
} from '../errors/errors.js';
import type { Clock } from '../execution/clock.js';
import { send, sleep, type Program } from '../execution/program.js';
import { NoOpMetrics, type PaymentMetrics } from '../observability/metrics.js';
import type { TransportRequest, TransportResponse } from '../transport/types.js';
import type { Logger } from '../utils/logger.js';
import { classifyResponse } from './classify.js';
import { calculateDelay, resolveRetryPolicy, type RetryPolicy } from './policy.js';

// =============================================================================
// TYPES
// =============================================================================

export interface RequestDescriptor<T> {
  operation: string;
  request: Omit<TransportRequest, 'operation' | 'idempotencyKey'>;
  /** Turns a 2xx body into the result; throws ResponseFormatError */
  decode(body: unknown): T;
  /** Named by NotFoundError on 404 */
  resource?: string;
}

/**
 * Lives for one execute call only.
 */
export interface RetryContext {
  attempt_count: number;
  next_backoff: number;
  last_error_kind: RetryableErrorKind | null;
}

type AttemptResult<T> =
  | { type: 'DONE'; value: T }
  | { type: 'RETRY'; kind: RetryableErrorKind; error: unknown };

export interface RetryEngineOptions {
  policy?: Partial<RetryPolicy>;
  clock: Clock;
  logger?: Logger;
  metrics?: PaymentMetrics;
  /** Jitter source, [0, 1) */
  random?: () => number;
}

// =============================================================================
// ENGINE
// =============================================================================

export class RetryEngine {
  readonly policy: RetryPolicy;
  private clock: Clock;
  private logger?: Logger;
  private metrics: PaymentMetrics;
  private random: () => number;

  constructor(options: RetryEngineOptions) {
    this.policy = resolveRetryPolicy(options.policy);
    this.clock = options.clock;
    this.logger = options.logger?.child({ component: 'retry' });
    this.metrics = options.metrics ?? new NoOpMetrics();
    this.random = options.random ?? Math.random;
  }

  *execute<T>(descriptor: RequestDescriptor<T>, idempotencyKey?: string): Program<T> {
    const { operation } = descriptor;
    const context: RetryContext = { attempt_count: 0, next_backoff: 0, last_error_kind: null };

    for (;;) {
      context.attempt_count++;
      const result = yield* this.attempt(descriptor, idempotencyKey);
      if (result.type === 'DONE') {
        return result.value;
      }

      context.last_error_kind = result.kind;

      if (context.attempt_count >= this.policy.max_attempts) {
        this.metrics.retriesExhausted(operation, context.attempt_count, result.kind);
        this.logger?.warn(
          { operation, attempts: context.attempt_count, errorKind: result.kind },
          'Retries exhausted'
        );
        throw new RetriesExhaustedError(operation, context.attempt_count, result.kind, result.error);
      }

      const delay = Math.max(
        calculateDelay(context.attempt_count, this.policy, this.random),
        context.next_backoff
      );
      context.next_backoff = delay;

      this.metrics.attemptRetried(operation, context.attempt_count, result.kind, delay);
      this.logger?.warn(
        { operation, attempt: context.attempt_count, errorKind: result.kind, delayMs: delay },
        'Retrying after transient failure'
      );

      yield* sleep(delay, 'backoff');
    }
  }

  private *attempt<T>(
    descriptor: RequestDescriptor<T>,
    idempotencyKey: string | undefined
  ): Program<AttemptResult<T>> {
    const { operation } = descriptor;
    const request: TransportRequest = {
      ...descriptor.request,
      operation,
      ...(idempotencyKey !== undefined ? { idempotencyKey } : {}),
    };
    const startedAt = this.clock.now();

    let response: TransportResponse;
    try {
      response = yield* send(request);
    } catch (error) {
      this.metrics.attemptCompleted(
        operation,
        isRetryableError(error) ? error.kind : 'FAILED',
        this.clock.now() - startedAt
      );
      if (isRetryableError(error)) {
        return { type: 'RETRY', kind: error.kind, error };
      }
      throw error;
    }

    const outcome = classifyResponse(response);
    this.metrics.attemptCompleted(operation, outcome.type, this.clock.now() - startedAt);

    switch (outcome.type) {
      case 'SUCCESS':
        return { type: 'DONE', value: descriptor.decode(response.body) };

      case 'RETRYABLE':
        return {
          type: 'RETRY',
          kind: 'ServerError',
          error: new ServerError(operation, outcome.status, outcome.descriptor),
        };

      case 'CHALLENGED':
        this.logger?.info({ operation, reason: outcome.challenge.reason }, 'Ledger raised a challenge');
        throw new ChallengedError(outcome.challenge, outcome.paymentId, idempotencyKey);

      case 'NOT_FOUND':
        throw new NotFoundError(descriptor.resource ?? operation, outcome.descriptor);

      case 'FATAL':
        throw new FatalError(operation, outcome.status, outcome.descriptor);
    }
  }
}
