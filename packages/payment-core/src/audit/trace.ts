/**
 * Trace Capture
 *
 * `traced` wraps an operation so that every invocation, including one that
 * throws or rejects, produces exactly one frozen TraceRecord. The wrapper
 * hands the record to a recorder and returns; delivery happens later and
 * never touches the result or the error of the wrapped call.
 */

import { generateCorrelationId } from '../boundaries/invariants.js';
import { isPaymentError } from '../errors/errors.js';
import { recordToolCall } from './context.js';
import { redactArguments } from './redact.js';

export type TraceOutcome =
  | { status: 'success' }
  | { status: 'error'; error_kind: string; message: string };

export interface TraceRecord {
  readonly operation_name: string;
  /** Redacted snapshot taken at call time */
  readonly arguments: readonly unknown[];
  /** ISO-8601 */
  readonly started_at: string;
  readonly duration_ms: number;
  readonly outcome: Readonly<TraceOutcome>;
  readonly correlation_id: string;
}

/**
 * Must return immediately and never throw.
 */
export interface TraceRecorder {
  record(record: TraceRecord): void;
}

export interface TracedOptions {
  recorder: TraceRecorder;
  /** Epoch milliseconds */
  now?: () => number;
}

export function traced<A extends unknown[], R>(
  name: string,
  fn: (...args: A) => R,
  options: TracedOptions
): (...args: A) => R {
  const now = options.now ?? Date.now;

  return function (this: unknown, ...args: A): R {
    const correlationId = generateCorrelationId();
    const startedAt = now();
    const snapshot = safeRedact(args);
    recordToolCall({ name, correlation_id: correlationId });

    const finish = (outcome: TraceOutcome): void => {
      options.recorder.record(
        deepFreeze({
          operation_name: name,
          arguments: snapshot,
          started_at: new Date(startedAt).toISOString(),
          duration_ms: Math.max(0, now() - startedAt),
          outcome,
          correlation_id: correlationId,
        })
      );
    };

    let result: R;
    try {
      result = fn.apply(this, args);
    } catch (error) {
      finish(errorOutcome(error));
      throw error;
    }

    if (isThenable(result)) {
      // Observes the promise; the caller still receives the original one
      void result.then(
        () => finish({ status: 'success' }),
        (error: unknown) => finish(errorOutcome(error))
      );
      return result;
    }

    finish({ status: 'success' });
    return result;
  };
}

function errorOutcome(error: unknown): TraceOutcome {
  if (isPaymentError(error)) {
    return { status: 'error', error_kind: error.kind, message: error.message };
  }
  if (error instanceof Error) {
    return { status: 'error', error_kind: error.name, message: error.message };
  }
  return { status: 'error', error_kind: 'UnknownError', message: String(error) };
}

function safeRedact(args: readonly unknown[]): unknown[] {
  try {
    return redactArguments(args);
  } catch {
    // Throwing getters and proxies
    return ['[Unserializable]'];
  }
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const entry of Object.values(value)) {
      deepFreeze(entry);
    }
  }
  return value;
}
