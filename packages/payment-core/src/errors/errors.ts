/**
 * Payment Core Error Taxonomy
 *
 * Every failure that leaves the core is a PaymentError with a `kind`
 * discriminant, so callers and tool layers can branch without parsing
 * messages.
 *
 * Propagation:
 * - NetworkError / TimeoutError are absorbed by the retry engine and only
 *   surface wrapped in RetriesExhaustedError.
 * - Everything else propagates unchanged.
 */

import type { Challenge } from '../payments/types.js';

// =============================================================================
// KINDS
// =============================================================================

export type PaymentErrorKind =
  | 'ConfigError'
  | 'NotInitialized'
  | 'ValidationError'
  | 'NetworkError'
  | 'TimeoutError'
  | 'AuthError'
  | 'ServerError'
  | 'ChallengedError'
  | 'FatalError'
  | 'ResponseFormatError'
  | 'NotFound'
  | 'RetriesExhausted'
  | 'PollTimeout'
  | 'ChallengeExpired'
  | 'Cancelled'
  | 'IntentBusy';

/**
 * Error descriptor returned by the ledger on 4xx/5xx replies.
 */
export interface LedgerErrorDescriptor {
  code?: string;
  message?: string;
  [key: string]: unknown;
}

// =============================================================================
// BASE
// =============================================================================

export abstract class PaymentError extends Error {
  abstract readonly kind: PaymentErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// =============================================================================
// CONFIGURATION
// =============================================================================

export class ConfigError extends PaymentError {
  readonly kind = 'ConfigError';
}

export class NotInitializedError extends PaymentError {
  readonly kind = 'NotInitialized';

  constructor() {
    super('Payment core is not initialized: supply credentials before invoking operations');
  }
}

// =============================================================================
// INPUT
// =============================================================================

export class ValidationError extends PaymentError {
  readonly kind = 'ValidationError';

  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
  }
}

// =============================================================================
// TRANSPORT
// =============================================================================

export class NetworkError extends PaymentError {
  readonly kind = 'NetworkError';
}

export class TimeoutError extends PaymentError {
  readonly kind = 'TimeoutError';

  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(`Request timed out: ${operation} after ${timeoutMs}ms`);
  }
}

export class AuthError extends PaymentError {
  readonly kind = 'AuthError';

  constructor(
    public readonly status: number,
    public readonly descriptor?: LedgerErrorDescriptor
  ) {
    super(`Ledger rejected credentials (HTTP ${status})${describe(descriptor)}`);
  }
}

// =============================================================================
// LEDGER OUTCOMES
// =============================================================================

/**
 * 5xx reply. Retried by the engine; surfaces only as the cause of
 * RetriesExhaustedError.
 */
export class ServerError extends PaymentError {
  readonly kind = 'ServerError';

  constructor(
    public readonly operation: string,
    public readonly status: number,
    public readonly descriptor?: LedgerErrorDescriptor
  ) {
    super(`${operation} failed with HTTP ${status}${describe(descriptor)}`);
  }
}

export class ChallengedError extends PaymentError {
  readonly kind = 'ChallengedError';

  constructor(
    public readonly challenge: Challenge,
    public readonly paymentId: string | undefined,
    public readonly idempotencyKey: string | undefined
  ) {
    super(`Payment challenged: ${challenge.reason}`);
  }
}

export class FatalError extends PaymentError {
  readonly kind = 'FatalError';

  constructor(
    public readonly operation: string,
    public readonly status: number,
    public readonly descriptor?: LedgerErrorDescriptor
  ) {
    super(`${operation} failed with HTTP ${status}${describe(descriptor)}`);
  }
}

export class ResponseFormatError extends PaymentError {
  readonly kind = 'ResponseFormatError';

  constructor(
    public readonly operation: string,
    detail: string
  ) {
    super(`${operation} returned a malformed body: ${detail}`);
  }
}

export class NotFoundError extends PaymentError {
  readonly kind = 'NotFound';

  constructor(
    public readonly resource: string,
    public readonly descriptor?: LedgerErrorDescriptor
  ) {
    super(`Not found: ${resource}${describe(descriptor)}`);
  }
}

// =============================================================================
// RETRY / LIFECYCLE
// =============================================================================

export type RetryableErrorKind = 'NetworkError' | 'TimeoutError' | 'ServerError';

export class RetriesExhaustedError extends PaymentError {
  readonly kind = 'RetriesExhausted';

  constructor(
    public readonly operation: string,
    public readonly attempts: number,
    public readonly lastErrorKind: RetryableErrorKind,
    cause: unknown
  ) {
    super(
      `${operation} gave up after ${attempts} attempts (last failure: ${lastErrorKind})`,
      { cause }
    );
  }
}

export class PollTimeoutError extends PaymentError {
  readonly kind = 'PollTimeout';

  constructor(
    public readonly paymentId: string,
    public readonly maxWaitMs: number,
    public readonly lastStatus: string
  ) {
    super(
      `Payment ${paymentId} not terminal after ${maxWaitMs}ms (last status ${lastStatus}); polling can be resumed`
    );
  }
}

export class ChallengeExpiredError extends PaymentError {
  readonly kind = 'ChallengeExpired';

  constructor(
    public readonly paymentId: string,
    public readonly expiresAt: string
  ) {
    super(`Challenge for payment ${paymentId} expired at ${expiresAt}`);
  }
}

export class CancelledError extends PaymentError {
  readonly kind = 'Cancelled';

  constructor(public readonly operation: string) {
    super(`${operation} was cancelled`);
  }
}

export class IntentBusyError extends PaymentError {
  readonly kind = 'IntentBusy';

  constructor(public readonly idempotencyKey: string) {
    super(`Another attempt for idempotency key ${idempotencyKey} is in flight`);
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function isPaymentError(error: unknown): error is PaymentError {
  return error instanceof PaymentError;
}

/**
 * Transport failures the retry engine absorbs.
 */
export function isRetryableError(error: unknown): error is NetworkError | TimeoutError {
  return error instanceof NetworkError || error instanceof TimeoutError;
}

/**
 * Plain-data view of an error for tool layers.
 */
export function toErrorDescriptor(error: unknown): {
  kind: PaymentErrorKind | 'UnknownError';
  message: string;
  details: Record<string, unknown>;
} {
  if (!isPaymentError(error)) {
    return {
      kind: 'UnknownError',
      message: error instanceof Error ? error.message : String(error),
      details: {},
    };
  }

  const details: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(error)) {
    if (key === 'kind' || key === 'name' || key === 'message' || key === 'stack') continue;
    details[key] = value;
  }

  return { kind: error.kind, message: error.message, details };
}

function describe(descriptor?: LedgerErrorDescriptor): string {
  if (!descriptor) return '';
  const parts = [descriptor.code, descriptor.message].filter(
    (p): p is string => typeof p === 'string' && p.length > 0
  );
  return parts.length > 0 ? `: ${parts.join(' ')}` : '';
}
