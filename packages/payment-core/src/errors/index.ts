/**
 * Errors Module
 */

export type {
  PaymentErrorKind,
  LedgerErrorDescriptor,
  RetryableErrorKind,
} from './errors.js';

export {
  PaymentError,
  ConfigError,
  NotInitializedError,
  ValidationError,
  NetworkError,
  TimeoutError,
  AuthError,
  ServerError,
  ChallengedError,
  FatalError,
  ResponseFormatError,
  NotFoundError,
  RetriesExhaustedError,
  PollTimeoutError,
  ChallengeExpiredError,
  CancelledError,
  IntentBusyError,
  isPaymentError,
  isRetryableError,
  toErrorDescriptor,
} from './errors.js';
