/**
 * Payments Module
 */

export type {
  PaymentStatus,
  Challenge,
  Payment,
  Balance,
  Agent,
  AuditSubmission,
  CreatePaymentInput,
  PollOptions,
  CreateAgentInput,
  PaymentObservation,
  PaymentRequestBody,
} from './types.js';
export type { IntentRecord, IntentPatch, IntentStore, InMemoryIntentStoreOptions } from './intent-store.js';
export type { PaymentLifecycleDeps } from './controller.js';

export {
  PAYMENT_STATUSES,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_POLL_MAX_WAIT_MS,
  DEFAULT_BALANCE_NETWORK,
  DEFAULT_BALANCE_ASSET,
  DEFAULT_AGENT_DAILY_LIMIT,
  DEFAULT_AGENT_TYPE,
} from './types.js';
export {
  TERMINAL_STATUSES,
  VALID_TRANSITIONS,
  isTerminalStatus,
  isValidTransition,
  advanceStatus,
  reopenAfterChallenge,
} from './state.js';
export {
  decodeStatus,
  decodePaymentObservation,
  decodeChallenge,
  decodeErrorBody,
  decodeBalance,
  decodeBalanceList,
  decodeAgent,
  decodeAuditSubmission,
} from './wire.js';
export { InMemoryIntentStore, DEFAULT_MAX_INTENTS } from './intent-store.js';
export { PaymentLifecycleController } from './controller.js';
