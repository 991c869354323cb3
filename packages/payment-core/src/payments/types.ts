/**
 * Payment Entity Types
 *
 * Plain structured data, snake_case like the ledger wire format, so any
 * tool layer can hand results straight back to an agent.
 */

// =============================================================================
// LIFECYCLE STATES
// =============================================================================

export type PaymentStatus =
  | 'CREATED'     // Accepted by the ledger, not yet processing
  | 'PENDING'     // Settlement in progress
  | 'CHALLENGED'  // Ledger needs additional data before settling
  | 'CONFIRMED'   // Settled (terminal)
  | 'REJECTED'    // Refused by the ledger (terminal)
  | 'FAILED';     // Settlement failed or challenge expired (terminal)

export const PAYMENT_STATUSES: readonly PaymentStatus[] = [
  'CREATED',
  'PENDING',
  'CHALLENGED',
  'CONFIRMED',
  'REJECTED',
  'FAILED',
];

// =============================================================================
// ENTITIES
// =============================================================================

export interface Challenge {
  reason: string;
  required_fields: string[];
  /** ISO-8601 timestamp */
  expires_at: string;
}

export interface Payment {
  id: string;
  sender_agent_id: string;
  receiver_agent_id: string;
  /** Decimal string, > 0 */
  amount: string;
  currency: string;
  settlement_network: string;
  status: PaymentStatus;
  challenge?: Challenge;
  created_at: string;
  updated_at: string;
}

/**
 * Read-only snapshot; never cached beyond the query that produced it.
 */
export interface Balance {
  agent_id: string;
  network: string;
  asset: string;
  amount: string;
  amount_usd: string | null;
  as_of: string;
}

/**
 * Outcome of submitting the registered functions for code review.
 * `no_entities` when nothing was registered and no call was made.
 */
export interface AuditSubmission {
  status: string;
  message: string | null;
  submitted: number;
}

export interface Agent {
  id: string;
  name: string;
  description: string;
  project_id: string;
  agent_daily_limit: number;
  agent_type: string;
}

// =============================================================================
// OPERATION INPUTS
// =============================================================================

export interface CreatePaymentInput {
  sender: string;
  receiver: string;
  amount: number | string;
  currency: string;
  network: string;
  /** Reuse to resubmit the same logical intent */
  idempotencyKey?: string;
}

export interface PollOptions {
  pollIntervalMs?: number;
  maxWaitMs?: number;
}

export interface CreateAgentInput {
  name: string;
  description: string;
  agentDailyLimit?: number;
  agentType?: string;
  projectId?: string;
}

export const DEFAULT_POLL_INTERVAL_MS = 2_000;
export const DEFAULT_POLL_MAX_WAIT_MS = 60_000;
export const DEFAULT_BALANCE_NETWORK = 'solana';
export const DEFAULT_BALANCE_ASSET = 'USDC';
export const DEFAULT_AGENT_DAILY_LIMIT = 100;
export const DEFAULT_AGENT_TYPE = 'autonomous_agent';

// =============================================================================
// WIRE SHAPES
// =============================================================================

/**
 * What a payment reply may carry. Every field is optional: a create reply
 * can be `{ id, status }` and a status reply just `{ status }`.
 */
export interface PaymentObservation {
  id?: string;
  sender_agent_id?: string;
  receiver_agent_id?: string;
  amount?: string;
  currency?: string;
  settlement_network?: string;
  status: PaymentStatus;
  challenge?: Challenge;
  created_at?: string;
  updated_at?: string;
}

/**
 * Body sent to POST /payment. Identical on every retry of one intent.
 */
export interface PaymentRequestBody {
  request_id: string;
  sending_agent_id: string;
  receiving_agent_id: string;
  payment_amount: string;
  currency: string;
  settlement_network: string;
  trace_context: string;
  /** JSON array of the audited functions on the call chain that created the intent */
  func_stack_hashes: string;
  additional_data: Record<string, unknown>;
}
