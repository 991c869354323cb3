/**
 * Ledger Wire Decoding
 *
 * The ledger owns its schema; these decoders accept what it sends and
 * reject only what the core cannot act on.
 */

import { ResponseFormatError, type LedgerErrorDescriptor } from '../errors/errors.js';
import { isPlainRecord } from '../boundaries/invariants.js';
import {
  PAYMENT_STATUSES,
  type Agent,
  type AuditSubmission,
  type Balance,
  type Challenge,
  type PaymentObservation,
  type PaymentStatus,
} from './types.js';

const STATUS_ALIASES: Record<string, PaymentStatus> = {
  success: 'CONFIRMED',
  succeeded: 'CONFIRMED',
  completed: 'CONFIRMED',
  settled: 'CONFIRMED',
  cancelled: 'FAILED',
  canceled: 'FAILED',
  processing: 'PENDING',
};

export function decodeStatus(raw: unknown): PaymentStatus | null {
  if (typeof raw !== 'string') return null;
  const alias = STATUS_ALIASES[raw.toLowerCase()];
  if (alias) return alias;
  const upper = raw.toUpperCase();
  return PAYMENT_STATUSES.find((status) => status === upper) ?? null;
}

// =============================================================================
// PAYMENTS
// =============================================================================

export function decodePaymentObservation(body: unknown, operation: string): PaymentObservation {
  if (!isPlainRecord(body)) {
    throw new ResponseFormatError(operation, 'expected a JSON object');
  }

  const status = decodeStatus(body.status);
  if (!status) {
    throw new ResponseFormatError(operation, `unknown payment status ${JSON.stringify(body.status)}`);
  }

  const observation: PaymentObservation = { status };
  const id = optionalString(body.id) ?? optionalString(body.payment_id);
  if (id) observation.id = id;

  const sender = optionalString(body.sender_agent_id) ?? optionalString(body.sending_agent_id);
  if (sender) observation.sender_agent_id = sender;
  const receiver = optionalString(body.receiver_agent_id) ?? optionalString(body.receiving_agent_id);
  if (receiver) observation.receiver_agent_id = receiver;

  const amount = optionalDecimal(body.amount) ?? optionalDecimal(body.payment_amount);
  if (amount) observation.amount = amount;
  const currency = optionalString(body.currency);
  if (currency) observation.currency = currency;
  const network = optionalString(body.settlement_network) ?? optionalString(body.network);
  if (network) observation.settlement_network = network;

  const createdAt = optionalString(body.created_at);
  if (createdAt) observation.created_at = createdAt;
  const updatedAt = optionalString(body.updated_at);
  if (updatedAt) observation.updated_at = updatedAt;

  const challenge = decodeChallenge(body.challenge);
  if (challenge) observation.challenge = challenge;

  return observation;
}

// =============================================================================
// CHALLENGES & ERRORS
// =============================================================================

export function decodeChallenge(raw: unknown): Challenge | null {
  if (!isPlainRecord(raw)) return null;

  const reason = optionalString(raw.reason);
  const expiresAt = optionalString(raw.expires_at);
  if (!reason || !expiresAt) return null;

  const fields = Array.isArray(raw.required_fields)
    ? raw.required_fields.filter((f): f is string => typeof f === 'string')
    : [];

  return {
    reason,
    required_fields: Array.from(new Set(fields)),
    expires_at: expiresAt,
  };
}

/**
 * Error body: `{ error: { code, message } | string, challenge?, payment_id? }`.
 */
export function decodeErrorBody(body: unknown): {
  descriptor?: LedgerErrorDescriptor;
  challenge: Challenge | null;
  paymentId?: string;
} {
  if (!isPlainRecord(body)) {
    return typeof body === 'string' && body.length > 0
      ? { descriptor: { message: body }, challenge: null }
      : { challenge: null };
  }

  let descriptor: LedgerErrorDescriptor | undefined;
  if (isPlainRecord(body.error)) {
    descriptor = {
      ...body.error,
      code: optionalString(body.error.code),
      message: optionalString(body.error.message),
    };
  } else if (typeof body.error === 'string') {
    descriptor = { message: body.error };
  } else if (typeof body.detail === 'string') {
    descriptor = { message: body.detail };
  } else if (typeof body.message === 'string') {
    descriptor = { message: body.message };
  }

  const payment = isPlainRecord(body.payment) ? body.payment : undefined;
  const challenge = decodeChallenge(body.challenge) ?? decodeChallenge(payment?.challenge);
  const paymentId = optionalString(body.payment_id) ?? optionalString(payment?.id);

  return {
    ...(descriptor ? { descriptor } : {}),
    challenge,
    ...(paymentId ? { paymentId } : {}),
  };
}

// =============================================================================
// BALANCES & AGENTS
// =============================================================================

export function decodeBalance(
  body: unknown,
  operation: string,
  fallback: { agent_id: string; network?: string; asset?: string; as_of: string }
): Balance {
  if (!isPlainRecord(body)) {
    throw new ResponseFormatError(operation, 'expected a JSON object');
  }

  const amount = optionalDecimal(body.amount) ?? optionalDecimal(body.balance);
  if (!amount) {
    throw new ResponseFormatError(operation, 'missing balance amount');
  }

  const network = optionalString(body.network) ?? fallback.network;
  const asset = optionalString(body.asset) ?? fallback.asset;
  if (!network || !asset) {
    throw new ResponseFormatError(operation, 'missing balance network or asset');
  }

  return {
    agent_id: optionalString(body.agent_id) ?? fallback.agent_id,
    network,
    asset,
    amount,
    amount_usd: optionalDecimal(body.amount_usd) ?? optionalDecimal(body.balance_usd) ?? null,
    as_of: optionalString(body.as_of) ?? fallback.as_of,
  };
}

export function decodeBalanceList(
  body: unknown,
  operation: string,
  fallback: { agent_id: string; as_of: string }
): Balance[] {
  const entries = Array.isArray(body)
    ? body
    : isPlainRecord(body) && Array.isArray(body.balances)
      ? body.balances
      : null;
  if (!entries) {
    throw new ResponseFormatError(operation, 'expected a list of balances');
  }
  return entries.map((entry) => decodeBalance(entry, operation, fallback));
}

export function decodeAgent(body: unknown, operation: string): Agent {
  if (!isPlainRecord(body)) {
    throw new ResponseFormatError(operation, 'expected a JSON object');
  }
  const id = optionalString(body.id);
  if (!id) {
    throw new ResponseFormatError(operation, 'missing agent id');
  }
  return {
    id,
    name: optionalString(body.name) ?? '',
    description: optionalString(body.description) ?? '',
    project_id: optionalString(body.project_id) ?? '',
    agent_daily_limit: typeof body.agent_daily_limit === 'number' ? body.agent_daily_limit : Number(body.agent_daily_limit ?? 0),
    agent_type: optionalString(body.agent_type) ?? '',
  };
}

export function decodeAuditSubmission(body: unknown, submitted: number): AuditSubmission {
  if (!isPlainRecord(body)) {
    return { status: 'submitted', message: null, submitted };
  }
  return {
    status: optionalString(body.status) ?? 'submitted',
    message: optionalString(body.message) ?? null,
    submitted,
  };
}

// =============================================================================
// HELPERS
// =============================================================================

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function optionalDecimal(value: unknown): string | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value === 'string' && /^-?\d+(\.\d+)?$/.test(value.trim())) return value.trim();
  return undefined;
}
