/**
 * Payment Lifecycle Controller
 *
 * Drives a payment from creation, through polling, to a terminal state,
 * and renegotiates challenges with enriched data. Every operation is a
 * Program: the blocking and non-blocking clients run the same code.
 *
 * The ledger is the source of truth. Locally the controller only keeps
 * what it needs to re-send an intent unchanged and to refuse status
 * regressions.
 */

import {
  ChallengeExpiredError,
  ChallengedError,
  PollTimeoutError,
  ResponseFormatError,
  ValidationError,
} from '../errors/errors.js';
import {
  assertNonEmpty,
  generateIdempotencyKey,
  idempotencyKey,
  isPlainRecord,
  positiveDecimal,
} from '../boundaries/invariants.js';
import type { PaymentRuntime } from '../config/credentials.js';
import type { Clock } from '../execution/clock.js';
import { sleep, type Program } from '../execution/program.js';
import { serializeTraceContext } from '../audit/context.js';
import { AuditRegistry, auditedStackHashes } from '../audit/registry.js';
import { NoOpMetrics, type PaymentMetrics } from '../observability/metrics.js';
import type { RetryEngine } from '../retry/engine.js';
import type { Logger } from '../utils/logger.js';
import type { IntentPatch, IntentRecord, IntentStore } from './intent-store.js';
import { advanceStatus, isTerminalStatus, reopenAfterChallenge } from './state.js';
import {
  DEFAULT_AGENT_DAILY_LIMIT,
  DEFAULT_AGENT_TYPE,
  DEFAULT_BALANCE_ASSET,
  DEFAULT_BALANCE_NETWORK,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_POLL_MAX_WAIT_MS,
  type Agent,
  type AuditSubmission,
  type Balance,
  type Challenge,
  type CreateAgentInput,
  type CreatePaymentInput,
  type Payment,
  type PaymentObservation,
  type PaymentRequestBody,
  type PaymentStatus,
  type PollOptions,
} from './types.js';
import {
  decodeAgent,
  decodeAuditSubmission,
  decodeBalance,
  decodeBalanceList,
  decodePaymentObservation,
} from './wire.js';

export interface PaymentLifecycleDeps {
  engine: RetryEngine;
  store: IntentStore;
  runtime: PaymentRuntime;
  clock: Clock;
  /** Functions submitted by `submitAudit` */
  audits?: AuditRegistry;
  logger?: Logger;
  metrics?: PaymentMetrics;
}

export class PaymentLifecycleController {
  private engine: RetryEngine;
  private store: IntentStore;
  private runtime: PaymentRuntime;
  private clock: Clock;
  private audits: AuditRegistry;
  private logger?: Logger;
  private metrics: PaymentMetrics;

  constructor(deps: PaymentLifecycleDeps) {
    this.engine = deps.engine;
    this.store = deps.store;
    this.runtime = deps.runtime;
    this.clock = deps.clock;
    this.audits = deps.audits ?? new AuditRegistry();
    this.logger = deps.logger?.child({ component: 'lifecycle' });
    this.metrics = deps.metrics ?? new NoOpMetrics();
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // CREATE
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Submit a payment intent.
   *
   * A key that already produced a payment returns that payment without a
   * new call. A key whose earlier attempts all failed re-sends the body it
   * stored the first time.
   */
  *createPayment(input: CreatePaymentInput): Program<Payment> {
    this.runtime.credentials();

    assertNonEmpty(input.sender, 'sender');
    assertNonEmpty(input.receiver, 'receiver');
    assertNonEmpty(input.currency, 'currency');
    assertNonEmpty(input.network, 'network');
    const amount = positiveDecimal(input.amount);
    const key =
      input.idempotencyKey !== undefined
        ? idempotencyKey(input.idempotencyKey)
        : generateIdempotencyKey();

    const requested = {
      sending_agent_id: input.sender,
      receiving_agent_id: input.receiver,
      payment_amount: amount,
      currency: input.currency,
      settlement_network: input.network,
    };

    let record = this.store.load(key);
    if (record) {
      assertSameIntent(record.body, requested, key);
      if (record.payment) {
        this.logger?.info(
          { operation: 'createPayment', paymentId: record.payment.id },
          'Idempotency key already produced a payment'
        );
        return record.payment;
      }
    } else {
      const now = this.clock.now();
      record = {
        idempotency_key: key,
        body: {
          request_id: key,
          ...requested,
          trace_context: serializeTraceContext(),
          func_stack_hashes: JSON.stringify(auditedStackHashes()),
          additional_data: {},
        },
        payment: null,
        challenge: null,
        resolved_challenges: [],
        created_at: now,
        updated_at: now,
      };
      this.store.create(record);
    }

    const observation = yield* this.submit(record, 'createPayment');
    if (!observation.id) {
      throw new ResponseFormatError('createPayment', 'missing payment id');
    }

    const current = this.store.load(key) ?? record;
    const now = this.isoNow();
    const base = current.payment ?? paymentFromBody(observation.id, current.body, observation.status, now);
    const payment = this.remember(current, foldObservation(base, observation, now));

    this.logger?.info(
      { operation: 'createPayment', paymentId: payment.id, status: payment.status },
      'Payment created'
    );
    return payment;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // STATUS
  // ═══════════════════════════════════════════════════════════════════════════

  *getPaymentStatus(paymentId: string): Program<Payment> {
    this.runtime.credentials();
    assertNonEmpty(paymentId, 'paymentId');

    const remoteId = this.store.findByPaymentRef(paymentId)?.payment?.id ?? paymentId;

    const observation = yield* this.engine.execute({
      operation: 'getPaymentStatus',
      request: { method: 'GET', path: `/payment/${encodeURIComponent(remoteId)}` },
      decode: (body) => decodePaymentObservation(body, 'getPaymentStatus'),
      resource: `payment ${remoteId}`,
    });

    // Reloaded after the reply: other calls may have advanced the payment meanwhile
    const record = this.store.findByPaymentRef(paymentId);
    const now = this.isoNow();
    if (!record) {
      // Created elsewhere: nothing local to merge with
      const payment = foldObservation(emptyPayment(remoteId, observation.status, now), observation, now);
      this.metrics.statusObserved(payment.status);
      return payment;
    }

    const base = record.payment ?? paymentFromBody(remoteId, record.body, observation.status, now);
    const payment = foldObservation(base, withoutResolvedChallenge(observation, record.resolved_challenges), now);
    if (payment.status !== base.status) {
      this.logger?.info(
        { operation: 'getPaymentStatus', paymentId: payment.id, from: base.status, to: payment.status },
        'Payment status advanced'
      );
    } else if (observation.status !== payment.status) {
      this.logger?.debug(
        { operation: 'getPaymentStatus', paymentId: payment.id, observed: observation.status, kept: payment.status },
        'Ignoring status regression'
      );
    }
    return this.remember(record, payment);
  }

  /**
   * Query until terminal. Raises ChallengedError when the ledger challenges
   * the payment, PollTimeoutError once a query at or past the deadline is
   * still not terminal. Calling again with the same id resumes.
   */
  *pollUntilTerminal(paymentId: string, options: PollOptions = {}): Program<Payment> {
    const interval = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    const maxWait = options.maxWaitMs ?? DEFAULT_POLL_MAX_WAIT_MS;
    if (!(interval > 0)) {
      throw new ValidationError('pollIntervalMs must be greater than 0', 'pollIntervalMs');
    }
    if (!(maxWait >= 0)) {
      throw new ValidationError('maxWaitMs must not be negative', 'maxWaitMs');
    }

    const deadline = this.clock.now() + maxWait;

    for (;;) {
      const payment = yield* this.getPaymentStatus(paymentId);
      if (isTerminalStatus(payment.status)) {
        return payment;
      }
      if (payment.status === 'CHALLENGED' && payment.challenge) {
        const record = this.store.findByPaymentRef(paymentId);
        throw new ChallengedError(payment.challenge, payment.id, record?.idempotency_key);
      }

      const remaining = deadline - this.clock.now();
      if (remaining <= 0) {
        this.metrics.pollTimedOut(maxWait);
        this.logger?.warn(
          { operation: 'pollUntilTerminal', paymentId: payment.id, status: payment.status, maxWaitMs: maxWait },
          'Payment not terminal before deadline'
        );
        throw new PollTimeoutError(payment.id, maxWait, payment.status);
      }

      yield* sleep(Math.min(interval, remaining), 'poll');
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // CHALLENGES
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Re-submit a challenged intent with the requested data, under its
   * original idempotency key.
   */
  *resolveChallenge(
    paymentId: string,
    challenge: Challenge,
    enrichedContext: Record<string, unknown>
  ): Program<Payment> {
    this.runtime.credentials();
    assertNonEmpty(paymentId, 'paymentId');
    if (!isPlainRecord(enrichedContext)) {
      throw new ValidationError('enrichedContext must be an object', 'enrichedContext');
    }

    const record = this.store.findByPaymentRef(paymentId);
    if (!record || !record.challenge || !record.payment) {
      throw new ValidationError(`Payment ${paymentId} has no outstanding challenge`, 'paymentId');
    }
    const outstanding = record.challenge;
    if (!sameChallenge(outstanding, challenge)) {
      throw new ValidationError(
        `Challenge does not match the outstanding challenge of payment ${paymentId}`,
        'challenge'
      );
    }

    const expiresAt = Date.parse(record.challenge.expires_at);
    if (Number.isFinite(expiresAt) && this.clock.now() > expiresAt) {
      const failed: Payment = {
        ...withoutChallenge(record.payment),
        status: advanceStatus(record.payment.status, 'FAILED'),
        updated_at: this.isoNow(),
      };
      this.store.update(record.idempotency_key, { payment: failed, challenge: null });
      this.metrics.challengeResolved('expired');
      this.logger?.warn(
        { operation: 'resolveChallenge', paymentId: failed.id, expiresAt: record.challenge.expires_at },
        'Challenge expired'
      );
      throw new ChallengeExpiredError(failed.id, record.challenge.expires_at);
    }

    const missing = record.challenge.required_fields.filter(
      (field) => enrichedContext[field] === undefined || enrichedContext[field] === null
    );
    if (missing.length > 0) {
      throw new ValidationError(
        `enrichedContext is missing required fields: ${missing.join(', ')}`,
        'enrichedContext'
      );
    }

    const body: PaymentRequestBody = {
      ...record.body,
      additional_data: { ...record.body.additional_data, ...enrichedContext },
    };
    const enriched: IntentRecord = { ...record, body };
    this.store.update(record.idempotency_key, { body });

    const observation = yield* this.submit(enriched, 'resolveChallenge');

    const current = this.store.load(record.idempotency_key) ?? enriched;
    const known = current.payment ?? record.payment;
    const reopened: Payment =
      known.status === 'CHALLENGED'
        ? { ...withoutChallenge(known), status: reopenAfterChallenge(known.status) }
        : withoutChallenge(known);
    const payment = this.remember(
      { ...current, challenge: null },
      foldObservation(reopened, observation, this.isoNow()),
      { reopened: true }
    );
    this.store.update(record.idempotency_key, {
      resolved_challenges: [...current.resolved_challenges, outstanding],
    });
    this.metrics.challengeResolved('resubmitted');

    this.logger?.info(
      { operation: 'resolveChallenge', paymentId: payment.id, status: payment.status },
      'Challenge resolved'
    );
    return payment;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // BALANCES & AGENTS
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Always a fresh read.
   */
  *getBalance(
    agentId: string,
    network: string = DEFAULT_BALANCE_NETWORK,
    asset: string = DEFAULT_BALANCE_ASSET
  ): Program<Balance> {
    this.runtime.credentials();
    assertNonEmpty(agentId, 'agentId');
    assertNonEmpty(network, 'network');
    assertNonEmpty(asset, 'asset');

    const path = ['balance', 'agent', agentId, network, asset].map(encodeURIComponent).join('/');
    const asOf = this.isoNow();
    return yield* this.engine.execute({
      operation: 'getBalance',
      request: { method: 'GET', path: `/${path}` },
      decode: (body) => decodeBalance(body, 'getBalance', { agent_id: agentId, network, asset, as_of: asOf }),
      resource: `balance ${agentId}/${network}/${asset}`,
    });
  }

  *listBalances(agentId: string): Program<Balance[]> {
    this.runtime.credentials();
    assertNonEmpty(agentId, 'agentId');

    const asOf = this.isoNow();
    return yield* this.engine.execute({
      operation: 'listBalances',
      request: { method: 'GET', path: `/balance/agent/${encodeURIComponent(agentId)}` },
      decode: (body) => decodeBalanceList(body, 'listBalances', { agent_id: agentId, as_of: asOf }),
      resource: `balances of ${agentId}`,
    });
  }

  *createAgent(input: CreateAgentInput): Program<Agent> {
    const credentials = this.runtime.credentials();
    assertNonEmpty(input.name, 'name');
    assertNonEmpty(input.description, 'description');

    const dailyLimit = input.agentDailyLimit ?? DEFAULT_AGENT_DAILY_LIMIT;
    if (!Number.isFinite(dailyLimit) || dailyLimit <= 0) {
      throw new ValidationError('agentDailyLimit must be a positive number', 'agentDailyLimit');
    }
    const agentType = input.agentType ?? DEFAULT_AGENT_TYPE;
    assertNonEmpty(agentType, 'agentType');
    const projectId = input.projectId ?? credentials.project_id;
    assertNonEmpty(projectId, 'projectId');

    const agent = yield* this.engine.execute(
      {
        operation: 'createAgent',
        request: {
          method: 'POST',
          path: '/agent_profiles',
          body: {
            name: input.name,
            project_id: projectId,
            description: input.description,
            agent_daily_limit: dailyLimit,
            agent_type: agentType,
          },
        },
        decode: (body) => decodeAgent(body, 'createAgent'),
      },
      // Retries of one call must not register the agent twice
      generateIdempotencyKey()
    );

    this.logger?.info({ operation: 'createAgent', agentId: agent.id }, 'Agent created');
    return agent;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // CODE AUDIT
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Send every registered function to the ledger's code review endpoint.
   * Nothing registered: no call, status `no_entities`.
   */
  *submitAudit(projectId?: string): Program<AuditSubmission> {
    const credentials = this.runtime.credentials();
    const project = projectId ?? credentials.project_id;
    assertNonEmpty(project, 'projectId');

    const functions = this.audits.functions();
    if (functions.length === 0) {
      this.logger?.warn({ operation: 'submitAudit' }, 'No functions registered for audit');
      return { status: 'no_entities', message: 'No functions have been registered for audit', submitted: 0 };
    }

    const submission = yield* this.engine.execute({
      operation: 'submitAudit',
      request: {
        method: 'POST',
        path: '/radar/audit',
        body: {
          project_id: project,
          functions: functions.map((fn) => ({
            function_name: fn.name,
            function_code: fn.source,
            function_hash: fn.hash,
          })),
        },
      },
      decode: (body) => decodeAuditSubmission(body, functions.length),
    });

    this.logger?.info(
      { operation: 'submitAudit', projectId: project, submitted: submission.submitted, status: submission.status },
      'Code audit submitted'
    );
    return submission;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // INTERNALS
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * POST the record's body under its key. A 409 challenge is recorded
   * against the intent before it propagates.
   */
  private *submit(record: IntentRecord, operation: string): Program<PaymentObservation> {
    try {
      return yield* this.engine.execute(
        {
          operation,
          request: { method: 'POST', path: '/payment', body: record.body },
          decode: (body) => decodePaymentObservation(body, operation),
        },
        record.idempotency_key
      );
    } catch (error) {
      if (error instanceof ChallengedError) {
        throw this.recordChallenge(record, error.challenge, error.paymentId);
      }
      throw error;
    }
  }

  private recordChallenge(
    record: IntentRecord,
    challenge: Challenge,
    paymentId: string | undefined
  ): ChallengedError {
    const now = this.isoNow();
    // Without an id from the ledger the key stands in as the payment reference
    const id = paymentId ?? record.payment?.id ?? record.idempotency_key;
    const base = record.payment ?? paymentFromBody(id, record.body, 'CHALLENGED', now);
    const payment: Payment = {
      ...base,
      id,
      status: advanceStatus(base.status, 'CHALLENGED'),
      challenge,
      updated_at: now,
    };

    this.save(record, { payment, challenge });
    this.metrics.challengeRaised(challenge.reason);
    this.metrics.statusObserved(payment.status);
    this.logger?.info(
      { operation: 'createPayment', paymentId: id, reason: challenge.reason },
      'Payment challenged'
    );
    return new ChallengedError(challenge, id, record.idempotency_key);
  }

  /**
   * Store `payment` unless it would move the stored status backwards; the
   * stored payment wins then. Only challenge resolution may reopen.
   */
  private remember(record: IntentRecord, payment: Payment, options: { reopened?: boolean } = {}): Payment {
    const stored = this.store.load(record.idempotency_key)?.payment;
    if (stored && !options.reopened && advanceStatus(stored.status, payment.status) !== payment.status) {
      this.logger?.debug(
        { paymentId: stored.id, stored: stored.status, refused: payment.status },
        'Refusing status regression'
      );
      return stored;
    }

    const challenge = payment.status === 'CHALLENGED' ? payment.challenge ?? record.challenge : null;
    this.save(record, { payment, challenge });
    this.metrics.statusObserved(payment.status);
    if (challenge && !record.challenge) {
      this.metrics.challengeRaised(challenge.reason);
    }
    return payment;
  }

  /**
   * Update the record, re-creating it if the store evicted it meanwhile.
   */
  private save(record: IntentRecord, patch: IntentPatch): void {
    if (this.store.load(record.idempotency_key)) {
      this.store.update(record.idempotency_key, patch);
      return;
    }
    this.store.create({ ...record, ...patch, updated_at: this.clock.now() });
  }

  private isoNow(): string {
    return new Date(this.clock.now()).toISOString();
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function paymentFromBody(
  id: string,
  body: PaymentRequestBody,
  status: PaymentStatus,
  now: string
): Payment {
  return {
    id,
    sender_agent_id: body.sending_agent_id,
    receiver_agent_id: body.receiving_agent_id,
    amount: body.payment_amount,
    currency: body.currency,
    settlement_network: body.settlement_network,
    status,
    created_at: now,
    updated_at: now,
  };
}

function emptyPayment(id: string, status: PaymentStatus, now: string): Payment {
  return {
    id,
    sender_agent_id: '',
    receiver_agent_id: '',
    amount: '',
    currency: '',
    settlement_network: '',
    status,
    created_at: now,
    updated_at: now,
  };
}

/**
 * Merge a possibly partial observation into the known payment. The status
 * only moves forward; a challenge is kept only while CHALLENGED.
 */
function foldObservation(current: Payment, observation: PaymentObservation, now: string): Payment {
  const status = advanceStatus(current.status, observation.status);
  const next: Payment = {
    id: observation.id ?? current.id,
    sender_agent_id: observation.sender_agent_id ?? current.sender_agent_id,
    receiver_agent_id: observation.receiver_agent_id ?? current.receiver_agent_id,
    amount: observation.amount ?? current.amount,
    currency: observation.currency ?? current.currency,
    settlement_network: observation.settlement_network ?? current.settlement_network,
    status,
    created_at: observation.created_at ?? current.created_at,
    updated_at: observation.updated_at ?? now,
  };
  const challenge = status === 'CHALLENGED' ? observation.challenge ?? current.challenge : undefined;
  if (challenge) {
    next.challenge = challenge;
  }
  return next;
}

function withoutChallenge(payment: Payment): Payment {
  const { challenge: _challenge, ...rest } = payment;
  return rest;
}

/**
 * A CHALLENGED observation repeating an answered challenge (or carrying
 * none once one was answered) is a stale read: keep the payment PENDING.
 */
function withoutResolvedChallenge(
  observation: PaymentObservation,
  resolved: readonly Challenge[]
): PaymentObservation {
  if (observation.status !== 'CHALLENGED' || resolved.length === 0) return observation;
  const { challenge, ...rest } = observation;
  if (challenge && !resolved.some((answered) => sameChallenge(answered, challenge))) {
    return observation;
  }
  return { ...rest, status: 'PENDING' };
}

function sameChallenge(a: Challenge, b: Challenge): boolean {
  if (a.reason !== b.reason || a.expires_at !== b.expires_at) return false;
  if (!Array.isArray(b.required_fields)) return false;
  const fields = new Set(b.required_fields);
  return a.required_fields.length === fields.size && a.required_fields.every((f) => fields.has(f));
}

const INTENT_FIELDS = [
  'sending_agent_id',
  'receiving_agent_id',
  'payment_amount',
  'currency',
  'settlement_network',
] as const;

function assertSameIntent(
  stored: PaymentRequestBody,
  requested: Pick<PaymentRequestBody, (typeof INTENT_FIELDS)[number]>,
  key: string
): void {
  const differs = INTENT_FIELDS.filter((field) => stored[field] !== requested[field]);
  if (differs.length > 0) {
    throw new ValidationError(
      `Idempotency key ${key} was used for a different payment (${differs.join(', ')})`,
      'idempotencyKey'
    );
  }
}
