/**
 * Payment Lifecycle Tests
 *
 * Proves:
 * - A payment goes from creation to a terminal state through polling
 * - Reusing an idempotency key never produces a second payment
 * - Invalid input is refused before any call reaches the ledger
 * - Challenges are resolved by re-sending the same intent, enriched
 * - Status never moves backwards, even when replies arrive out of order
 * - Registered functions are submitted for audit and named on each payment
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { AuditRegistry, hashSource, runWithTraceContext } from '../../src/audit/index.js';
import { PaymentRuntime } from '../../src/config/index.js';
import {
  ChallengeExpiredError,
  ChallengedError,
  FatalError,
  NotFoundError,
  NotInitializedError,
  PollTimeoutError,
  ResponseFormatError,
  RetriesExhaustedError,
  ValidationError,
} from '../../src/errors/index.js';
import { runCooperative, type Program } from '../../src/execution/index.js';
import { InMemoryIntentStore, PaymentLifecycleController } from '../../src/payments/index.js';
import type { Challenge, CreatePaymentInput } from '../../src/payments/index.js';
import { RetryEngine } from '../../src/retry/index.js';
import type { Transport } from '../../src/transport/index.js';
import {
  DeferredTransport,
  FakeClock,
  FakeLedger,
  ScriptedTransport,
  START_TIME,
  initializedRuntime,
  testEnv,
  type FakeLedgerConfig,
} from './mocks.js';

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

const XRP_PAYMENT: CreatePaymentInput = {
  sender: 'agent_a',
  receiver: 'agent_b',
  amount: 10,
  currency: 'XRP',
  network: 'xrpl',
};

const KYC_CHALLENGE: Challenge = {
  reason: 'kyc_required',
  required_fields: ['purpose'],
  expires_at: '2026-01-01T00:10:00.000Z',
};

interface SetupOptions {
  runtime?: PaymentRuntime;
  store?: InMemoryIntentStore;
  audits?: AuditRegistry;
}

function setup(transport: Transport, options: SetupOptions = {}) {
  const clock = new FakeClock();
  const store = options.store ?? new InMemoryIntentStore();
  const runtime = options.runtime ?? initializedRuntime();
  // random 0.5 cancels jitter: delays are exactly 500, 1000, ...
  const engine = new RetryEngine({ clock, random: () => 0.5 });
  const controller = new PaymentLifecycleController({ engine, store, runtime, clock, audits: options.audits });
  const env = testEnv(transport, clock);

  const run = <T>(program: Program<T>): Promise<T> => runCooperative(program, env, { operation: 'test' });

  return { clock, store, controller, run };
}

function ledgerSetup(config: FakeLedgerConfig = {}, options: SetupOptions = {}) {
  const ledger = new FakeLedger(config);
  return { ledger, ...setup(ledger, options) };
}

/** Lets every pending callback and promise run */
function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(() => resolve()));
}

// ═══════════════════════════════════════════════════════════════════════════
// CREATE & POLL
// ═══════════════════════════════════════════════════════════════════════════

describe('createPayment', () => {
  it('should create and poll a payment to CONFIRMED', async () => {
    const { ledger, clock, controller, run } = ledgerSetup();

    const created = await run(controller.createPayment(XRP_PAYMENT));

    expect(created).toEqual({
      id: 'pay_1',
      sender_agent_id: 'agent_a',
      receiver_agent_id: 'agent_b',
      amount: '10',
      currency: 'XRP',
      settlement_network: 'xrpl',
      status: 'CREATED',
      created_at: '2026-01-01T00:00:00.000Z',
      updated_at: '2026-01-01T00:00:00.000Z',
    });

    const settled = await run(controller.pollUntilTerminal('pay_1', { pollIntervalMs: 1_000 }));

    expect(settled.status).toBe('CONFIRMED');
    expect(settled.amount).toBe('10');
    expect(ledger.requests).toHaveLength(3);
    expect(clock.sleeps).toEqual([1_000]);
  });

  it('should send the intent body under its idempotency key', async () => {
    const { ledger, controller, run } = ledgerSetup();

    await run(controller.createPayment({ ...XRP_PAYMENT, amount: '0010.50', idempotencyKey: 'intent-1' }));

    expect(ledger.requests[0]).toEqual({
      operation: 'createPayment',
      method: 'POST',
      path: '/payment',
      idempotencyKey: 'intent-1',
      body: {
        request_id: 'intent-1',
        sending_agent_id: 'agent_a',
        receiving_agent_id: 'agent_b',
        payment_amount: '10.5',
        currency: 'XRP',
        settlement_network: 'xrpl',
        trace_context: '{}',
        func_stack_hashes: '[]',
        additional_data: {},
      },
    });
  });

  it('should generate a key when none is given', async () => {
    const { ledger, controller, run } = ledgerSetup();

    await run(controller.createPayment(XRP_PAYMENT));

    expect(ledger.requests[0].idempotencyKey).toMatch(UUID_V4);
  });

  it('should carry the agent trace context', async () => {
    const { ledger, controller, run } = ledgerSetup();

    await runWithTraceContext(() => run(controller.createPayment(XRP_PAYMENT)), { agent: 'buyer' });

    expect(ledger.requests[0].body).toMatchObject({ trace_context: '{"agent":"buyer"}' });
  });

  it('should return the existing payment for a reused key without calling the ledger', async () => {
    const { ledger, controller, run } = ledgerSetup();

    const first = await run(controller.createPayment({ ...XRP_PAYMENT, idempotencyKey: 'intent-1' }));
    const second = await run(controller.createPayment({ ...XRP_PAYMENT, idempotencyKey: 'intent-1' }));

    expect(second).toEqual(first);
    expect(ledger.countRequests('POST', '/payment')).toBe(1);
    expect(ledger.payments.size).toBe(1);
  });

  it('should refuse a reused key with a different intent', async () => {
    const { ledger, controller, run } = ledgerSetup();

    await run(controller.createPayment({ ...XRP_PAYMENT, idempotencyKey: 'intent-1' }));

    await expect(
      run(controller.createPayment({ ...XRP_PAYMENT, amount: 11, idempotencyKey: 'intent-1' }))
    ).rejects.toBeInstanceOf(ValidationError);
    expect(ledger.requests).toHaveLength(1);
  });

  it.each<{ label: string; override: Partial<CreatePaymentInput> }>([
    { label: 'zero amount', override: { amount: 0 } },
    { label: 'negative amount', override: { amount: -5 } },
    { label: 'non-numeric amount', override: { amount: 'ten' } },
    { label: 'empty sender', override: { sender: '' } },
    { label: 'blank network', override: { network: '  ' } },
    { label: 'empty idempotency key', override: { idempotencyKey: '' } },
  ])('should reject $label before any call', async ({ override }) => {
    const { ledger, controller, run } = ledgerSetup();

    await expect(run(controller.createPayment({ ...XRP_PAYMENT, ...override }))).rejects.toBeInstanceOf(
      ValidationError
    );
    expect(ledger.requests).toHaveLength(0);
  });

  it('should retry transient failures with the same key', async () => {
    const { ledger, clock, controller, run } = ledgerSetup();
    ledger.failNext({ status: 503 }, 'network');

    const payment = await run(controller.createPayment({ ...XRP_PAYMENT, idempotencyKey: 'intent-1' }));

    expect(payment.id).toBe('pay_1');
    expect(ledger.requests.map((r) => r.idempotencyKey)).toEqual(['intent-1', 'intent-1', 'intent-1']);
    expect(clock.sleeps).toEqual([500, 1_000]);
    expect(ledger.payments.size).toBe(1);
  });

  it('should re-send the stored body after exhausted retries', async () => {
    const { ledger, controller, run } = ledgerSetup();
    ledger.failNext({ status: 503 }, { status: 502 }, 'timeout');

    await expect(
      run(controller.createPayment({ ...XRP_PAYMENT, idempotencyKey: 'intent-1' }))
    ).rejects.toBeInstanceOf(RetriesExhaustedError);

    const payment = await run(controller.createPayment({ ...XRP_PAYMENT, idempotencyKey: 'intent-1' }));

    expect(payment.id).toBe('pay_1');
    expect(ledger.requests).toHaveLength(4);
    expect(ledger.requests[3].body).toEqual(ledger.requests[0].body);
  });

  it('should not retry a client error', async () => {
    const { ledger, controller, run } = ledgerSetup();
    ledger.failNext({ status: 400, body: { error: { code: 'bad_request', message: 'Unknown currency' } } });

    await expect(run(controller.createPayment(XRP_PAYMENT))).rejects.toThrow(
      'createPayment failed with HTTP 400'
    );
    expect(ledger.requests).toHaveLength(1);
  });

  it('should reject a create reply without a payment id', async () => {
    const { controller, run } = setup(new ScriptedTransport([{ status: 200, body: { status: 'CREATED' } }]));

    await expect(run(controller.createPayment(XRP_PAYMENT))).rejects.toBeInstanceOf(ResponseFormatError);
  });

  it('should re-send an evicted intent and get back the same payment', async () => {
    const store = new InMemoryIntentStore({ maxEntries: 1 });
    const { ledger, controller, run } = ledgerSetup({}, { store });

    const first = await run(controller.createPayment({ ...XRP_PAYMENT, idempotencyKey: 'intent-1' }));
    await run(controller.createPayment({ ...XRP_PAYMENT, idempotencyKey: 'intent-2' }));
    expect(store.load('intent-1')).toBeNull();

    const again = await run(controller.createPayment({ ...XRP_PAYMENT, idempotencyKey: 'intent-1' }));

    expect(again.id).toBe(first.id);
    expect(ledger.requests[2]).toMatchObject({ path: '/payment', idempotencyKey: 'intent-1' });
    expect(ledger.payments.size).toBe(2);
    expect(store.size()).toBe(1);
  });

  it('should fail with NotInitialized before credentials are supplied', async () => {
    const ledger = new FakeLedger();
    const { controller, run } = setup(ledger, { runtime: new PaymentRuntime() });

    await expect(run(controller.createPayment(XRP_PAYMENT))).rejects.toBeInstanceOf(NotInitializedError);
    expect(ledger.requests).toHaveLength(0);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// STATUS & POLLING
// ═══════════════════════════════════════════════════════════════════════════

describe('getPaymentStatus', () => {
  it('should never move a payment backwards', async () => {
    const { controller, run } = ledgerSetup({ statusScript: ['CONFIRMED', 'PENDING'] });
    await run(controller.createPayment(XRP_PAYMENT));

    const first = await run(controller.getPaymentStatus('pay_1'));
    const second = await run(controller.getPaymentStatus('pay_1'));

    expect(first.status).toBe('CONFIRMED');
    expect(second.status).toBe('CONFIRMED');
  });

  it('should keep the furthest status when reads complete out of order', async () => {
    const transport = new DeferredTransport();
    const { store, controller, run } = setup(transport);

    const created = run(controller.createPayment({ ...XRP_PAYMENT, idempotencyKey: 'intent-1' }));
    await flush();
    transport.pending[0].respond({ status: 200, body: { id: 'pay_1', status: 'PENDING' } });
    expect((await created).status).toBe('PENDING');

    const earlier = run(controller.getPaymentStatus('pay_1'));
    const later = run(controller.getPaymentStatus('pay_1'));
    await flush();
    expect(transport.pending).toHaveLength(3);

    transport.pending[2].respond({ status: 200, body: { status: 'CONFIRMED' } });
    expect((await later).status).toBe('CONFIRMED');
    transport.pending[1].respond({ status: 200, body: { status: 'PENDING' } });
    expect((await earlier).status).toBe('CONFIRMED');
    expect(store.load('intent-1')?.payment?.status).toBe('CONFIRMED');

    const next = run(controller.getPaymentStatus('pay_1'));
    await flush();
    transport.pending[3].respond({ status: 200, body: { status: 'PENDING' } });
    expect((await next).status).toBe('CONFIRMED');
  });

  it('should report payments created elsewhere', async () => {
    const { controller, run } = setup(new ScriptedTransport([{ status: 200, body: { status: 'pending' } }]));

    const payment = await run(controller.getPaymentStatus('pay_x'));

    expect(payment).toEqual({
      id: 'pay_x',
      sender_agent_id: '',
      receiver_agent_id: '',
      amount: '',
      currency: '',
      settlement_network: '',
      status: 'PENDING',
      created_at: '2026-01-01T00:00:00.000Z',
      updated_at: '2026-01-01T00:00:00.000Z',
    });
  });

  it('should raise NotFound for an unknown payment', async () => {
    const { controller, run } = ledgerSetup();

    await expect(run(controller.getPaymentStatus('pay_404'))).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe('pollUntilTerminal', () => {
  it('should time out after the deadline and resume on the next call', async () => {
    const { ledger, clock, controller, run } = ledgerSetup({
      statusScript: ['PENDING', 'PENDING', 'PENDING', 'PENDING', 'CONFIRMED'],
    });
    await run(controller.createPayment(XRP_PAYMENT));

    const timedOut = run(controller.pollUntilTerminal('pay_1', { pollIntervalMs: 1_000, maxWaitMs: 2_500 }));

    await expect(timedOut).rejects.toBeInstanceOf(PollTimeoutError);
    await expect(timedOut).rejects.toMatchObject({ paymentId: 'pay_1', lastStatus: 'PENDING' });
    expect(clock.sleeps).toEqual([1_000, 1_000, 500]);
    expect(ledger.countRequests('GET', '/payment/')).toBe(4);

    const resumed = await run(controller.pollUntilTerminal('pay_1', { pollIntervalMs: 1_000 }));
    expect(resumed.status).toBe('CONFIRMED');
    expect(ledger.countRequests('GET', '/payment/')).toBe(5);
  });

  it('should return at once for a terminal payment', async () => {
    const { clock, controller, run } = ledgerSetup({ statusScript: ['REJECTED'] });
    await run(controller.createPayment(XRP_PAYMENT));

    const payment = await run(controller.pollUntilTerminal('pay_1'));

    expect(payment.status).toBe('REJECTED');
    expect(clock.sleeps).toEqual([]);
  });

  it('should reject a non-positive interval', async () => {
    const { controller, run } = ledgerSetup();

    await expect(run(controller.pollUntilTerminal('pay_1', { pollIntervalMs: 0 }))).rejects.toBeInstanceOf(
      ValidationError
    );
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// CHALLENGES
// ═══════════════════════════════════════════════════════════════════════════

describe('resolveChallenge', () => {
  let ledger: FakeLedger;
  let clock: FakeClock;
  let store: InMemoryIntentStore;
  let controller: PaymentLifecycleController;
  let run: <T>(program: Program<T>) => Promise<T>;

  beforeEach(() => {
    ({ ledger, clock, store, controller, run } = ledgerSetup({
      challengeOnCreate: KYC_CHALLENGE,
      challengeWithPaymentId: true,
      statusScript: ['CONFIRMED'],
    }));
  });

  async function challengedCreate(): Promise<ChallengedError> {
    const error = await run(controller.createPayment({ ...XRP_PAYMENT, idempotencyKey: 'intent-c' })).then(
      () => null,
      (err: unknown) => err
    );
    if (!(error instanceof ChallengedError)) {
      throw new Error('expected the create to be challenged');
    }
    return error;
  }

  it('should surface the challenge with the payment and key', async () => {
    const error = await challengedCreate();

    expect(error.challenge).toEqual(KYC_CHALLENGE);
    expect(error.paymentId).toBe('pay_1');
    expect(error.idempotencyKey).toBe('intent-c');
    expect(store.load('intent-c')?.payment?.status).toBe('CHALLENGED');
  });

  it('should re-send the enriched intent under the same key', async () => {
    await challengedCreate();

    const resolved = await run(controller.resolveChallenge('pay_1', KYC_CHALLENGE, { purpose: 'invoice 42' }));

    expect(resolved.status).toBe('PENDING');
    expect(resolved.challenge).toBeUndefined();
    expect(ledger.requests[1]).toMatchObject({
      method: 'POST',
      path: '/payment',
      idempotencyKey: 'intent-c',
      body: { request_id: 'intent-c', additional_data: { purpose: 'invoice 42' } },
    });

    const settled = await run(controller.pollUntilTerminal('pay_1'));
    expect(settled.status).toBe('CONFIRMED');
    expect(ledger.requests).toHaveLength(3);
    expect(ledger.payments.size).toBe(1);
  });

  it('should fail an expired challenge without calling the ledger', async () => {
    await challengedCreate();
    clock.advance(11 * 60_000);

    await expect(
      run(controller.resolveChallenge('pay_1', KYC_CHALLENGE, { purpose: 'invoice 42' }))
    ).rejects.toBeInstanceOf(ChallengeExpiredError);

    expect(ledger.requests).toHaveLength(1);
    expect(store.load('intent-c')?.payment?.status).toBe('FAILED');
    expect(store.load('intent-c')?.challenge).toBeNull();
  });

  it('should refuse a challenge that is not the outstanding one', async () => {
    await challengedCreate();

    await expect(
      run(controller.resolveChallenge('pay_1', { ...KYC_CHALLENGE, reason: 'other' }, { purpose: 'x' }))
    ).rejects.toBeInstanceOf(ValidationError);
    expect(ledger.requests).toHaveLength(1);
  });

  it('should refuse context missing a required field', async () => {
    await challengedCreate();

    await expect(
      run(controller.resolveChallenge('pay_1', KYC_CHALLENGE, { purpose: null }))
    ).rejects.toThrow('enrichedContext is missing required fields: purpose');
    expect(ledger.requests).toHaveLength(1);
  });

  it('should refuse a payment without a challenge', async () => {
    await expect(
      run(controller.resolveChallenge('pay_9', KYC_CHALLENGE, { purpose: 'x' }))
    ).rejects.toBeInstanceOf(ValidationError);
  });
});

describe('resolveChallenge without a ledger payment id', () => {
  it('should track the intent by its key until the ledger names it', async () => {
    const { ledger, controller, run } = ledgerSetup({ challengeOnCreate: KYC_CHALLENGE });

    await expect(
      run(controller.createPayment({ ...XRP_PAYMENT, idempotencyKey: 'intent-k' }))
    ).rejects.toMatchObject({ paymentId: 'intent-k' });

    const resolved = await run(controller.resolveChallenge('intent-k', KYC_CHALLENGE, { purpose: 'rent' }));

    expect(resolved.id).toBe('pay_1');
    expect(resolved.status).toBe('PENDING');
    expect(ledger.requests[1].idempotencyKey).toBe('intent-k');
  });
});

describe('resolveChallenge followed by a stale read', () => {
  const AML_CHALLENGE: Challenge = {
    reason: 'aml_review',
    required_fields: ['source_of_funds'],
    expires_at: '2026-01-01T00:30:00.000Z',
  };

  it('should not restore a challenge that was already answered', async () => {
    const transport = new ScriptedTransport([
      {
        status: 409,
        body: { error: { code: 'challenge_required', message: 'KYC' }, challenge: KYC_CHALLENGE, payment_id: 'pay_1' },
      },
      { status: 200, body: { id: 'pay_1', status: 'PENDING' } },
      { status: 200, body: { status: 'CHALLENGED', challenge: KYC_CHALLENGE } },
      { status: 200, body: { status: 'CHALLENGED', challenge: AML_CHALLENGE } },
    ]);
    const { store, controller, run } = setup(transport);
    await expect(
      run(controller.createPayment({ ...XRP_PAYMENT, idempotencyKey: 'intent-c' }))
    ).rejects.toBeInstanceOf(ChallengedError);
    await run(controller.resolveChallenge('pay_1', KYC_CHALLENGE, { purpose: 'invoice 42' }));

    const stale = await run(controller.getPaymentStatus('pay_1'));

    expect(stale.status).toBe('PENDING');
    expect(stale.challenge).toBeUndefined();
    expect(store.load('intent-c')?.challenge).toBeNull();
    await expect(
      run(controller.resolveChallenge('pay_1', KYC_CHALLENGE, { purpose: 'invoice 42' }))
    ).rejects.toBeInstanceOf(ValidationError);
    expect(transport.requests).toHaveLength(3);

    const fresh = await run(controller.getPaymentStatus('pay_1'));

    expect(fresh.status).toBe('CHALLENGED');
    expect(fresh.challenge).toEqual(AML_CHALLENGE);
    expect(store.load('intent-c')?.challenge).toEqual(AML_CHALLENGE);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// BALANCES & AGENTS
// ═══════════════════════════════════════════════════════════════════════════

describe('balances', () => {
  const balances = {
    'agent_a/solana/USDC': '12.5',
    'agent_a/xrpl/XRP': '3',
    'agent_b/xrpl/XRP': '1',
  };

  it('should read one balance with default network and asset', async () => {
    const { ledger, controller, run } = ledgerSetup({ balances });

    const balance = await run(controller.getBalance('agent_a'));

    expect(balance).toEqual({
      agent_id: 'agent_a',
      network: 'solana',
      asset: 'USDC',
      amount: '12.5',
      amount_usd: null,
      as_of: new Date(START_TIME).toISOString(),
    });
    expect(ledger.requests[0].path).toBe('/balance/agent/agent_a/solana/USDC');
  });

  it('should raise NotFound for a missing balance', async () => {
    const { controller, run } = ledgerSetup({ balances });

    await expect(run(controller.getBalance('agent_a', 'xrpl', 'RLUSD'))).rejects.toThrow(
      'Not found: balance agent_a/xrpl/RLUSD'
    );
  });

  it('should list every balance of an agent', async () => {
    const { controller, run } = ledgerSetup({ balances });

    const list = await run(controller.listBalances('agent_a'));

    expect(list.map((b) => `${b.network}/${b.asset}=${b.amount}`)).toEqual(['solana/USDC=12.5', 'xrpl/XRP=3']);
  });
});

describe('createAgent', () => {
  it('should register an agent with defaults', async () => {
    const { ledger, controller, run } = ledgerSetup();

    const agent = await run(controller.createAgent({ name: 'buyer', description: 'Buys compute' }));

    expect(agent).toEqual({
      id: 'agent_1',
      name: 'buyer',
      description: 'Buys compute',
      project_id: 'proj_test',
      agent_daily_limit: 100,
      agent_type: 'autonomous_agent',
    });
    expect(ledger.requests[0].idempotencyKey).toMatch(UUID_V4);
  });

  it('should reject a non-positive daily limit', async () => {
    const { ledger, controller, run } = ledgerSetup();

    await expect(
      run(controller.createAgent({ name: 'buyer', description: 'Buys compute', agentDailyLimit: 0 }))
    ).rejects.toBeInstanceOf(ValidationError);
    expect(ledger.requests).toHaveLength(0);
  });

  it('should surface a rejected registration as fatal', async () => {
    const { controller, run } = setup(
      new ScriptedTransport([{ status: 422, body: { detail: 'Name already taken' } }])
    );

    await expect(run(controller.createAgent({ name: 'buyer', description: 'Buys compute' }))).rejects.toBeInstanceOf(
      FatalError
    );
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// CODE AUDIT
// ═══════════════════════════════════════════════════════════════════════════

describe('code audit', () => {
  function reconcile(total: number): number {
    return total + 1;
  }

  it('should name the audited functions that created a payment', async () => {
    const audits = new AuditRegistry();
    const { ledger, controller, run } = ledgerSetup({}, { audits });
    const checkout = audits.register(function checkout() {
      return run(controller.createPayment(XRP_PAYMENT));
    });
    const [entry] = audits.functions();

    await checkout();

    expect(ledger.requests[0].body).toMatchObject({ func_stack_hashes: JSON.stringify([entry.hash]) });
  });

  it('should submit every registered function', async () => {
    const audits = new AuditRegistry();
    audits.register(reconcile);
    const { ledger, controller, run } = ledgerSetup({}, { audits });

    const submission = await run(controller.submitAudit());

    const source = reconcile.toString().trim();
    expect(submission).toEqual({ status: 'accepted', message: 'Audit queued', submitted: 1 });
    expect(ledger.requests[0]).toEqual({
      operation: 'submitAudit',
      method: 'POST',
      path: '/radar/audit',
      body: {
        project_id: 'proj_test',
        functions: [{ function_name: 'reconcile', function_code: source, function_hash: hashSource(source) }],
      },
    });
  });

  it('should submit under the given project', async () => {
    const audits = new AuditRegistry();
    audits.register(reconcile);
    const { ledger, controller, run } = ledgerSetup({}, { audits });

    await run(controller.submitAudit('proj_other'));

    expect(ledger.requests[0].body).toMatchObject({ project_id: 'proj_other' });
  });

  it('should not call the ledger with nothing registered', async () => {
    const { ledger, controller, run } = ledgerSetup();

    const submission = await run(controller.submitAudit());

    expect(submission).toEqual({
      status: 'no_entities',
      message: 'No functions have been registered for audit',
      submitted: 0,
    });
    expect(ledger.requests).toHaveLength(0);
  });

  it('should retry a failed submission', async () => {
    const audits = new AuditRegistry();
    audits.register(reconcile);
    const { ledger, clock, controller, run } = ledgerSetup({}, { audits });
    ledger.failNext('network');

    const submission = await run(controller.submitAudit());

    expect(submission.status).toBe('accepted');
    expect(ledger.countRequests('POST', '/radar/audit')).toBe(2);
    expect(clock.sleeps).toEqual([500]);
  });
});
