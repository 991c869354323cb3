/**
 * Payment Core Facade Tests
 *
 * Proves:
 * - Blocking and non-blocking clients run the same lifecycle
 * - Every facade call leaves exactly one audit record, failures included
 * - Audit delivery failures never reach the caller
 */

import { describe, it, expect } from 'vitest';
import { InMemoryTraceSink, runWithTraceContext, toolHistory } from '../../src/audit/index.js';
import { CancelledError, NotInitializedError, ValidationError } from '../../src/errors/index.js';
import { createPaymentCore, type PaymentCoreOptions } from '../../src/facade/index.js';
import type { CreatePaymentInput } from '../../src/payments/index.js';
import { createLogger } from '../../src/utils/index.js';
import { FakeClock, FakeLedger, TEST_CREDENTIALS, type FakeLedgerConfig } from './mocks.js';

const XRP_PAYMENT: CreatePaymentInput = {
  sender: 'agent_a',
  receiver: 'agent_b',
  amount: 10,
  currency: 'XRP',
  network: 'xrpl',
  idempotencyKey: 'intent-1',
};

function makeCore(config: FakeLedgerConfig = {}, options: Partial<PaymentCoreOptions> = {}) {
  const ledger = new FakeLedger(config);
  const clock = new FakeClock();
  const sink = new InMemoryTraceSink();
  const core = createPaymentCore({
    credentials: TEST_CREDENTIALS,
    transport: ledger,
    clock,
    random: () => 0.5,
    logger: createLogger({ level: 'silent' }),
    traceSinks: [sink],
    ...options,
  });
  return { ledger, clock, sink, core };
}

describe('PaymentClient', () => {
  it('should run the payment lifecycle and audit each call', async () => {
    const { ledger, sink, core } = makeCore();

    const created = await core.client.createPayment(XRP_PAYMENT);
    const settled = await core.client.pollUntilTerminal(created.id, { pollIntervalMs: 1_000 });
    await core.close();

    expect(settled.status).toBe('CONFIRMED');
    expect(ledger.requests).toHaveLength(3);
    expect(sink.records.map((r) => [r.operation_name, r.outcome.status])).toEqual([
      ['createPayment', 'success'],
      ['pollUntilTerminal', 'success'],
    ]);
  });

  it('should record exactly one failed trace for a rejected call', async () => {
    const { ledger, sink, core } = makeCore();

    await expect(core.client.createPayment({ ...XRP_PAYMENT, amount: 0 })).rejects.toBeInstanceOf(ValidationError);
    await core.emitter.flush();

    expect(ledger.requests).toHaveLength(0);
    expect(sink.records).toHaveLength(1);
    expect(sink.records[0].outcome).toEqual({
      status: 'error',
      error_kind: 'ValidationError',
      message: 'amount must be greater than 0',
    });
    expect(sink.records[0].arguments[0]).toMatchObject({ amount: 0, idempotencyKey: 'intent-1' });
  });

  it('should cancel before the first step when the signal is already aborted', async () => {
    const { ledger, core } = makeCore();
    await core.client.createPayment(XRP_PAYMENT);
    const controller = new AbortController();
    controller.abort();

    await expect(
      core.client.pollUntilTerminal('pay_1', { signal: controller.signal })
    ).rejects.toBeInstanceOf(CancelledError);
    expect(ledger.countRequests('GET', '/payment/')).toBe(0);
  });

  it('should refuse operations until initialized', async () => {
    const { core } = makeCore({ balances: { 'agent_a/solana/USDC': '5' } }, { credentials: undefined });

    await expect(core.client.getBalance('agent_a')).rejects.toBeInstanceOf(NotInitializedError);

    core.initialize(TEST_CREDENTIALS);
    await expect(core.client.getBalance('agent_a')).resolves.toMatchObject({ amount: '5' });
  });

  it('should name each call in the agent tool history', async () => {
    const { ledger, core } = makeCore({ balances: { 'agent_a/solana/USDC': '5' } });

    const history = await runWithTraceContext(async () => {
      await core.client.getBalance('agent_a');
      await core.client.createPayment(XRP_PAYMENT);
      return toolHistory();
    });

    expect(history.map((call) => call.name)).toEqual(['getBalance', 'createPayment']);
    const create = ledger.requests.find((r) => r.method === 'POST');
    expect(create?.body).toMatchObject({
      trace_context: expect.stringContaining('"tool_invoked":"createPayment"'),
    });
  });

  it('should keep a failing audit endpoint away from the caller', async () => {
    // The fake ledger has no audit route and answers 404
    const { ledger, core } = makeCore({}, { auditToLedger: true });

    const agent = await core.client.createAgent({ name: 'buyer', description: 'Buys compute' });
    await core.close();

    expect(agent.id).toBe('agent_1');
    expect(ledger.countRequests('POST', '/audit/traces')).toBe(1);
    expect(core.emitter.stats()).toEqual({ emitted: 1, delivered: 1, dropped: 0, sinkFailures: 1 });
  });
});

describe('BlockingPaymentClient', () => {
  it('should behave like the non-blocking client', async () => {
    const blocking = makeCore({ statusScript: ['PENDING', 'PENDING', 'CONFIRMED'] });
    const nonBlocking = makeCore({ statusScript: ['PENDING', 'PENDING', 'CONFIRMED'] });
    blocking.ledger.failNext({ status: 503 });
    nonBlocking.ledger.failNext({ status: 503 });

    const createdSync = blocking.core.blocking.createPayment(XRP_PAYMENT);
    const settledSync = blocking.core.blocking.pollUntilTerminal(createdSync.id, { pollIntervalMs: 1_000 });

    const createdAsync = await nonBlocking.core.client.createPayment(XRP_PAYMENT);
    const settledAsync = await nonBlocking.core.client.pollUntilTerminal(createdAsync.id, { pollIntervalMs: 1_000 });

    expect(settledSync).toEqual(settledAsync);
    expect(settledSync.status).toBe('CONFIRMED');
    expect(blocking.ledger.requests).toEqual(nonBlocking.ledger.requests);
    expect(blocking.clock.sleeps).toEqual([500, 1_000, 1_000]);
    expect(nonBlocking.clock.sleeps).toEqual([500, 1_000, 1_000]);
  });

  it('should audit a synchronous throw', async () => {
    const { sink, core } = makeCore();

    expect(() => core.blocking.getBalance('')).toThrow(ValidationError);
    await core.emitter.flush();

    expect(sink.records).toHaveLength(1);
    expect(sink.records[0]).toMatchObject({
      operation_name: 'getBalance',
      arguments: [''],
      outcome: { status: 'error', error_kind: 'ValidationError' },
    });
  });
});

describe('code audit', () => {
  it('should submit the functions registered on the core', async () => {
    const { ledger, sink, core } = makeCore();
    const checkout = core.audits.register(function checkout(input: CreatePaymentInput) {
      return core.client.createPayment(input);
    });
    const [entry] = core.audits.functions();

    await checkout(XRP_PAYMENT);
    const submission = core.blocking.submitAudit();
    await core.emitter.flush();

    expect(submission).toEqual({ status: 'accepted', message: 'Audit queued', submitted: 1 });
    expect(ledger.requests[0].body).toMatchObject({ func_stack_hashes: JSON.stringify([entry.hash]) });
    expect(ledger.requests[1]).toMatchObject({ path: '/radar/audit', body: { project_id: 'proj_test' } });
    expect(sink.records.map((r) => r.operation_name)).toEqual(['createPayment', 'submitAudit']);
  });

  it('should bound the default intent store', async () => {
    const { ledger, core } = makeCore({}, { maxIntents: 1 });

    await core.client.createPayment(XRP_PAYMENT);
    await core.client.createPayment({ ...XRP_PAYMENT, idempotencyKey: 'intent-2' });
    const again = await core.client.createPayment(XRP_PAYMENT);

    expect(again.id).toBe('pay_1');
    expect(ledger.countRequests('POST', '/payment')).toBe(3);
  });
});
