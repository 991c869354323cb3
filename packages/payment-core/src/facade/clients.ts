/**
 * Payment Clients
 *
 * Two faces of the same controller. Each method builds the controller's
 * program and hands it to a runner:
 * - PaymentClient: runCooperative, returns promises, honours AbortSignal
 * - BlockingPaymentClient: runBlocking, returns values
 *
 * Every method is wrapped by `traced`, so each call leaves one audit record.
 */

import { traced } from '../audit/trace.js';
import type { TraceRecorder } from '../audit/trace.js';
import type { Clock } from '../execution/clock.js';
import type { Program } from '../execution/program.js';
import { runBlocking, runCooperative, type ExecutionEnv } from '../execution/runners.js';
import type { PaymentLifecycleController } from '../payments/controller.js';
import type {
  Agent,
  AuditSubmission,
  Balance,
  Challenge,
  CreateAgentInput,
  CreatePaymentInput,
  Payment,
  PollOptions,
} from '../payments/types.js';

export interface ClientDeps {
  controller: PaymentLifecycleController;
  env: ExecutionEnv;
  recorder: TraceRecorder;
  clock: Clock;
}

export interface CallOptions {
  signal?: AbortSignal;
}

function tracer(deps: ClientDeps) {
  return <A extends unknown[], R>(name: string, fn: (...args: A) => R): ((...args: A) => R) =>
    traced(name, fn, { recorder: deps.recorder, now: () => deps.clock.now() });
}

// =============================================================================
// NON-BLOCKING
// =============================================================================

export class PaymentClient {
  readonly createPayment: (input: CreatePaymentInput, options?: CallOptions) => Promise<Payment>;
  readonly getPaymentStatus: (paymentId: string, options?: CallOptions) => Promise<Payment>;
  readonly pollUntilTerminal: (paymentId: string, options?: PollOptions & CallOptions) => Promise<Payment>;
  readonly resolveChallenge: (
    paymentId: string,
    challenge: Challenge,
    enrichedContext: Record<string, unknown>,
    options?: CallOptions
  ) => Promise<Payment>;
  readonly getBalance: (
    agentId: string,
    network?: string,
    asset?: string,
    options?: CallOptions
  ) => Promise<Balance>;
  readonly listBalances: (agentId: string, options?: CallOptions) => Promise<Balance[]>;
  readonly createAgent: (input: CreateAgentInput, options?: CallOptions) => Promise<Agent>;
  readonly submitAudit: (projectId?: string, options?: CallOptions) => Promise<AuditSubmission>;

  constructor(deps: ClientDeps) {
    const { controller, env } = deps;
    const trace = tracer(deps);
    const run = <T>(program: Program<T>, operation: string, options: CallOptions = {}): Promise<T> =>
      runCooperative(program, env, { operation, ...(options.signal ? { signal: options.signal } : {}) });

    this.createPayment = trace('createPayment', (input: CreatePaymentInput, options?: CallOptions) =>
      run(controller.createPayment(input), 'createPayment', options)
    );
    this.getPaymentStatus = trace('getPaymentStatus', (paymentId: string, options?: CallOptions) =>
      run(controller.getPaymentStatus(paymentId), 'getPaymentStatus', options)
    );
    this.pollUntilTerminal = trace(
      'pollUntilTerminal',
      (paymentId: string, options: PollOptions & CallOptions = {}) =>
        run(controller.pollUntilTerminal(paymentId, options), 'pollUntilTerminal', options)
    );
    this.resolveChallenge = trace(
      'resolveChallenge',
      (
        paymentId: string,
        challenge: Challenge,
        enrichedContext: Record<string, unknown>,
        options?: CallOptions
      ) => run(controller.resolveChallenge(paymentId, challenge, enrichedContext), 'resolveChallenge', options)
    );
    this.getBalance = trace(
      'getBalance',
      (agentId: string, network?: string, asset?: string, options?: CallOptions) =>
        run(controller.getBalance(agentId, network, asset), 'getBalance', options)
    );
    this.listBalances = trace('listBalances', (agentId: string, options?: CallOptions) =>
      run(controller.listBalances(agentId), 'listBalances', options)
    );
    this.createAgent = trace('createAgent', (input: CreateAgentInput, options?: CallOptions) =>
      run(controller.createAgent(input), 'createAgent', options)
    );
    this.submitAudit = trace('submitAudit', (projectId?: string, options?: CallOptions) =>
      run(controller.submitAudit(projectId), 'submitAudit', options)
    );
  }
}

// =============================================================================
// BLOCKING
// =============================================================================

/**
 * Parks the calling thread for every network round trip and backoff.
 * Meant for synchronous tool hosts; inside an async program use
 * PaymentClient.
 */
export class BlockingPaymentClient {
  readonly createPayment: (input: CreatePaymentInput) => Payment;
  readonly getPaymentStatus: (paymentId: string) => Payment;
  readonly pollUntilTerminal: (paymentId: string, options?: PollOptions) => Payment;
  readonly resolveChallenge: (
    paymentId: string,
    challenge: Challenge,
    enrichedContext: Record<string, unknown>
  ) => Payment;
  readonly getBalance: (agentId: string, network?: string, asset?: string) => Balance;
  readonly listBalances: (agentId: string) => Balance[];
  readonly createAgent: (input: CreateAgentInput) => Agent;
  readonly submitAudit: (projectId?: string) => AuditSubmission;

  constructor(deps: ClientDeps) {
    const { controller, env } = deps;
    const trace = tracer(deps);

    this.createPayment = trace('createPayment', (input: CreatePaymentInput) =>
      runBlocking(controller.createPayment(input), env)
    );
    this.getPaymentStatus = trace('getPaymentStatus', (paymentId: string) =>
      runBlocking(controller.getPaymentStatus(paymentId), env)
    );
    this.pollUntilTerminal = trace('pollUntilTerminal', (paymentId: string, options?: PollOptions) =>
      runBlocking(controller.pollUntilTerminal(paymentId, options), env)
    );
    this.resolveChallenge = trace(
      'resolveChallenge',
      (paymentId: string, challenge: Challenge, enrichedContext: Record<string, unknown>) =>
        runBlocking(controller.resolveChallenge(paymentId, challenge, enrichedContext), env)
    );
    this.getBalance = trace('getBalance', (agentId: string, network?: string, asset?: string) =>
      runBlocking(controller.getBalance(agentId, network, asset), env)
    );
    this.listBalances = trace('listBalances', (agentId: string) =>
      runBlocking(controller.listBalances(agentId), env)
    );
    this.createAgent = trace('createAgent', (input: CreateAgentInput) =>
      runBlocking(controller.createAgent(input), env)
    );
    this.submitAudit = trace('submitAudit', (projectId?: string) =>
      runBlocking(controller.submitAudit(projectId), env)
    );
  }
}
