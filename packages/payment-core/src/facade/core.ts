/**
 * Payment Core Assembly
 *
 * One runtime, one transport (one connection pool), one key lock and one
 * intent store, shared by both clients.
 */

import { TraceEmitter, type TraceSink } from '../audit/emitter.js';
import { AuditRegistry } from '../audit/registry.js';
import { LedgerTraceSink } from '../audit/sinks.js';
import { PaymentRuntime, type Credentials, type CredentialsInput } from '../config/credentials.js';
import { SystemClock, type Clock } from '../execution/clock.js';
import { KeyedLock } from '../execution/keyed-lock.js';
import type { ExecutionEnv } from '../execution/runners.js';
import { NoOpMetrics, type PaymentMetrics } from '../observability/metrics.js';
import { PaymentLifecycleController } from '../payments/controller.js';
import { InMemoryIntentStore, type IntentStore } from '../payments/intent-store.js';
import { RetryEngine } from '../retry/engine.js';
import type { RetryPolicy } from '../retry/policy.js';
import { LedgerHttpTransport } from '../transport/http-transport.js';
import type { Transport } from '../transport/types.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { BlockingPaymentClient, PaymentClient } from './clients.js';

export interface PaymentCoreOptions {
  /** Initialize immediately; otherwise call `initialize` before the first operation */
  credentials?: CredentialsInput;
  retryPolicy?: Partial<RetryPolicy>;
  logger?: Logger;
  metrics?: PaymentMetrics;
  traceSinks?: TraceSink[];
  /** Also ship trace records to the ledger's audit endpoint */
  auditToLedger?: boolean;
  /** Functions `submitAudit` sends for review; a fresh registry by default */
  audits?: AuditRegistry;
  /** Bound of the default intent store */
  maxIntents?: number;

  // Seams for tests and embedding
  runtime?: PaymentRuntime;
  transport?: Transport;
  clock?: Clock;
  store?: IntentStore;
  random?: () => number;
}

export interface PaymentCore {
  readonly client: PaymentClient;
  readonly blocking: BlockingPaymentClient;
  readonly runtime: PaymentRuntime;
  readonly emitter: TraceEmitter;
  readonly audits: AuditRegistry;
  readonly logger: Logger;
  initialize(input: CredentialsInput): Credentials;
  /** Flush pending trace records, then release the transport */
  close(): Promise<void>;
}

export function createPaymentCore(options: PaymentCoreOptions = {}): PaymentCore {
  const logger = options.logger ?? createLogger();
  const metrics = options.metrics ?? new NoOpMetrics();
  const runtime = options.runtime ?? new PaymentRuntime(logger);
  const transport = options.transport ?? new LedgerHttpTransport(runtime, { logger });
  const clock = options.clock ?? new SystemClock();

  const engine = new RetryEngine({
    clock,
    logger,
    metrics,
    ...(options.retryPolicy ? { policy: options.retryPolicy } : {}),
    ...(options.random ? { random: options.random } : {}),
  });

  const audits = options.audits ?? new AuditRegistry();
  const controller = new PaymentLifecycleController({
    engine,
    store: options.store ?? new InMemoryIntentStore({ maxEntries: options.maxIntents }),
    runtime,
    clock,
    audits,
    logger,
    metrics,
  });

  const emitter = new TraceEmitter({ sinks: options.traceSinks ?? [], logger, metrics });
  if (options.auditToLedger) {
    emitter.addSink(new LedgerTraceSink(transport));
  }

  const env: ExecutionEnv = { transport, clock, lock: new KeyedLock() };
  const deps = { controller, env, recorder: emitter, clock };

  if (options.credentials) {
    runtime.initialize(options.credentials);
  }

  return {
    client: new PaymentClient(deps),
    blocking: new BlockingPaymentClient(deps),
    runtime,
    emitter,
    audits,
    logger,
    initialize: (input) => runtime.initialize(input),
    close: async () => {
      await emitter.flush();
      await transport.close?.();
    },
  };
}
