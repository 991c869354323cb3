/**
 * Ledger HTTP Transport
 *
 * One worker thread owns the process's connection pool (Node's fetch with
 * keep-alive). Both execution paths talk to it:
 *
 *   non-blocking ── asyncPort ──┐
 *                               ├──> transport worker ──> fetch pool ──> ledger
 *   blocking ───── syncPort ────┘
 *
 * The blocking path parks the calling thread on Atomics.wait until the
 * worker has posted the reply, then takes it with receiveMessageOnPort.
 * The worker is unref'd: an idle transport never keeps the process alive.
 */

import {
  MessageChannel,
  Worker,
  receiveMessageOnPort,
  type MessagePort,
} from 'node:worker_threads';
import type { PaymentRuntime } from '../config/credentials.js';
import { NetworkError, TimeoutError } from '../errors/errors.js';
import { withDeadline } from '../execution/timeout.js';
import type { Logger } from '../utils/logger.js';
import type { Transport, TransportRequest, TransportResponse } from './types.js';
import { buildWireRequest, interpretReply, isWireReply, type WireReply } from './wire.js';

/**
 * Extra time the caller waits beyond the worker's own abort, so a worker
 * timeout is reported as such rather than as a caller deadline.
 */
const DEADLINE_GRACE_MS = 1_000;

const WORKER_SOURCE = `
const { workerData } = require('node:worker_threads');
const { asyncPort, syncPort } = workerData;

async function perform(wire) {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), wire.timeoutMs);
  try {
    const response = await fetch(wire.url, {
      method: wire.method,
      headers: wire.headers,
      body: wire.body,
      signal: controller.signal,
    });
    const text = await response.text();
    return { ok: true, status: response.status, text };
  } catch (error) {
    const cause = error && error.cause && error.cause.message;
    return {
      ok: false,
      reason: controller.signal.aborted ? 'timeout' : 'network',
      message: cause || (error && error.message) || String(error),
    };
  } finally {
    clearTimeout(timer);
  }
}

asyncPort.on('message', (message) => {
  perform(message.wire).then((reply) => {
    asyncPort.postMessage({ id: message.id, reply });
  });
});

syncPort.on('message', (message) => {
  perform(message.wire).then((reply) => {
    syncPort.postMessage({ id: message.id, reply });
    Atomics.store(message.signal, 0, 1);
    Atomics.notify(message.signal, 0);
  });
});
`;

interface TransportHost {
  worker: Worker;
  asyncPort: MessagePort;
  syncPort: MessagePort;
}

interface ReplyMessage {
  id: number;
  reply: WireReply;
}

function isReplyMessage(value: unknown): value is ReplyMessage {
  return (
    typeof value === 'object' &&
    value !== null &&
    'id' in value &&
    typeof value.id === 'number' &&
    'reply' in value &&
    isWireReply(value.reply)
  );
}

/**
 * Take messages off a port until the reply with `id` comes up. Replies to
 * earlier calls that gave up waiting may be queued ahead of it; they are
 * handed to `discard`. Null when the queue runs dry first.
 */
export function takeReply(
  receive: () => { message: unknown } | undefined,
  id: number,
  discard: (message: unknown) => void = () => {}
): WireReply | null {
  for (let received = receive(); received !== undefined; received = receive()) {
    if (isReplyMessage(received.message) && received.message.id === id) {
      return received.message.reply;
    }
    discard(received.message);
  }
  return null;
}

export interface LedgerHttpTransportOptions {
  logger?: Logger;
}

export class LedgerHttpTransport implements Transport {
  private host: TransportHost | null = null;
  private pending: Map<number, (reply: WireReply) => void> = new Map();
  private nextId = 1;
  private logger?: Logger;

  constructor(
    private readonly runtime: PaymentRuntime,
    options: LedgerHttpTransportOptions = {}
  ) {
    this.logger = options.logger?.child({ component: 'transport' });
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // NON-BLOCKING
  // ═══════════════════════════════════════════════════════════════════════════

  async send(request: TransportRequest): Promise<TransportResponse> {
    const wire = buildWireRequest(this.runtime.credentials(), request);
    const host = this.ensureHost();
    const id = this.nextId++;

    const reply = await withDeadline(
      () =>
        new Promise<WireReply>((resolve) => {
          this.pending.set(id, resolve);
          host.asyncPort.ref();
          host.asyncPort.postMessage({ id, wire });
        }),
      wire.timeoutMs + DEADLINE_GRACE_MS,
      request.operation
    ).finally(() => {
      this.pending.delete(id);
      if (this.pending.size === 0) host.asyncPort.unref();
    });

    return interpretReply(request, wire, reply);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // BLOCKING
  // ═══════════════════════════════════════════════════════════════════════════

  sendSync(request: TransportRequest): TransportResponse {
    const wire = buildWireRequest(this.runtime.credentials(), request);
    const host = this.ensureHost();
    const id = this.nextId++;

    const signal = new Int32Array(new SharedArrayBuffer(4));
    host.syncPort.postMessage({ id, wire, signal });

    // Only this call's reply sets this signal
    if (Atomics.wait(signal, 0, 0, wire.timeoutMs + DEADLINE_GRACE_MS) === 'timed-out') {
      throw new TimeoutError(request.operation, wire.timeoutMs);
    }

    const reply = takeReply(() => receiveMessageOnPort(host.syncPort), id, (message) =>
      this.logger?.debug(
        { operation: request.operation, replyId: isReplyMessage(message) ? message.id : null },
        'Discarded late blocking reply'
      )
    );
    if (!reply) {
      throw new NetworkError(`${request.operation}: transport worker signalled without a reply`);
    }
    return interpretReply(request, wire, reply);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // LIFECYCLE
  // ═══════════════════════════════════════════════════════════════════════════

  async close(): Promise<void> {
    const host = this.host;
    this.host = null;
    if (!host) return;
    this.failPending('transport closed');
    host.asyncPort.close();
    host.syncPort.close();
    await host.worker.terminate();
  }

  private ensureHost(): TransportHost {
    if (this.host) return this.host;

    const asyncChannel = new MessageChannel();
    const syncChannel = new MessageChannel();
    const worker = new Worker(WORKER_SOURCE, {
      eval: true,
      workerData: { asyncPort: asyncChannel.port2, syncPort: syncChannel.port2 },
      transferList: [asyncChannel.port2, syncChannel.port2],
    });
    worker.unref();

    worker.on('error', (error) => {
      this.logger?.error({ error }, 'Transport worker crashed');
      this.failPending(error.message);
      this.host = null;
    });

    asyncChannel.port1.on('message', (message: unknown) => {
      if (!isReplyMessage(message)) {
        this.logger?.warn({}, 'Ignoring malformed transport worker message');
        return;
      }
      this.pending.get(message.id)?.(message.reply);
    });
    asyncChannel.port1.unref();

    this.host = { worker, asyncPort: asyncChannel.port1, syncPort: syncChannel.port1 };
    this.logger?.debug({}, 'Transport worker started');
    return this.host;
  }

  private failPending(message: string): void {
    for (const resolve of this.pending.values()) {
      resolve({ ok: false, reason: 'network', message });
    }
    this.pending.clear();
  }
}
