/**
 * Trace Emitter
 *
 * Out-of-band delivery of trace records. `record` only enqueues; sinks run
 * on a later turn of the event loop, one record at a time, in order.
 * A failing sink is logged and counted, never propagated.
 */

import { NoOpMetrics, type PaymentMetrics } from '../observability/metrics.js';
import type { Logger } from '../utils/logger.js';
import type { TraceRecord, TraceRecorder } from './trace.js';

export interface TraceSink {
  readonly name: string;
  write(record: TraceRecord): void | Promise<void>;
}

export interface TraceEmitterOptions {
  sinks?: TraceSink[];
  logger?: Logger;
  metrics?: PaymentMetrics;
  /** Oldest records are dropped beyond this */
  maxQueued?: number;
}

export interface TraceEmitterStats {
  emitted: number;
  delivered: number;
  dropped: number;
  sinkFailures: number;
}

const DEFAULT_MAX_QUEUED = 10_000;

export class TraceEmitter implements TraceRecorder {
  private sinks: TraceSink[];
  private logger?: Logger;
  private metrics: PaymentMetrics;
  private maxQueued: number;

  private queue: TraceRecord[] = [];
  private scheduled = false;
  private tail: Promise<void> = Promise.resolve();
  private counters: TraceEmitterStats = { emitted: 0, delivered: 0, dropped: 0, sinkFailures: 0 };

  constructor(options: TraceEmitterOptions = {}) {
    this.sinks = [...(options.sinks ?? [])];
    this.logger = options.logger?.child({ component: 'audit' });
    this.metrics = options.metrics ?? new NoOpMetrics();
    this.maxQueued = options.maxQueued ?? DEFAULT_MAX_QUEUED;
  }

  addSink(sink: TraceSink): void {
    this.sinks.push(sink);
  }

  record(record: TraceRecord): void {
    this.counters.emitted++;
    this.metrics.traceEmitted(record.operation_name, record.outcome.status);

    this.queue.push(record);
    if (this.queue.length > this.maxQueued) {
      this.queue.shift();
      this.counters.dropped++;
    }
    this.schedule();
  }

  /**
   * Resolves once every record enqueued so far reached every sink.
   */
  flush(): Promise<void> {
    return this.drain();
  }

  stats(): TraceEmitterStats {
    return { ...this.counters };
  }

  private schedule(): void {
    if (this.scheduled) return;
    this.scheduled = true;
    setImmediate(() => {
      this.scheduled = false;
      void this.drain();
    });
  }

  private drain(): Promise<void> {
    this.tail = this.tail.then(() => this.deliverQueued());
    return this.tail;
  }

  private async deliverQueued(): Promise<void> {
    while (this.queue.length > 0) {
      const batch = this.queue.splice(0);
      for (const record of batch) {
        for (const sink of this.sinks) {
          try {
            await sink.write(record);
          } catch (error) {
            this.counters.sinkFailures++;
            this.metrics.traceSinkFailed(sink.name);
            this.logger?.warn(
              { sink: sink.name, operation: record.operation_name, correlationId: record.correlation_id, error },
              'Trace sink failed'
            );
          }
        }
        this.counters.delivered++;
      }
    }
  }
}
