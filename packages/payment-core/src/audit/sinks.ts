/**
 * Trace Sinks
 */

import type { Transport } from '../transport/types.js';
import type { Logger } from '../utils/logger.js';
import type { TraceSink } from './emitter.js';
import type { TraceRecord } from './trace.js';

/**
 * Keeps records in memory, for tests and local inspection.
 */
export class InMemoryTraceSink implements TraceSink {
  readonly name = 'memory';
  readonly records: TraceRecord[] = [];

  write(record: TraceRecord): void {
    this.records.push(record);
  }

  clear(): void {
    this.records.length = 0;
  }
}

export class LoggerTraceSink implements TraceSink {
  readonly name = 'logger';
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'trace' });
  }

  write(record: TraceRecord): void {
    this.logger.info(
      {
        operation: record.operation_name,
        correlationId: record.correlation_id,
        startedAt: record.started_at,
        durationMs: record.duration_ms,
        outcome: record.outcome,
        arguments: record.arguments,
      },
      'Operation traced'
    );
  }
}

/**
 * Ships records to the ledger's audit endpoint over the shared transport.
 * Any non-2xx reply counts as a sink failure.
 */
export class LedgerTraceSink implements TraceSink {
  readonly name = 'ledger';

  constructor(
    private readonly transport: Transport,
    private readonly path: string = '/audit/traces'
  ) {}

  async write(record: TraceRecord): Promise<void> {
    const response = await this.transport.send({
      operation: 'emitTrace',
      method: 'POST',
      path: this.path,
      body: record,
    });
    if (response.status < 200 || response.status >= 300) {
      throw new Error(`Audit endpoint answered HTTP ${response.status}`);
    }
  }
}
