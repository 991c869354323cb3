/**
 * Agent Trace Context
 *
 * Ambient key/value context for one agent run, carried across awaits by
 * AsyncLocalStorage. createPayment sends a snapshot of it as
 * `trace_context`; every traced facade call appends itself to
 * `tool_history`.
 *
 * Outside runWithTraceContext there is no context: reads return an empty
 * object and writes are dropped.
 */

import { AsyncLocalStorage } from 'node:async_hooks';

export interface ToolCall {
  name: string;
  correlation_id: string;
}

export type TraceContextValues = Readonly<Record<string, unknown>>;

interface TraceScope {
  values: TraceContextValues;
}

const storage = new AsyncLocalStorage<TraceScope>();

export function runWithTraceContext<T>(fn: () => T, initial: Record<string, unknown> = {}): T {
  return storage.run({ values: { ...initial } }, fn);
}

export function currentTraceContext(): TraceContextValues {
  return storage.getStore()?.values ?? {};
}

export function hasTraceContext(): boolean {
  return storage.getStore() !== undefined;
}

/**
 * Returns false when called outside a trace context.
 */
export function setTraceValue(key: string, value: unknown): boolean {
  const scope = storage.getStore();
  if (!scope) return false;
  // Replace rather than mutate: earlier snapshots stay as they were
  scope.values = { ...scope.values, [key]: value };
  return true;
}

export function toolHistory(): ToolCall[] {
  const history = currentTraceContext().tool_history;
  return Array.isArray(history) ? history.filter(isToolCall) : [];
}

export function recordToolCall(call: ToolCall): void {
  if (!hasTraceContext()) return;
  setTraceValue('tool_history', [...toolHistory(), call]);
  setTraceValue('tool_invoked', call.name);
}

/**
 * JSON form sent to the ledger. Values that cannot be serialized are
 * dropped by JSON.stringify's own rules.
 */
export function serializeTraceContext(values: TraceContextValues = currentTraceContext()): string {
  try {
    return JSON.stringify(values);
  } catch {
    // Cyclic or BigInt values
    return '{}';
  }
}

function isToolCall(value: unknown): value is ToolCall {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string' &&
    'correlation_id' in value &&
    typeof value.correlation_id === 'string'
  );
}
