/**
 * Audit Module
 */

export type { TraceRecord, TraceOutcome, TraceRecorder, TracedOptions } from './trace.js';
export type { TraceSink, TraceEmitterOptions, TraceEmitterStats } from './emitter.js';
export type { ToolCall, TraceContextValues } from './context.js';

export { traced } from './trace.js';
export { redactArguments, redactValue, isSecretKey, REDACTED } from './redact.js';
export { TraceEmitter } from './emitter.js';
export { InMemoryTraceSink, LoggerTraceSink, LedgerTraceSink } from './sinks.js';
export {
  runWithTraceContext,
  currentTraceContext,
  hasTraceContext,
  setTraceValue,
  toolHistory,
  recordToolCall,
  serializeTraceContext,
} from './context.js';
export type { AuditedFunction } from './registry.js';
export { AuditRegistry, auditedStackHashes, hashSource } from './registry.js';
