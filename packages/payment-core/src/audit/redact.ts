/**
 * Argument Redaction
 *
 * Trace records keep a snapshot of the arguments an operation was called
 * with. Secret-looking keys are censored, cycles are cut and values that
 * do not serialize are summarized.
 */

import { isPaymentError } from '../errors/errors.js';

export const REDACTED = '[REDACTED]';

const SECRET_KEY = /secret|password|passwd|token|api[_-]?key|authorization|credential|private[_-]?key/i;

const MAX_DEPTH = 8;

export function isSecretKey(key: string): boolean {
  return SECRET_KEY.test(key);
}

export function redactArguments(args: readonly unknown[]): unknown[] {
  return args.map((arg) => redactValue(arg));
}

export function redactValue(value: unknown): unknown {
  return redact(value, [], 0);
}

function redact(value: unknown, ancestors: object[], depth: number): unknown {
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
    case 'undefined':
      return value;
    case 'bigint':
    case 'symbol':
      return value.toString();
    case 'function':
      return `[Function ${value.name || 'anonymous'}]`;
  }

  if (typeof value !== 'object' || value === null) return null;

  if (value instanceof Error) {
    return isPaymentError(value)
      ? { name: value.name, kind: value.kind, message: value.message }
      : { name: value.name, message: value.message };
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
  }

  if (ancestors.includes(value)) return '[Circular]';
  if (depth >= MAX_DEPTH) return '[Truncated]';

  const path = [...ancestors, value];
  if (Array.isArray(value)) {
    return value.map((item) => redact(item, path, depth + 1));
  }
  if (value instanceof Map) {
    return redact(Object.fromEntries(value), path, depth + 1);
  }
  if (value instanceof Set) {
    return redact(Array.from(value), path, depth + 1);
  }

  const out: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    out[key] = isSecretKey(key) ? REDACTED : redact(entry, path, depth + 1);
  }
  return out;
}
