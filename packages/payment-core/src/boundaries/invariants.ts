/**
 * Payment Core Boundary Invariants
 *
 * Types and guards that enforce the core's input constraints at
 * compile-time and runtime. Every guard fails with ValidationError and runs
 * before any transport call is made.
 */

import { v4 as uuidv4 } from 'uuid';
import { ValidationError } from '../errors/errors.js';

// =============================================================================
// BRANDED TYPES (Compile-time enforcement)
// =============================================================================

declare const __brand: unique symbol;
type Brand<T, B> = T & { readonly [__brand]: B };

/**
 * One logical payment intent. Reused by every retry and by challenge
 * resolution of that intent.
 */
export type IdempotencyKey = Brand<string, 'IdempotencyKey'>;

/**
 * Identifies one tracked facade invocation in the audit trail.
 */
export type CorrelationId = Brand<string, 'CorrelationId'>;

/**
 * Decimal amount in canonical string form, strictly positive.
 */
export type DecimalAmount = Brand<string, 'DecimalAmount'>;

export function idempotencyKey(raw: string): IdempotencyKey {
  assertNonEmpty(raw, 'idempotencyKey');
  return raw as IdempotencyKey;
}

export function generateIdempotencyKey(): IdempotencyKey {
  return uuidv4() as IdempotencyKey;
}

export function generateCorrelationId(): CorrelationId {
  return uuidv4() as CorrelationId;
}

// =============================================================================
// RUNTIME ASSERTIONS
// =============================================================================

export function assertNonEmpty(value: unknown, field: string): asserts value is string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ValidationError(`${field} must be a non-empty string`, field);
  }
}

const DECIMAL_PATTERN = /^\d+(\.\d+)?$/;

/**
 * Normalize a positive amount to a decimal string.
 *
 * Numbers are accepted when finite; strings must be plain decimals
 * (no exponent, no sign).
 */
export function positiveDecimal(value: unknown, field = 'amount'): DecimalAmount {
  let text: string;
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new ValidationError(`${field} must be a finite number`, field);
    }
    if (value <= 0) {
      throw new ValidationError(`${field} must be greater than 0`, field);
    }
    text = numberToDecimal(value);
  } else if (typeof value === 'string') {
    text = value.trim();
  } else {
    throw new ValidationError(`${field} must be a number or decimal string`, field);
  }

  if (!DECIMAL_PATTERN.test(text)) {
    throw new ValidationError(`${field} must be a decimal number`, field);
  }

  const canonical = canonicalDecimal(text);
  if (/^0(\.0+)?$/.test(canonical)) {
    throw new ValidationError(`${field} must be greater than 0`, field);
  }
  return canonical as DecimalAmount;
}

function numberToDecimal(value: number): string {
  const text = String(value);
  // Tiny/huge numbers print in exponent form; shift the point through the digits
  const match = /^(\d+)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (!match) return text;

  const [, whole, fraction = '', exponent] = match;
  const digits = whole + fraction;
  const point = whole.length + Number(exponent);
  if (point <= 0) return `0.${'0'.repeat(-point)}${digits}`;
  if (point >= digits.length) return digits + '0'.repeat(point - digits.length);
  return `${digits.slice(0, point)}.${digits.slice(point)}`;
}

function canonicalDecimal(text: string): string {
  const [whole, fraction] = text.split('.');
  const trimmedWhole = whole.replace(/^0+(?=\d)/, '');
  const trimmedFraction = fraction?.replace(/0+$/, '') ?? '';
  return trimmedFraction.length > 0 ? `${trimmedWhole}.${trimmedFraction}` : trimmedWhole;
}

/**
 * Plain-object check for payloads merged into requests.
 */
export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
