/**
 * Boundary Invariants Module
 */

export type { IdempotencyKey, CorrelationId, DecimalAmount } from './invariants.js';

export {
  idempotencyKey,
  generateIdempotencyKey,
  generateCorrelationId,
  assertNonEmpty,
  positiveDecimal,
  isPlainRecord,
} from './invariants.js';
