/**
 * Agent Ledger Payment Core
 *
 * Payment and balance operations against a remote ledger with bounded
 * retries, lifecycle tracking and an audit trail, behind equivalent
 * blocking and non-blocking clients.
 */

export * from './errors/index.js';
export * from './utils/index.js';
export * from './boundaries/index.js';
export * from './config/index.js';
export * from './transport/index.js';
export * from './execution/index.js';
export * from './retry/index.js';
export * from './observability/index.js';
export * from './payments/index.js';
export * from './audit/index.js';
export * from './facade/index.js';
