/**
 * Facade Module
 */

export type { PaymentCoreOptions, PaymentCore } from './core.js';
export type { ClientDeps, CallOptions } from './clients.js';

export { createPaymentCore } from './core.js';
export { PaymentClient, BlockingPaymentClient } from './clients.js';
