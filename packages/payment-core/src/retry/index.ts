/**
 * Retry Module
 */

export type { RetryPolicy } from './policy.js';
export type { ResponseClass } from './classify.js';
export type { RequestDescriptor, RetryContext, RetryEngineOptions } from './engine.js';

export { DEFAULT_RETRY_POLICY, resolveRetryPolicy, calculateDelay } from './policy.js';
export { classifyResponse } from './classify.js';
export { RetryEngine } from './engine.js';
