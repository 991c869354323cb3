/**
 * Observability Module
 */

export type { PaymentMetrics } from './metrics.js';
export { NoOpMetrics, ConsoleMetrics } from './metrics.js';
