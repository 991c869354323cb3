/**
 * Utilities Module
 */

// Type-only exports (interfaces)
export type { Logger, LogContext, LogLevel } from './logger.js';

// Value exports (classes and functions)
export { JsonLogger, createLogger, parseLogLevel } from './logger.js';
