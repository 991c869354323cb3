/**
 * Execution Module
 */

export type { Step, StepResult, Program } from './program.js';
export type { Clock } from './clock.js';
export type { ExecutionEnv, CooperativeOptions } from './runners.js';

export { send, sleep } from './program.js';
export { SystemClock } from './clock.js';
export { KeyedLock } from './keyed-lock.js';
export { runBlocking, runCooperative } from './runners.js';
export { withDeadline } from './timeout.js';
