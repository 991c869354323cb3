/**
 * Schedulers
 *
 * Two drivers for the same Program:
 * - runBlocking: the calling thread waits for every step
 * - runCooperative: steps are awaited on the event loop; independent
 *   programs interleave, one program's backoff never delays another
 *
 * A step failure is thrown back into the program at the point it yielded,
 * so both drivers see identical control flow.
 */

import { CancelledError, IntentBusyError } from '../errors/errors.js';
import type { Transport } from '../transport/types.js';
import type { Clock } from './clock.js';
import type { KeyedLock } from './keyed-lock.js';
import type { Program, Step, StepResult } from './program.js';

export interface ExecutionEnv {
  transport: Transport;
  clock: Clock;
  lock: KeyedLock;
}

// =============================================================================
// BLOCKING
// =============================================================================

export function runBlocking<T>(program: Program<T>, env: ExecutionEnv): T {
  let next = program.next();
  while (!next.done) {
    let result: StepResult;
    try {
      result = performBlocking(next.value, env);
    } catch (error) {
      next = program.throw(error);
      continue;
    }
    next = program.next(result);
  }
  return next.value;
}

function performBlocking(step: Step, env: ExecutionEnv): StepResult {
  switch (step.type) {
    case 'SEND': {
      const key = step.request.idempotencyKey;
      // The event loop cannot run while this thread waits, so a held key
      // would never be released
      if (key !== undefined && !env.lock.tryAcquire(key)) {
        throw new IntentBusyError(key);
      }
      try {
        return { type: 'RESPONSE', response: env.transport.sendSync(step.request) };
      } finally {
        if (key !== undefined) env.lock.release(key);
      }
    }

    case 'SLEEP':
      env.clock.sleepSync(step.ms);
      return { type: 'SLEPT' };
  }
}

// =============================================================================
// COOPERATIVE
// =============================================================================

export interface CooperativeOptions {
  /** Name reported by CancelledError */
  operation: string;
  /** Checked before every step and while sleeping */
  signal?: AbortSignal;
}

export async function runCooperative<T>(
  program: Program<T>,
  env: ExecutionEnv,
  options: CooperativeOptions
): Promise<T> {
  const { signal, operation } = options;

  let next = program.next();
  while (!next.done) {
    let result: StepResult;
    try {
      if (signal?.aborted) {
        throw new CancelledError(operation);
      }
      result = await performCooperative(next.value, env, options);
    } catch (error) {
      next = program.throw(error);
      continue;
    }
    next = program.next(result);
  }
  return next.value;
}

async function performCooperative(
  step: Step,
  env: ExecutionEnv,
  options: CooperativeOptions
): Promise<StepResult> {
  switch (step.type) {
    case 'SEND': {
      const key = step.request.idempotencyKey;
      if (key !== undefined) {
        await env.lock.acquire(key);
      }
      try {
        // In flight: not interrupted by cancellation
        return { type: 'RESPONSE', response: await env.transport.send(step.request) };
      } finally {
        if (key !== undefined) env.lock.release(key);
      }
    }

    case 'SLEEP':
      try {
        await env.clock.sleep(step.ms, options.signal);
      } catch (error) {
        if (options.signal?.aborted) {
          throw new CancelledError(options.operation);
        }
        throw error;
      }
      return { type: 'SLEPT' };
  }
}
