/**
 * Operation Programs
 *
 * Every operation is written once, as a generator that yields the only two
 * things that may suspend it: network I/O and a timed wait. A runner
 * decides how each step is awaited (see runners.ts), so the blocking and
 * non-blocking paths share one state machine and one request sequence.
 *
 * Nothing else suspends: key generation, classification and bookkeeping
 * run synchronously between steps.
 */

import type { TransportRequest, TransportResponse } from '../transport/types.js';

export type Step =
  | { type: 'SEND'; request: TransportRequest }
  | { type: 'SLEEP'; ms: number; reason: 'backoff' | 'poll' };

export type StepResult =
  | { type: 'RESPONSE'; response: TransportResponse }
  | { type: 'SLEPT' };

export type Program<T> = Generator<Step, T, StepResult>;

export function* send(request: TransportRequest): Program<TransportResponse> {
  const result = yield { type: 'SEND', request };
  if (result.type !== 'RESPONSE') {
    throw new Error(`Runner answered SEND with ${result.type}`);
  }
  return result.response;
}

export function* sleep(ms: number, reason: 'backoff' | 'poll'): Program<void> {
  if (ms <= 0) return;
  const result = yield { type: 'SLEEP', ms, reason };
  if (result.type !== 'SLEPT') {
    throw new Error(`Runner answered SLEEP with ${result.type}`);
  }
}
