/**
 * Payment State Machine
 *
 * CREATED → PENDING → (CONFIRMED | REJECTED | CHALLENGED) → (CONFIRMED | FAILED)
 *
 * Invariants:
 * 1. Terminal states never change
 * 2. Status moves forward only, as observed by the client
 * 3. CHALLENGED → PENDING happens only through challenge resolution
 */

import type { PaymentStatus } from './types.js';

export const TERMINAL_STATUSES: ReadonlySet<PaymentStatus> = new Set<PaymentStatus>([
  'CONFIRMED',
  'REJECTED',
  'FAILED',
]);

export const VALID_TRANSITIONS: Readonly<Record<PaymentStatus, readonly PaymentStatus[]>> = {
  CREATED: ['PENDING', 'CHALLENGED', 'CONFIRMED', 'REJECTED', 'FAILED'],
  PENDING: ['CHALLENGED', 'CONFIRMED', 'REJECTED', 'FAILED'],
  CHALLENGED: ['CONFIRMED', 'FAILED'],
  CONFIRMED: [],
  REJECTED: [],
  FAILED: [],
};

export function isTerminalStatus(status: PaymentStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export function isValidTransition(from: PaymentStatus, to: PaymentStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/**
 * Fold a server observation into the client's view.
 *
 * Same status or a legal forward move is taken; anything else (a stale
 * read, a regression) keeps the current status.
 */
export function advanceStatus(current: PaymentStatus, observed: PaymentStatus): PaymentStatus {
  if (observed === current) return current;
  return isValidTransition(current, observed) ? observed : current;
}

/**
 * The one backward edge: a resolved challenge re-enters PENDING.
 */
export function reopenAfterChallenge(current: PaymentStatus): PaymentStatus {
  if (current !== 'CHALLENGED') {
    throw new Error(`Cannot reopen payment in ${current}: only CHALLENGED payments are resolved`);
  }
  return 'PENDING';
}
