/**
 * Deadline Enforcement
 *
 * HARD CONSTRAINT: a deadline is an upper bound on waiting, not a cancel.
 * The underlying operation may still complete after the deadline; the
 * caller must tolerate late results.
 */

import { TimeoutError } from '../errors/errors.js';

/**
 * Execute a function with a deadline.
 *
 * On expiry throws TimeoutError naming the operation.
 */
export async function withDeadline<T>(
  fn: () => Promise<T>,
  timeoutMs: number,
  operation: string
): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new TimeoutError(operation, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(), timeoutPromise]);
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
  }
}
