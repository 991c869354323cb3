/**
 * Keyed Lock
 *
 * Invariant: one idempotency key = at most one attempt in flight.
 *
 * Waiters are served FIFO. Distinct keys never wait on each other.
 */

export class KeyedLock {
  private locks: Map<string, Array<() => void>> = new Map();

  /**
   * Take the lock if free. Never waits.
   */
  tryAcquire(key: string): boolean {
    if (this.locks.has(key)) return false;
    this.locks.set(key, []);
    return true;
  }

  /**
   * Take the lock, queueing behind the current holder.
   */
  async acquire(key: string): Promise<void> {
    const queue = this.locks.get(key);
    if (!queue) {
      this.locks.set(key, []);
      return;
    }
    return new Promise<void>((resolve) => {
      queue.push(resolve);
    });
  }

  /**
   * Hand the lock to the next waiter, or free it.
   */
  release(key: string): void {
    const queue = this.locks.get(key);
    if (!queue) return;

    const next = queue.shift();
    if (next) {
      next();
    } else {
      this.locks.delete(key);
    }
  }

  // For testing: check if key is held
  isLocked(key: string): boolean {
    return this.locks.has(key);
  }

  // For testing: get queue length for key
  queueLength(key: string): number {
    return this.locks.get(key)?.length ?? 0;
  }
}
