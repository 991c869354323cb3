/**
 * Code Audit Registry
 *
 * Functions registered here are fingerprinted by the sha256 of their
 * source text and can be submitted to the ledger for review
 * (`submitAudit`). While a registered function runs, its hash sits on the
 * audited call chain; `createPayment` sends that chain as
 * `func_stack_hashes`, so the ledger can tell which reviewed code asked for
 * the payment.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { createHash } from 'crypto';
import { ValidationError } from '../errors/errors.js';

export interface AuditedFunction {
  readonly name: string;
  readonly source: string;
  /** sha256 of `source`, hex */
  readonly hash: string;
}

const chain = new AsyncLocalStorage<readonly string[]>();

export function hashSource(source: string): string {
  return createHash('sha256').update(source, 'utf8').digest('hex');
}

/**
 * Hashes of the registered functions on the current call chain, outermost
 * first. Empty outside any registered function.
 */
export function auditedStackHashes(): string[] {
  return [...(chain.getStore() ?? [])];
}

export class AuditRegistry {
  private entries: AuditedFunction[] = [];
  private seen: Set<string> = new Set();

  /**
   * Fingerprint `fn` and return a wrapper with the same signature that
   * puts the fingerprint on the audited call chain for the duration of
   * each call, awaited work included.
   */
  register<A extends unknown[], R>(fn: (...args: A) => R, name: string = fn.name): (...args: A) => R {
    if (typeof fn !== 'function') {
      throw new ValidationError('Only functions can be audited', 'fn');
    }
    const source = Function.prototype.toString.call(fn).trim();
    if (/^class\b/.test(source)) {
      throw new ValidationError(`Only functions can be audited, not classes (${name || 'anonymous'})`, 'fn');
    }
    if (name.length === 0) {
      throw new ValidationError('Audited functions need a name', 'name');
    }

    const hash = hashSource(source);
    const key = `${name}:${hash}`;
    if (!this.seen.has(key)) {
      this.seen.add(key);
      this.entries.push(Object.freeze({ name, source, hash }));
    }

    return function (this: unknown, ...args: A): R {
      return chain.run([...(chain.getStore() ?? []), hash], () => fn.apply(this, args));
    };
  }

  functions(): AuditedFunction[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }
}
