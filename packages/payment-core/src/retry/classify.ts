/**
 * Response Classification
 *
 * Order matters: a 5xx is retryable whatever it carries, a 409 is a
 * challenge only when it carries one.
 */

import type { LedgerErrorDescriptor } from '../errors/errors.js';
import type { Challenge } from '../payments/types.js';
import { decodeErrorBody } from '../payments/wire.js';
import type { TransportResponse } from '../transport/types.js';

export type ResponseClass =
  | { type: 'SUCCESS' }
  | { type: 'RETRYABLE'; status: number; descriptor?: LedgerErrorDescriptor }
  | { type: 'CHALLENGED'; challenge: Challenge; paymentId?: string }
  | { type: 'NOT_FOUND'; descriptor?: LedgerErrorDescriptor }
  | { type: 'FATAL'; status: number; descriptor?: LedgerErrorDescriptor };

export function classifyResponse(response: TransportResponse): ResponseClass {
  const { status } = response;

  if (status >= 200 && status < 300) {
    return { type: 'SUCCESS' };
  }

  const decoded = decodeErrorBody(response.body);
  const descriptor = decoded.descriptor ? { descriptor: decoded.descriptor } : {};

  if (status >= 500) {
    return { type: 'RETRYABLE', status, ...descriptor };
  }
  if (status === 409 && decoded.challenge) {
    return {
      type: 'CHALLENGED',
      challenge: decoded.challenge,
      ...(decoded.paymentId ? { paymentId: decoded.paymentId } : {}),
    };
  }
  if (status === 404) {
    return { type: 'NOT_FOUND', ...descriptor };
  }
  return { type: 'FATAL', status, ...descriptor };
}
