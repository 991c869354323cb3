/**
 * HTTP Wire Mapping
 *
 * Pure functions between TransportRequest/Response and what goes over the
 * socket. Shared by both execution paths so they produce identical bytes.
 */

import type { Credentials } from '../config/credentials.js';
import { AuthError, NetworkError, TimeoutError } from '../errors/errors.js';
import { decodeErrorBody } from '../payments/wire.js';
import type { HttpMethod, TransportRequest, TransportResponse } from './types.js';

export interface WireRequest {
  url: string;
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string;
  timeoutMs: number;
}

export type WireReply =
  | { ok: true; status: number; text: string }
  | { ok: false; reason: 'timeout' | 'network'; message: string };

export function buildWireRequest(credentials: Credentials, request: TransportRequest): WireRequest {
  const path = request.path.replace(/^\/+/, '');
  let url = `${credentials.base_url}/${path}`;
  if (request.query && Object.keys(request.query).length > 0) {
    url += `?${new URLSearchParams(request.query).toString()}`;
  }

  const headers: Record<string, string> = {
    'X-API-Key': credentials.api_key,
    'X-API-Secret': credentials.api_secret,
    'Content-Type': 'application/json',
    Accept: 'application/json',
  };
  if (request.idempotencyKey) {
    headers['Idempotency-Key'] = request.idempotencyKey;
  }

  const wire: WireRequest = {
    url,
    method: request.method,
    headers,
    timeoutMs: credentials.timeout_ms,
  };
  if (request.body !== undefined) {
    wire.body = JSON.stringify(request.body);
  }
  return wire;
}

export function parseResponseBody(text: string): unknown {
  if (text.length === 0) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/**
 * Map a raw reply to a response, or throw the transport failure it
 * represents.
 */
export function interpretReply(
  request: TransportRequest,
  wire: WireRequest,
  reply: WireReply
): TransportResponse {
  if (!reply.ok) {
    if (reply.reason === 'timeout') {
      throw new TimeoutError(request.operation, wire.timeoutMs);
    }
    throw new NetworkError(`${request.operation}: ${reply.message}`);
  }

  const body = parseResponseBody(reply.text);
  if (reply.status === 401 || reply.status === 403) {
    throw new AuthError(reply.status, decodeErrorBody(body).descriptor);
  }
  return { status: reply.status, body };
}

export function isWireReply(value: unknown): value is WireReply {
  if (typeof value !== 'object' || value === null || !('ok' in value)) return false;
  if (value.ok === true) {
    return 'status' in value && typeof value.status === 'number' && 'text' in value && typeof value.text === 'string';
  }
  return (
    'reason' in value &&
    (value.reason === 'timeout' || value.reason === 'network') &&
    'message' in value &&
    typeof value.message === 'string'
  );
}
