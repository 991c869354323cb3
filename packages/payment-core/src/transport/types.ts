/**
 * Transport Types
 *
 * The transport issues one HTTP exchange per call. It adds authentication,
 * enforces the per-attempt timeout and classifies failures; it never
 * interprets business payloads.
 */

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export interface TransportRequest {
  /** Logical operation name, for logs and errors */
  operation: string;
  method: HttpMethod;
  /** Path relative to the configured base URL */
  path: string;
  query?: Record<string, string>;
  body?: unknown;
  /** Sent as Idempotency-Key; identical on every retry of one intent */
  idempotencyKey?: string;
}

export interface TransportResponse {
  status: number;
  /** Parsed JSON, raw text when not JSON, null when empty */
  body: unknown;
}

/**
 * Both paths share one connection pool and one set of credentials.
 *
 * Failures: NetworkError, TimeoutError, AuthError (401/403).
 * Every other status is returned as a response.
 */
export interface Transport {
  send(request: TransportRequest): Promise<TransportResponse>;
  sendSync(request: TransportRequest): TransportResponse;
  /** Release pooled connections */
  close?(): Promise<void>;
}
