/**
 * Transport Module
 */

export type { HttpMethod, TransportRequest, TransportResponse, Transport } from './types.js';
export type { WireRequest, WireReply } from './wire.js';
export type { LedgerHttpTransportOptions } from './http-transport.js';

export { buildWireRequest, parseResponseBody, interpretReply } from './wire.js';
export { LedgerHttpTransport, takeReply } from './http-transport.js';
