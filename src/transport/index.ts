/**
 * HTTP transport layer
 */

export type { HttpMethod, HttpRequest, HttpResponse, HttpTransport } from './types.js';
export { isSuccessResponse, isRetryableStatus } from './types.js';
export { FetchTransport } from './fetch-transport.js';
export type { FetchTransportOptions } from './fetch-transport.js';
export { ResilientTransport } from './resilient-transport.js';
