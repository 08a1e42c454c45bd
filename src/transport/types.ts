/**
 * HTTP transport type definitions for the Deta client
 */

/**
 * HTTP methods used by the Deta APIs
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * HTTP request
 */
export interface HttpRequest {
  /** HTTP method */
  method: HttpMethod;
  /** Full URL including query string */
  url: string;
  /** HTTP headers */
  headers: Record<string, string>;
  /** Request body (optional) */
  body?: string | Uint8Array;
  /** Per-request timeout in milliseconds, overriding the transport default */
  timeoutMs?: number;
}

/**
 * HTTP response with buffered body
 *
 * Returned for every status code; mapping non-2xx statuses to errors is the
 * caller's job.
 */
export interface HttpResponse {
  /** HTTP status code */
  status: number;
  /** HTTP status text */
  statusText: string;
  /** HTTP headers, keys lower-cased */
  headers: Record<string, string>;
  /** Response body */
  body: Uint8Array;
}

/**
 * HTTP transport interface
 */
export interface HttpTransport {
  /**
   * Sends an HTTP request and returns the buffered response.
   *
   * @throws {TransportError} On connection failures
   * @throws {TimeoutError} When the request times out
   */
  send(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * Helper to check if response is successful (2xx status)
 */
export function isSuccessResponse(response: HttpResponse): boolean {
  return response.status >= 200 && response.status < 300;
}

/**
 * Statuses the resilient transport treats as transient
 */
export function isRetryableStatus(status: number): boolean {
  return status === 429 || status === 502 || status === 503 || status === 504;
}
