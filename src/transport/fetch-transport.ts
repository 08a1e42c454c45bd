/**
 * Fetch-based HTTP transport for the Deta client
 */

import type { HttpRequest, HttpResponse, HttpTransport } from './types.js';
import { TimeoutError, TransportError } from '../errors/index.js';

/**
 * Options for configuring the FetchTransport
 */
export interface FetchTransportOptions {
  /** Default timeout in milliseconds */
  timeoutMs?: number;
  /** fetch implementation, defaults to the global one */
  fetch?: typeof fetch;
}

/**
 * HTTP transport backed by the global fetch API
 */
export class FetchTransport implements HttpTransport {
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: FetchTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.fetchImpl = options.fetch ?? globalThis.fetch;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const timeoutMs = request.timeoutMs ?? this.timeoutMs;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await this.fetchImpl(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
      });

      const body = new Uint8Array(await response.arrayBuffer());

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key.toLowerCase()] = value;
      });

      return {
        status: response.status,
        statusText: response.statusText,
        headers,
        body,
      };
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new TimeoutError(timeoutMs);
      }
      throw new TransportError(error instanceof Error ? error.message : String(error), error);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
