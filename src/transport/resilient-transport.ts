/**
 * Resilient HTTP transport wrapper
 *
 * Wraps an HTTP transport with the retry policy. This is the only layer of
 * the client that retries; services above it see a single outcome per call.
 */

import type { HttpRequest, HttpResponse, HttpTransport } from './types.js';
import { isRetryableStatus } from './types.js';
import type { RetryExecutor } from '../resilience/index.js';

/**
 * Transport that retries transport failures and transient statuses
 */
export class ResilientTransport implements HttpTransport {
  constructor(
    private readonly inner: HttpTransport,
    private readonly retry: RetryExecutor
  ) {}

  async send(request: HttpRequest): Promise<HttpResponse> {
    return this.retry.execute(
      () => this.inner.send(request),
      (response) => isRetryableStatus(response.status)
    );
  }
}
