/**
 * Retry logic for the Deta transport.
 */

import type { RetryConfig } from '../config/index.js';
import { isRetryableError } from '../errors/index.js';

/**
 * Callbacks fired by {@link RetryExecutor}.
 */
export interface RetryHooks {
  /** Called before sleeping ahead of a new attempt */
  onRetry?: (attempt: number, reason: string, delayMs: number) => void;
}

/**
 * Runs an operation, retrying on retryable errors and on results the caller
 * marks as retryable, with exponential backoff and jitter.
 */
export class RetryExecutor {
  constructor(
    private readonly config: RetryConfig,
    private readonly hooks: RetryHooks = {},
    private readonly sleep: (ms: number) => Promise<void> = defaultSleep
  ) {}

  /**
   * @param fn - Operation to run
   * @param isRetryableResult - Marks a successful result as worth retrying
   *   (e.g. a 503 response). The last such result is returned once attempts
   *   are exhausted.
   */
  async execute<T>(fn: () => Promise<T>, isRetryableResult?: (result: T) => boolean): Promise<T> {
    let attempt = 0;

    for (;;) {
      let result: T;
      try {
        result = await fn();
      } catch (error) {
        if (attempt >= this.config.maxRetries || !isRetryableError(error)) {
          throw error;
        }
        attempt++;
        await this.backoff(attempt, error instanceof Error ? error.message : String(error));
        continue;
      }

      if (attempt >= this.config.maxRetries || !isRetryableResult?.(result)) {
        return result;
      }
      attempt++;
      await this.backoff(attempt, 'retryable response');
    }
  }

  /**
   * Computes the delay before the given retry attempt (1-based).
   */
  calculateDelay(attempt: number): number {
    const exponentialDelay = Math.min(
      this.config.initialBackoffMs * Math.pow(this.config.backoffMultiplier, attempt - 1),
      this.config.maxBackoffMs
    );
    const jitter = exponentialDelay * this.config.jitterFactor * Math.random();
    return Math.floor(exponentialDelay + jitter);
  }

  private async backoff(attempt: number, reason: string): Promise<void> {
    const delay = this.calculateDelay(attempt);
    this.hooks.onRetry?.(attempt, reason, delay);
    await this.sleep(delay);
  }
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
