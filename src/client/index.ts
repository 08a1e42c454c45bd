/**
 * Deta client entry point
 *
 * @module client
 */

import { Base } from '../base/index.js';
import type { DetaConfig } from '../config/index.js';
import { DetaConfigBuilder } from '../config/index.js';
import { Drive } from '../drive/index.js';
import { ConfigurationError } from '../errors/index.js';
import { DetaHttpClient } from '../http/index.js';
import type { Observability } from '../observability/index.js';
import { createNoopObservability } from '../observability/index.js';
import { RetryExecutor } from '../resilience/index.js';
import type { HttpTransport } from '../transport/index.js';
import { FetchTransport, ResilientTransport } from '../transport/index.js';

/**
 * Dependencies of a {@link Deta} client.
 */
export interface DetaClientOptions {
  /** HTTP transport. Default: FetchTransport with the configured timeout */
  transport?: HttpTransport;
  /** Logger and metrics. Default: no-op */
  observability?: Observability;
  /** Clock used for record expiry. Default: the system clock */
  clock?: () => Date;
}

/**
 * Client for the Base and Drive services of one project.
 *
 * When `retryConfig.maxRetries` is above zero, the transport is wrapped in a
 * {@link ResilientTransport}; otherwise every call is sent exactly once.
 *
 * @example
 * ```typescript
 * const deta = new Deta(
 *   new DetaConfigBuilder().withProjectKey(projectKey).build()
 * );
 * const users = deta.base('users');
 * const photos = deta.drive('photos');
 * ```
 */
export class Deta {
  private readonly transport: HttpTransport;
  private readonly observability: Observability;
  private readonly clock: () => Date;

  constructor(
    readonly config: DetaConfig,
    options: DetaClientOptions = {}
  ) {
    this.observability = options.observability ?? createNoopObservability();
    this.clock = options.clock ?? (() => new Date());

    const transport =
      options.transport ?? new FetchTransport({ timeoutMs: config.requestTimeoutMs });

    if (config.retryConfig.maxRetries > 0) {
      const { logger } = this.observability;
      const retry = new RetryExecutor(config.retryConfig, {
        onRetry: (attempt, reason, delayMs) => {
          logger.warn('Retrying request', { attempt, reason, delayMs });
        },
      });
      this.transport = new ResilientTransport(transport, retry);
    } else {
      this.transport = transport;
    }
  }

  /**
   * Returns a client for the named base.
   *
   * @throws {ConfigurationError} If the name is empty
   */
  base(name: string): Base {
    const http = this.createHttpClient(this.config.baseUrl, 'Base', name);
    return new Base(name, http, this.observability, this.clock);
  }

  /**
   * Returns a client for the named drive.
   *
   * @throws {ConfigurationError} If the name is empty
   */
  drive(name: string): Drive {
    const http = this.createHttpClient(this.config.driveUrl, 'Drive', name);
    return new Drive(name, http, this.observability);
  }

  private createHttpClient(serviceUrl: string, kind: string, name: string): DetaHttpClient {
    if (name.trim().length === 0) {
      throw new ConfigurationError(`${kind} name cannot be empty`);
    }
    return new DetaHttpClient(
      {
        rootUrl: `${serviceUrl}/${encodeURIComponent(this.config.projectId)}/${encodeURIComponent(name)}`,
        projectKey: this.config.projectKey,
        userAgent: this.config.userAgent,
        requestTimeoutMs: this.config.requestTimeoutMs,
      },
      this.transport,
      this.observability
    );
  }
}

/**
 * Creates a client from a project key with default settings.
 *
 * @throws {ConfigurationError} If the project key is malformed
 *
 * @example
 * ```typescript
 * const deta = createDeta(process.env.DETA_PROJECT_KEY ?? '');
 * ```
 */
export function createDeta(projectKey: string, options: DetaClientOptions = {}): Deta {
  const config = new DetaConfigBuilder().withProjectKey(projectKey).build();
  return new Deta(config, options);
}
