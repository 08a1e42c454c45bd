/**
 * Deta client configuration and builder.
 *
 * @module config
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';

// ============================================================================
// SecretString
// ============================================================================

/**
 * SecretString wrapper to prevent accidental logging of sensitive values.
 * The value is only accessible via the expose() method.
 */
export class SecretString {
  private readonly value: string;

  private constructor(value: string) {
    this.value = value;
  }

  static from(value: string): SecretString {
    return new SecretString(value);
  }

  /**
   * Exposes the secret value. Use with caution.
   */
  expose(): string {
    return this.value;
  }

  toString(): string {
    return '[REDACTED]';
  }

  toJSON(): string {
    return '[REDACTED]';
  }
}

// ============================================================================
// Retry Configuration
// ============================================================================

/**
 * Retry configuration for the resilient transport.
 */
export interface RetryConfig {
  /** Maximum retry attempts after the first one. Default: 0 (no retries) */
  maxRetries: number;
  /** Initial backoff delay (ms). Default: 500 */
  initialBackoffMs: number;
  /** Maximum backoff delay (ms). Default: 10000 */
  maxBackoffMs: number;
  /** Backoff multiplier. Default: 2 */
  backoffMultiplier: number;
  /** Jitter factor (0-1). Default: 0.1 */
  jitterFactor: number;
}

// ============================================================================
// Main Configuration Interface
// ============================================================================

/**
 * Deta client configuration.
 */
export interface DetaConfig {
  /** Project key, sent as the X-API-Key header */
  readonly projectKey: SecretString;
  /** Project id, the part of the project key before the underscore */
  readonly projectId: string;
  /** Base (document store) API URL. Default: 'https://database.deta.sh/v1' */
  readonly baseUrl: string;
  /** Drive (blob store) API URL. Default: 'https://drive.deta.sh/v1' */
  readonly driveUrl: string;
  /** Request timeout in milliseconds. Default: 30000 */
  readonly requestTimeoutMs: number;
  /** User agent string */
  readonly userAgent: string;
  /** Retry configuration for the transport */
  readonly retryConfig: Readonly<RetryConfig>;
}

// ============================================================================
// Default Configurations
// ============================================================================

export const DEFAULT_BASE_URL = 'https://database.deta.sh/v1';

export const DEFAULT_DRIVE_URL = 'https://drive.deta.sh/v1';

/**
 * Default request timeout in milliseconds (30 seconds).
 */
export const DEFAULT_TIMEOUT_MS = 30000;

export const DEFAULT_USER_AGENT = 'deta-client/0.1.0';

/**
 * Default retry configuration. Retries are off unless asked for.
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 0,
  initialBackoffMs: 500,
  maxBackoffMs: 10000,
  backoffMultiplier: 2,
  jitterFactor: 0.1,
};

// ============================================================================
// Validation
// ============================================================================

const RetryConfigSchema = z
  .object({
    maxRetries: z.number().int().min(0).max(10),
    initialBackoffMs: z.number().int().min(0),
    maxBackoffMs: z.number().int().min(0),
    backoffMultiplier: z.number().min(1),
    jitterFactor: z.number().min(0).max(1),
  })
  .refine((config) => config.maxBackoffMs >= config.initialBackoffMs, {
    message: 'maxBackoffMs must be greater than or equal to initialBackoffMs',
  });

const HttpUrlSchema = z
  .string()
  .url()
  .refine((url) => url.startsWith('https://') || url.startsWith('http://'), {
    message: 'URL must use HTTP or HTTPS protocol',
  });

const DetaConfigSchema = z.object({
  projectId: z.string().min(1, 'Project id is required'),
  baseUrl: HttpUrlSchema,
  driveUrl: HttpUrlSchema,
  requestTimeoutMs: z.number().int().positive(),
  userAgent: z.string().min(1),
  retryConfig: RetryConfigSchema,
});

/**
 * Validates a configuration object.
 *
 * @throws {ConfigurationError} If the configuration is invalid
 */
export function validateConfig(config: DetaConfig): void {
  const result = DetaConfigSchema.safeParse(config);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ConfigurationError(
      issues.map((issue) => `${issue.path}: ${issue.message}`).join('; '),
      { issues }
    );
  }
}

/**
 * Splits a project key into its project id.
 *
 * A project key has the form `{projectId}_{secret}`.
 *
 * @throws {ConfigurationError} If the key does not have exactly two non-empty parts
 */
export function parseProjectKey(projectKey: string): { projectId: string } {
  const parts = projectKey.split('_');
  if (parts.length !== 2 || parts[0] === '' || parts[1] === '') {
    throw new ConfigurationError('Invalid project key: expected the form "<projectId>_<secret>"');
  }
  return { projectId: parts[0] };
}

// ============================================================================
// Configuration Builder
// ============================================================================

/**
 * Environment variables understood by {@link DetaConfigBuilder.fromEnv}.
 */
export type DetaEnvironment = Readonly<Record<string, string | undefined>>;

/**
 * Builder for Deta client configuration.
 *
 * @example
 * ```typescript
 * const config = new DetaConfigBuilder()
 *   .withProjectKey('a0abcyxz_aSecretValue')
 *   .withTimeout(10000)
 *   .build();
 * ```
 */
export class DetaConfigBuilder {
  private projectKey?: string;
  private baseUrl: string = DEFAULT_BASE_URL;
  private driveUrl: string = DEFAULT_DRIVE_URL;
  private requestTimeoutMs: number = DEFAULT_TIMEOUT_MS;
  private userAgent: string = DEFAULT_USER_AGENT;
  private retryConfig: RetryConfig = { ...DEFAULT_RETRY_CONFIG };

  /**
   * Sets the project key.
   */
  withProjectKey(projectKey: string): this {
    const trimmed = projectKey.trim();
    if (trimmed.length === 0) {
      throw new ConfigurationError('Project key cannot be empty');
    }
    this.projectKey = trimmed;
    return this;
  }

  /**
   * Sets the Base API URL. A trailing slash is removed.
   */
  withBaseUrl(url: string): this {
    this.baseUrl = url.replace(/\/+$/, '');
    return this;
  }

  /**
   * Sets the Drive API URL. A trailing slash is removed.
   */
  withDriveUrl(url: string): this {
    this.driveUrl = url.replace(/\/+$/, '');
    return this;
  }

  /**
   * Sets the request timeout in milliseconds.
   */
  withTimeout(ms: number): this {
    this.requestTimeoutMs = ms;
    return this;
  }

  withUserAgent(userAgent: string): this {
    this.userAgent = userAgent;
    return this;
  }

  /**
   * Merges a partial retry configuration into the defaults.
   */
  withRetryConfig(config: Partial<RetryConfig>): this {
    this.retryConfig = { ...this.retryConfig, ...config };
    return this;
  }

  /**
   * Creates a builder from an environment record.
   *
   * The record is passed in explicitly; nothing is read from the process.
   *
   * Environment variables:
   * - DETA_PROJECT_KEY: project key
   * - DETA_BASE_URL: custom Base API URL
   * - DETA_DRIVE_URL: custom Drive API URL
   * - DETA_TIMEOUT_MS: request timeout in milliseconds
   * - DETA_MAX_RETRIES: maximum retry attempts
   *
   * @example
   * ```typescript
   * const config = DetaConfigBuilder.fromEnv(process.env).build();
   * ```
   */
  static fromEnv(env: DetaEnvironment): DetaConfigBuilder {
    const builder = new DetaConfigBuilder();

    const projectKey = env.DETA_PROJECT_KEY;
    if (projectKey) {
      builder.withProjectKey(projectKey);
    }

    const baseUrl = env.DETA_BASE_URL;
    if (baseUrl) {
      builder.withBaseUrl(baseUrl);
    }

    const driveUrl = env.DETA_DRIVE_URL;
    if (driveUrl) {
      builder.withDriveUrl(driveUrl);
    }

    const timeout = env.DETA_TIMEOUT_MS;
    if (timeout) {
      const timeoutMs = parseInt(timeout, 10);
      if (!isNaN(timeoutMs)) {
        builder.withTimeout(timeoutMs);
      }
    }

    const maxRetries = env.DETA_MAX_RETRIES;
    if (maxRetries) {
      const retries = parseInt(maxRetries, 10);
      if (!isNaN(retries)) {
        builder.withRetryConfig({ maxRetries: retries });
      }
    }

    return builder;
  }

  /**
   * Builds and validates the configuration.
   *
   * @throws {ConfigurationError} If the project key is missing or any value is invalid
   */
  build(): DetaConfig {
    if (this.projectKey === undefined) {
      throw new ConfigurationError('Project key is required (use withProjectKey())');
    }

    const { projectId } = parseProjectKey(this.projectKey);

    const config: DetaConfig = {
      projectKey: SecretString.from(this.projectKey),
      projectId,
      baseUrl: this.baseUrl,
      driveUrl: this.driveUrl,
      requestTimeoutMs: this.requestTimeoutMs,
      userAgent: this.userAgent,
      retryConfig: { ...this.retryConfig },
    };

    validateConfig(config);
    return config;
  }
}
