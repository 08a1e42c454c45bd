/**
 * HTTP execution for the Deta services.
 *
 * Builds URLs relative to one service root, injects the API key and content
 * type headers, maps non-2xx statuses to typed errors, and decodes JSON
 * responses through zod schemas.
 */

import type { z } from 'zod';
import type { SecretString } from '../config/index.js';
import {
  DetaError,
  SerializationError,
  mapHttpError,
  type DetaApiErrorResponse,
} from '../errors/index.js';
import type { Observability } from '../observability/index.js';
import { MetricNames } from '../observability/index.js';
import type { HttpMethod, HttpResponse, HttpTransport } from '../transport/index.js';
import { isSuccessResponse } from '../transport/index.js';

/**
 * Query parameter values. Undefined values are left out of the URL.
 */
export type QueryParams = Record<string, string | number | undefined>;

/**
 * Request options.
 */
export interface RequestOptions {
  /** HTTP method */
  method: HttpMethod;
  /** Path relative to the service root, e.g. '/items' */
  path: string;
  /** Query parameters */
  query?: QueryParams;
  /** JSON body */
  json?: unknown;
  /** Binary body, sent as application/octet-stream */
  bytes?: Uint8Array;
}

/**
 * Settings for one service client.
 */
export interface DetaHttpClientOptions {
  /** Service root, e.g. 'https://database.deta.sh/v1/{projectId}/{baseName}' */
  rootUrl: string;
  projectKey: SecretString;
  userAgent: string;
  requestTimeoutMs: number;
}

/**
 * Encodes query parameters with encodeURIComponent, in insertion order.
 */
export function buildQueryString(query: QueryParams | undefined): string {
  if (!query) return '';
  const pairs: string[] = [];
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) continue;
    pairs.push(`${encodeURIComponent(key)}=${encodeURIComponent(String(value))}`);
  }
  return pairs.length > 0 ? `?${pairs.join('&')}` : '';
}

const textDecoder = new TextDecoder();

/**
 * HTTP client bound to one Deta service root.
 */
export class DetaHttpClient {
  private readonly options: DetaHttpClientOptions;
  private readonly transport: HttpTransport;
  private readonly observability: Observability;

  constructor(
    options: DetaHttpClientOptions,
    transport: HttpTransport,
    observability: Observability
  ) {
    this.options = options;
    this.transport = transport;
    this.observability = observability;
  }

  get rootUrl(): string {
    return this.options.rootUrl;
  }

  /**
   * Builds the full URL for a path and query.
   */
  buildUrl(path: string, query?: QueryParams): string {
    return `${this.options.rootUrl}${path}${buildQueryString(query)}`;
  }

  /**
   * Sends a request and decodes the JSON response with the given schema.
   *
   * @throws {DetaError} Mapped from the status code on non-2xx responses
   * @throws {SerializationError} If the body is not JSON of the expected shape
   */
  async requestJson<T>(
    options: RequestOptions,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    const response = await this.execute(options);
    const payload = decodeJson(response.body);
    const result = schema.safeParse(payload);
    if (!result.success) {
      throw new SerializationError(
        `unexpected response body for ${options.method} ${options.path}`,
        result.error,
        { issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`) }
      );
    }
    return result.data;
  }

  /**
   * Sends a request and returns the raw response body.
   *
   * @throws {DetaError} Mapped from the status code on non-2xx responses
   */
  async requestBytes(options: RequestOptions): Promise<Uint8Array> {
    const response = await this.execute(options);
    return response.body;
  }

  private async execute(options: RequestOptions): Promise<HttpResponse> {
    const { logger, metrics } = this.observability;
    const startTime = Date.now();
    const url = this.buildUrl(options.path, options.query);

    const headers: Record<string, string> = {
      'X-API-Key': this.options.projectKey.expose(),
      'User-Agent': this.options.userAgent,
    };
    let body: string | Uint8Array | undefined;
    if (options.bytes !== undefined) {
      headers['Content-Type'] = 'application/octet-stream';
      body = options.bytes;
    } else {
      headers['Content-Type'] = 'application/json';
      if (options.json !== undefined) {
        body = JSON.stringify(options.json);
      }
    }

    logger.debug('Sending request', { method: options.method, path: options.path });

    try {
      const response = await this.transport.send({
        method: options.method,
        url,
        headers,
        body,
        timeoutMs: this.options.requestTimeoutMs,
      });

      metrics.increment(MetricNames.REQUESTS_TOTAL, 1, {
        method: options.method,
        status: String(response.status),
      });
      metrics.timing(MetricNames.REQUEST_LATENCY, Date.now() - startTime, {
        method: options.method,
      });

      if (!isSuccessResponse(response)) {
        throw mapHttpError(response.status, response.statusText, decodeErrorBody(response.body));
      }

      return response;
    } catch (error) {
      metrics.increment(MetricNames.ERRORS_TOTAL, 1, {
        method: options.method,
        code: error instanceof DetaError ? error.code : 'unknown',
      });
      logger.error('Request failed', {
        method: options.method,
        path: options.path,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }
}

function decodeJson(body: Uint8Array): unknown {
  const text = textDecoder.decode(body);
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new SerializationError('response body is not valid JSON', error);
  }
}

function decodeErrorBody(body: Uint8Array): DetaApiErrorResponse | null {
  if (body.length === 0) return null;
  try {
    const parsed: unknown = JSON.parse(textDecoder.decode(body));
    if (typeof parsed === 'object' && parsed !== null && 'errors' in parsed && Array.isArray(parsed.errors)) {
      return { errors: parsed.errors.filter((e): e is string => typeof e === 'string') };
    }
    return null;
  } catch {
    // error bodies are best effort; the status alone decides the error class
    return null;
  }
}
