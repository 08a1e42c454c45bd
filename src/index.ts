/**
 * Client for the Deta Base document store and the Deta Drive blob store.
 *
 * @example
 * ```typescript
 * import { createDeta } from 'deta-client';
 *
 * const deta = createDeta(projectKey);
 *
 * const users = deta.base('users');
 * await users.put([{ key: 'user-1', value: { name: 'Jane', age: 31 } }]);
 * const { items } = await users.query().greaterThan('age', 30).walk();
 *
 * const files = deta.drive('files');
 * const result = await files.put('report.pdf', bytes);
 * ```
 *
 * @module deta-client
 */

// Client
export { Deta, createDeta } from './client/index.js';
export type { DetaClientOptions } from './client/index.js';

// Configuration
export {
  DetaConfigBuilder,
  SecretString,
  parseProjectKey,
  validateConfig,
  DEFAULT_BASE_URL,
  DEFAULT_DRIVE_URL,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
  DEFAULT_RETRY_CONFIG,
} from './config/index.js';
export type { DetaConfig, DetaEnvironment, RetryConfig } from './config/index.js';

// Services
export { Base, Updater, EXPIRES_FIELD, serializeRecord } from './base/index.js';
export type { BaseRecord, UpdatePayload } from './base/index.js';
export { Query, Comparator, filterKey } from './query/index.js';
export type {
  QueryGroup,
  QueryPayload,
  PageErrorPolicy,
  WalkOptions,
  WalkResult,
} from './query/index.js';
export { Drive, ChunkUploader, splitIntoChunks } from './drive/index.js';
export type {
  ListOptions,
  PartFailure,
  UploadAborted,
  UploadCompleted,
  UploadOptions,
  UploadResult,
} from './drive/index.js';

// Wire types
export { MAX_PUT_RECORDS, DEFAULT_PAGE_LIMIT, MAX_CHUNK_SIZE } from './types/index.js';
export type {
  JsonValue,
  JsonObject,
  Item,
  Paging,
  QueryResponse,
  PutResponse,
  DeleteItemResponse,
  UpdateResponse,
  ListFilesResponse,
  DeleteFilesResponse,
  FileInfo,
} from './types/index.js';

// Errors
export {
  DetaError,
  DetaErrorCode,
  ConfigurationError,
  BadRequestError,
  UnauthorizedError,
  NotFoundError,
  ConflictError,
  PayloadTooLargeError,
  HttpError,
  TransportError,
  TimeoutError,
  PayloadError,
  SerializationError,
  isDetaError,
  isRetryableError,
} from './errors/index.js';

// Transport
export { FetchTransport, ResilientTransport } from './transport/index.js';
export type { HttpTransport, HttpRequest, HttpResponse, HttpMethod } from './transport/index.js';
export { RetryExecutor } from './resilience/index.js';

// Observability
export {
  LogLevel,
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  NoopMetricsCollector,
  InMemoryMetricsCollector,
  MetricNames,
  redactSecrets,
  createNoopObservability,
  createInMemoryObservability,
  createConsoleObservability,
} from './observability/index.js';
export type {
  LogContext,
  Logger,
  MetricLabels,
  MetricName,
  MetricsCollector,
  Observability,
} from './observability/index.js';
