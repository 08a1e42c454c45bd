/**
 * Logging and metrics for the Deta client.
 *
 * The HTTP client, the query walker and the chunk uploader report through an
 * {@link Observability} container. It defaults to no-op implementations; the
 * in-memory ones back the tests.
 */

// ============================================================================
// Logging
// ============================================================================

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

/**
 * Routes the four level methods to a single `write`.
 */
abstract class LevelLogger implements Logger {
  debug(message: string, context?: LogContext): void {
    this.write(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write(LogLevel.WARN, message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write(LogLevel.ERROR, message, context);
  }

  protected abstract write(level: LogLevel, message: string, context?: LogContext): void;
}

const SECRET_KEYS = new Set(['apikey', 'x-api-key', 'projectkey', 'token', 'secret', 'password']);

/**
 * Copies a log context with secret values replaced, at any depth.
 */
export function redactSecrets(context: LogContext): LogContext {
  const result: LogContext = {};
  for (const [key, value] of Object.entries(context)) {
    if (SECRET_KEYS.has(key.toLowerCase())) {
      result[key] = '[REDACTED]';
    } else if (typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date)) {
      result[key] = redactSecrets(Object.fromEntries(Object.entries(value)));
    } else {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Writes one JSON line per entry; warnings and errors go to stderr.
 */
export class ConsoleLogger extends LevelLogger {
  constructor(private readonly minLevel: LogLevel = LogLevel.INFO) {
    super();
  }

  protected write(level: LogLevel, message: string, context?: LogContext): void {
    if (level < this.minLevel) return;

    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      level: LogLevel[level],
      message,
      ...(context && Object.keys(context).length > 0 ? { context: redactSecrets(context) } : {}),
    });

    if (level === LogLevel.ERROR) {
      console.error(line);
    } else if (level === LogLevel.WARN) {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: LogContext;
}

/**
 * Keeps every entry for assertions.
 */
export class InMemoryLogger extends LevelLogger {
  private readonly entries: LogEntry[] = [];

  protected write(level: LogLevel, message: string, context?: LogContext): void {
    this.entries.push({ level, message, context });
  }

  /**
   * Entries in logging order, optionally only those at one level.
   */
  getEntries(level?: LogLevel): LogEntry[] {
    return level === undefined
      ? [...this.entries]
      : this.entries.filter((entry) => entry.level === level);
  }

  getMessages(): string[] {
    return this.entries.map((entry) => entry.message);
  }
}

// ============================================================================
// Metrics
// ============================================================================

export const MetricNames = {
  /** Responses received, labelled by method and status */
  REQUESTS_TOTAL: 'deta_requests_total',
  /** Request duration, labelled by method */
  REQUEST_LATENCY: 'deta_request_latency_ms',
  /** Failed requests, labelled by method and error code */
  ERRORS_TOTAL: 'deta_errors_total',

  QUERY_PAGES: 'deta_query_pages_total',
  /** Records stored by put and insert, labelled by base */
  RECORDS_WRITTEN: 'deta_records_written_total',

  UPLOAD_PARTS: 'deta_upload_parts_total',
  UPLOADS_COMPLETED: 'deta_uploads_completed_total',
  UPLOADS_ABORTED: 'deta_uploads_aborted_total',
  UPLOAD_BYTES: 'deta_upload_bytes_total',
} as const;

export type MetricName = (typeof MetricNames)[keyof typeof MetricNames];

export type MetricLabels = Record<string, string>;

export interface MetricsCollector {
  /**
   * Adds to a counter (default: 1).
   */
  increment(name: MetricName, value?: number, labels?: MetricLabels): void;

  /**
   * Records a duration in milliseconds.
   */
  timing(name: MetricName, durationMs: number, labels?: MetricLabels): void;
}

export class NoopMetricsCollector implements MetricsCollector {
  increment(): void {}
  timing(): void {}
}

/**
 * Series key in the usual exposition form, labels sorted:
 * `deta_requests_total{method=GET,status=200}`.
 */
function seriesKey(name: MetricName, labels?: MetricLabels): string {
  const pairs = Object.entries(labels ?? {})
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([key, value]) => `${key}=${value}`);
  return pairs.length > 0 ? `${name}{${pairs.join(',')}}` : name;
}

/**
 * Keeps counter totals and timing samples per series for assertions.
 */
export class InMemoryMetricsCollector implements MetricsCollector {
  private readonly counters = new Map<string, number>();
  private readonly timings = new Map<string, number[]>();

  increment(name: MetricName, value = 1, labels?: MetricLabels): void {
    const key = seriesKey(name, labels);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
  }

  timing(name: MetricName, durationMs: number, labels?: MetricLabels): void {
    const key = seriesKey(name, labels);
    const samples = this.timings.get(key) ?? [];
    samples.push(durationMs);
    this.timings.set(key, samples);
  }

  /**
   * Total of one series; 0 when it was never incremented.
   */
  getCounter(name: MetricName, labels?: MetricLabels): number {
    return this.counters.get(seriesKey(name, labels)) ?? 0;
  }

  getTimings(name: MetricName, labels?: MetricLabels): number[] {
    return [...(this.timings.get(seriesKey(name, labels)) ?? [])];
  }
}

// ============================================================================
// Container
// ============================================================================

export interface Observability {
  logger: Logger;
  metrics: MetricsCollector;
}

export function createNoopObservability(): Observability {
  return { logger: new NoopLogger(), metrics: new NoopMetricsCollector() };
}

export function createInMemoryObservability(): Observability & {
  logger: InMemoryLogger;
  metrics: InMemoryMetricsCollector;
} {
  return { logger: new InMemoryLogger(), metrics: new InMemoryMetricsCollector() };
}

/**
 * JSON-line console logging from `level` up; metrics are discarded.
 */
export function createConsoleObservability(level: LogLevel = LogLevel.INFO): Observability {
  return { logger: new ConsoleLogger(level), metrics: new NoopMetricsCollector() };
}
