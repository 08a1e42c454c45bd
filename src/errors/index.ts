/**
 * Error types and handling for the Deta client.
 *
 * Every failure surfaces as a subclass of {@link DetaError}. HTTP statuses are
 * mapped to dedicated classes, client-side precondition violations become
 * {@link PayloadError}, and malformed response bodies {@link SerializationError}.
 */

/**
 * Error codes for Deta errors.
 */
export enum DetaErrorCode {
  // Configuration errors
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',

  // HTTP errors
  BAD_REQUEST = 'BAD_REQUEST',
  UNAUTHORIZED = 'UNAUTHORIZED',
  NOT_FOUND = 'NOT_FOUND',
  CONFLICT = 'CONFLICT',
  PAYLOAD_TOO_LARGE = 'PAYLOAD_TOO_LARGE',
  HTTP_ERROR = 'HTTP_ERROR',

  // Network errors
  TRANSPORT_ERROR = 'TRANSPORT_ERROR',
  TIMEOUT = 'TIMEOUT',

  // Client-side errors
  PAYLOAD_ERROR = 'PAYLOAD_ERROR',
  SERIALIZATION_ERROR = 'SERIALIZATION_ERROR',
}

/**
 * Error body returned by the Deta API on failed requests.
 */
export interface DetaApiErrorResponse {
  errors?: string[];
}

/**
 * Base Deta error class.
 */
export class DetaError extends Error {
  /** Error code */
  readonly code: DetaErrorCode;
  /** HTTP status code (if applicable) */
  readonly statusCode?: number;
  /** Whether retrying the same request may succeed */
  readonly retryable: boolean;
  /** Additional error details */
  readonly details?: Record<string, unknown>;

  constructor(options: {
    code: DetaErrorCode;
    message: string;
    statusCode?: number;
    retryable?: boolean;
    details?: Record<string, unknown>;
    cause?: unknown;
  }) {
    super(options.message, { cause: options.cause });
    this.name = 'DetaError';
    this.code = options.code;
    this.statusCode = options.statusCode;
    this.retryable = options.retryable ?? false;
    this.details = options.details;
  }

  /**
   * Creates a JSON representation of the error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      retryable: this.retryable,
      details: this.details,
    };
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * Invalid or missing client configuration.
 */
export class ConfigurationError extends DetaError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: DetaErrorCode.CONFIGURATION_ERROR,
      message: `Configuration error: ${message}`,
      retryable: false,
      details,
    });
    this.name = 'ConfigurationError';
  }
}

// ============================================================================
// HTTP Errors
// ============================================================================

/**
 * 400 Bad Request.
 */
export class BadRequestError extends DetaError {
  constructor(message: string = 'Bad request', details?: Record<string, unknown>) {
    super({
      code: DetaErrorCode.BAD_REQUEST,
      message,
      statusCode: 400,
      retryable: false,
      details,
    });
    this.name = 'BadRequestError';
  }
}

/**
 * 401 Unauthorized. The project key was rejected.
 */
export class UnauthorizedError extends DetaError {
  constructor(message: string = 'Unauthorized', details?: Record<string, unknown>) {
    super({
      code: DetaErrorCode.UNAUTHORIZED,
      message,
      statusCode: 401,
      retryable: false,
      details,
    });
    this.name = 'UnauthorizedError';
  }
}

/**
 * 404 Not Found.
 */
export class NotFoundError extends DetaError {
  constructor(message: string = 'Not found', details?: Record<string, unknown>) {
    super({
      code: DetaErrorCode.NOT_FOUND,
      message,
      statusCode: 404,
      retryable: false,
      details,
    });
    this.name = 'NotFoundError';
  }
}

/**
 * 409 Conflict, e.g. inserting a key that already exists.
 */
export class ConflictError extends DetaError {
  constructor(message: string = 'Conflict', details?: Record<string, unknown>) {
    super({
      code: DetaErrorCode.CONFLICT,
      message,
      statusCode: 409,
      retryable: false,
      details,
    });
    this.name = 'ConflictError';
  }
}

/**
 * 413 Payload Too Large.
 */
export class PayloadTooLargeError extends DetaError {
  constructor(message: string = 'Payload too large', details?: Record<string, unknown>) {
    super({
      code: DetaErrorCode.PAYLOAD_TOO_LARGE,
      message,
      statusCode: 413,
      retryable: false,
      details,
    });
    this.name = 'PayloadTooLargeError';
  }
}

/**
 * Any other non-2xx response.
 */
export class HttpError extends DetaError {
  /** HTTP status code */
  readonly status: number;

  constructor(status: number, message: string, details?: Record<string, unknown>) {
    super({
      code: DetaErrorCode.HTTP_ERROR,
      message: `HTTP error: ${status} ${message}`.trim(),
      statusCode: status,
      retryable: status === 429 || status >= 500,
      details,
    });
    this.name = 'HttpError';
    this.status = status;
  }
}

// ============================================================================
// Network Errors (Retryable)
// ============================================================================

/**
 * Connection-level failure: DNS, TLS, reset connection.
 */
export class TransportError extends DetaError {
  constructor(message: string, cause?: unknown, code: DetaErrorCode = DetaErrorCode.TRANSPORT_ERROR) {
    super({
      code,
      message: `Transport error: ${message}`,
      retryable: true,
      cause,
    });
    this.name = 'TransportError';
  }
}

/**
 * The request did not complete within the configured timeout.
 */
export class TimeoutError extends TransportError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`request timed out after ${timeoutMs}ms`, undefined, DetaErrorCode.TIMEOUT);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

// ============================================================================
// Client-Side Errors (Non-Retryable)
// ============================================================================

/**
 * A client-side precondition was violated. Raised before any request is sent.
 */
export class PayloadError extends DetaError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: DetaErrorCode.PAYLOAD_ERROR,
      message,
      retryable: false,
      details,
    });
    this.name = 'PayloadError';
  }
}

/**
 * A response body could not be decoded or did not have the expected shape.
 */
export class SerializationError extends DetaError {
  constructor(message: string, cause?: unknown, details?: Record<string, unknown>) {
    super({
      code: DetaErrorCode.SERIALIZATION_ERROR,
      message: `Serialization error: ${message}`,
      retryable: false,
      details,
      cause,
    });
    this.name = 'SerializationError';
  }
}

// ============================================================================
// Error Mapping
// ============================================================================

/**
 * Maps a non-2xx response to the matching error class.
 *
 * @param status - HTTP status code
 * @param statusText - HTTP status text
 * @param body - Parsed error body, when the server sent one
 */
export function mapHttpError(
  status: number,
  statusText: string,
  body?: DetaApiErrorResponse | null
): DetaError {
  const serverErrors = body?.errors ?? [];
  const details = serverErrors.length > 0 ? { errors: serverErrors } : undefined;
  const message = serverErrors.length > 0 ? serverErrors.join('; ') : statusText;

  switch (status) {
    case 400:
      return new BadRequestError(message || undefined, details);
    case 401:
      return new UnauthorizedError(message || undefined, details);
    case 404:
      return new NotFoundError(message || undefined, details);
    case 409:
      return new ConflictError(message || undefined, details);
    case 413:
      return new PayloadTooLargeError(message || undefined, details);
    default:
      return new HttpError(status, message, details);
  }
}

/**
 * Type guard for Deta errors.
 */
export function isDetaError(error: unknown): error is DetaError {
  return error instanceof DetaError;
}

/**
 * Checks whether an error is worth retrying.
 */
export function isRetryableError(error: unknown): boolean {
  return error instanceof DetaError && error.retryable;
}
