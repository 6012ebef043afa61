/**
 * @fileoverview Error types.
 *
 * Two families live here:
 *
 * - `ErrorInfo` and its subclasses describe a non-2xx response. Handler code
 *   throws them (or passes them to `sendError`) to end a request early with a
 *   specific status, header list and body.
 * - Plain `Error` subclasses (`ValidationFailedError`, `ConfigurationError`,
 *   `DoubleResponseError`, ...) signal faults the dispatcher converts itself.
 *
 * @example
 * ```typescript
 * class Teapot extends ErrorInfo {
 *   constructor() {
 *     super("I'm a teapot", { status: 418 });
 *   }
 * }
 *
 * class Brew extends Endpoint {
 *   get() {
 *     throw new Teapot();
 *   }
 * }
 * ```
 */

import type { HeaderList, Method } from './types.js';

const encoder = new TextEncoder();

/** Options accepted by every `ErrorInfo`. */
export interface ErrorInfoOptions {
  /** Response status (default: 400). */
  status?: number;
  /** Extra response headers. */
  headers?: HeaderList;
  /** Response body. Defaults to the error message. */
  body?: string | Uint8Array;
  /** Body media type (default: `text/plain; charset=utf-8`, none when the body is empty). */
  contentType?: string;
  /**
   * Names of headers the handler added before failing that should survive into
   * the error response. Matched case-insensitively.
   */
  inheritedHeaders?: readonly string[];
  cause?: unknown;
}

/**
 * A structured, client-visible error response.
 */
export class ErrorInfo extends Error {
  readonly status: number;
  readonly inheritedHeaders: readonly string[];
  private readonly extraHeaders: HeaderList;
  private readonly payload: Uint8Array;
  private readonly mediaType: string | undefined;

  constructor(message: string = 'Bad Request', options: ErrorInfoOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ErrorInfo';
    this.status = options.status ?? 400;
    this.inheritedHeaders = options.inheritedHeaders ?? [];
    this.extraHeaders = options.headers ?? [];
    const body = options.body ?? message;
    this.payload = typeof body === 'string' ? encoder.encode(body) : body;
    this.mediaType =
      this.payload.length > 0 ? (options.contentType ?? 'text/plain; charset=utf-8') : undefined;
  }

  /** Media type of `body()`, if any. */
  get contentType(): string | undefined {
    return this.mediaType;
  }

  /** Headers emitted with the error, before `Content-Type` and `Content-Length`. */
  headers(): HeaderList {
    return this.extraHeaders;
  }

  /** Body bytes. */
  body(): Uint8Array {
    return this.payload;
  }
}

/** Options for `ApiErrorInfo`. */
export interface ApiErrorOptions extends Omit<ErrorInfoOptions, 'body' | 'contentType'> {
  /** Application-level error code. */
  code: number | string;
  /** Message aimed at the client's developers. */
  developerMessage?: string;
  /** Message that may be shown to end users. */
  userMessage?: string;
  /** Extra detail, e.g. a documentation link. */
  info?: string;
}

/**
 * An error whose body is a JSON document:
 * `{"code", "developerMessage", "userMessage", "info"}`.
 */
export class ApiErrorInfo extends ErrorInfo {
  readonly code: number | string;

  constructor(options: ApiErrorOptions) {
    const document = {
      code: options.code,
      developerMessage: options.developerMessage ?? '',
      userMessage: options.userMessage ?? '',
      info: options.info ?? '',
    };
    super(options.developerMessage ?? `API error ${options.code}`, {
      ...options,
      body: JSON.stringify(document),
      contentType: 'application/json; charset=utf-8',
    });
    this.name = 'ApiErrorInfo';
    this.code = options.code;
  }
}

// =============================================================================
// Built-in responses
// =============================================================================

/** No route matches the request path. */
export class RoutingError extends ErrorInfo {
  constructor(message: string = 'Not Found') {
    super(message, { status: 404 });
    this.name = 'RoutingError';
  }
}

/** The endpoint has no callback for the request method. */
export class MethodNotSupportedError extends ErrorInfo {
  readonly allowed: readonly Method[];

  constructor(allowed: readonly Method[]) {
    super('Method Not Allowed', { status: 405, headers: [['Allow', allowed.join(', ')]] });
    this.name = 'MethodNotSupportedError';
    this.allowed = allowed;
  }
}

/** Generic 400 response. */
export class BadRequestError extends ErrorInfo {
  constructor(message: string = 'Bad Request', options: ErrorInfoOptions = {}) {
    super(message, { ...options, status: 400 });
    this.name = 'BadRequestError';
  }
}

/** A required request header is missing. */
export class HeaderNotFoundError extends ErrorInfo {
  constructor(header: string, options: ErrorInfoOptions = {}) {
    super(`Missing header: ${header}`, { ...options, status: 400 });
    this.name = 'HeaderNotFoundError';
  }
}

/** A required query parameter is missing. */
export class QueryNotFoundError extends ErrorInfo {
  constructor(parameter: string, options: ErrorInfoOptions = {}) {
    super(`Missing query parameter: ${parameter}`, { ...options, status: 400 });
    this.name = 'QueryNotFoundError';
  }
}

/** A header or query parameter expected once occurred several times. */
export class NotUniqueError extends ErrorInfo {
  constructor(key: string, options: ErrorInfoOptions = {}) {
    super(`Expected a single value for: ${key}`, { ...options, status: 400 });
    this.name = 'NotUniqueError';
  }
}

/** The request body is not in the expected format. */
export class UnsupportedMediaTypeError extends ErrorInfo {
  constructor(message: string = 'Unsupported Media Type', options: ErrorInfoOptions = {}) {
    super(message, { ...options, status: 415 });
    this.name = 'UnsupportedMediaTypeError';
  }
}

/** The client address is not on a callback's allow list. */
export class ClientNotAllowedError extends ErrorInfo {
  constructor(message: string = 'Forbidden', options: ErrorInfoOptions = {}) {
    super(message, { ...options, status: 403 });
    this.name = 'ClientNotAllowedError';
  }
}

/** The request body exceeds the configured limit. */
export class PayloadTooLargeError extends ErrorInfo {
  constructor(limit: number) {
    super(`Payload exceeds ${limit} bytes`, { status: 413 });
    this.name = 'PayloadTooLargeError';
  }
}

/** Generic 500 response. The body is always empty. */
export class InternalServerError extends ErrorInfo {
  constructor() {
    super('Internal Server Error', { status: 500, body: '' });
    this.name = 'InternalServerError';
  }
}

// =============================================================================
// Faults
// =============================================================================

/**
 * Structured data failed validation.
 *
 * `fieldErrors` maps a dotted field path (`address.city`, `tags[1]`) to its
 * messages. It is empty when the failure is not tied to a field, for example
 * a wrong media type.
 */
export class ValidationFailedError extends Error {
  readonly fieldErrors: Readonly<Record<string, readonly string[]>>;

  constructor(message: string, fieldErrors: Record<string, string[]> = {}) {
    super(message);
    this.name = 'ValidationFailedError';
    this.fieldErrors = fieldErrors;
  }
}

/** The application was assembled incorrectly. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** Two routes with the same segment sequence. */
export class RouteConflictError extends ConfigurationError {
  constructor(route: string) {
    super(`Route already registered: ${route}`);
    this.name = 'RouteConflictError';
  }
}

/** A handler emitted a second response. */
export class DoubleResponseError extends Error {
  constructor() {
    super('Response already emitted');
    this.name = 'DoubleResponseError';
  }
}

/** A callback returned without emitting a response. */
export class MissingResponseError extends Error {
  constructor(method: Method, route: string) {
    super(`${method} ${route} returned without emitting a response`);
    this.name = 'MissingResponseError';
  }
}
