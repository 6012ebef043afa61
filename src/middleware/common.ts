/**
 * @fileoverview Common middleware: error handling, logging and request IDs.
 */

import { ErrorInfo, InternalServerError } from '../errors.js';
import { renderError } from '../endpoint.js';
import type { Middleware, MiddlewareContext } from '../middleware.js';
import type { ServerResponse } from '../types.js';

function requestUrl(context: MiddlewareContext): string {
  const { request } = context;
  const search = new URLSearchParams([...request.query.entries()]).toString();
  return `/${request.path.join('/')}${search ? `?${search}` : ''}`;
}

// =============================================================================
// Error Handler
// =============================================================================

/** Error handler middleware configuration. */
export interface ErrorHandlerOptions {
  /** Custom error logger. */
  log?: (error: Error, context: MiddlewareContext) => void | Promise<void>;
  /** Custom error response formatter. */
  formatter?: (error: Error, context: MiddlewareContext) => ServerResponse | Promise<ServerResponse>;
}

/**
 * Catches errors thrown by later middleware.
 *
 * The dispatcher converts errors raised by endpoints itself; this covers
 * middleware placed after it in the chain. An `ErrorInfo` becomes its own
 * response. Other errors are logged and become an empty 500, unless a
 * `formatter` is given.
 *
 * @example
 * ```typescript
 * new Dispatcher(router, { middleware: [errorHandler(), authenticate] });
 * ```
 */
export function errorHandler(options: ErrorHandlerOptions = {}): Middleware {
  return async (context, next) => {
    try {
      return await next();
    } catch (error) {
      if (error instanceof ErrorInfo) {
        return renderError(error);
      }
      const err = error instanceof Error ? error : new Error(String(error));

      if (options.log) {
        await options.log(err, context);
      } else {
        console.error(`Error in ${context.request.method} ${requestUrl(context)}:`, err);
      }

      if (options.formatter) {
        return await options.formatter(err, context);
      }
      return renderError(new InternalServerError());
    }
  };
}

// =============================================================================
// Logger
// =============================================================================

/** Logger middleware configuration. */
export interface LoggerOptions {
  /** Custom logger function. */
  log?: (message: string) => void;
  /** Include request headers in log. */
  includeHeaders?: boolean;
  /** Custom log formatter. */
  formatter?: (info: LogInfo) => string;
}

/** Information logged for each request. */
export interface LogInfo {
  method: string;
  url: string;
  status: number;
  duration: number;
  headers?: Record<string, string>;
  error?: Error;
}

/**
 * Creates a request/response logging middleware.
 *
 * Logs `→ GET /path?query` on arrival and `← 200 (3ms)` on completion.
 *
 * @example
 * ```typescript
 * new Dispatcher(router, { middleware: [logger({ includeHeaders: true })] });
 * ```
 */
export function logger(options: LoggerOptions = {}): Middleware {
  const log = options.log || console.log;

  return async (context, next) => {
    const start = Date.now();

    const info: LogInfo = {
      method: context.request.method,
      url: requestUrl(context),
      status: 0,
      duration: 0,
    };

    if (options.includeHeaders) {
      info.headers = context.request.headers.toRecord();
    }

    const requestMessage = options.formatter
      ? options.formatter({ ...info, status: 0, duration: 0 })
      : `→ ${info.method} ${info.url}`;
    log(requestMessage);

    try {
      const response = await next();

      info.status = response.status;
      info.duration = Date.now() - start;

      const responseMessage = options.formatter
        ? options.formatter(info)
        : `← ${info.status} (${info.duration}ms)`;
      log(responseMessage);

      return response;
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      info.status = 500;
      info.duration = Date.now() - start;
      info.error = err;

      const errorMessage = options.formatter
        ? options.formatter(info)
        : `✗ ${info.status} Error: ${err.message} (${info.duration}ms)`;
      log(errorMessage);

      throw error;
    }
  };
}

// =============================================================================
// Request ID
// =============================================================================

/** Request ID middleware configuration. */
export interface RequestIdOptions {
  /** Header name (default: X-Request-ID). */
  headerName?: string;
  /** Custom ID generator. */
  generator?: () => string;
}

/**
 * Reuses or assigns a request ID, exposes it as `context.requestId` and
 * echoes it on the response.
 *
 * @example
 * ```typescript
 * new Dispatcher(router, { middleware: [requestId({ headerName: 'X-Trace-ID' })] });
 * ```
 */
export function requestId(options: RequestIdOptions = {}): Middleware {
  const headerName = options.headerName || 'X-Request-ID';
  const generator = options.generator || (() => crypto.randomUUID());

  return async (context, next) => {
    const id = context.request.headers.get(headerName) || generator();
    context.requestId = id;

    const response = await next();

    const lower = headerName.toLowerCase();
    const headers = response.headers.filter(([name]) => name.toLowerCase() !== lower);
    return { ...response, headers: [...headers, [headerName, id]] };
  };
}
