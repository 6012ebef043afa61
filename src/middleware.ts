/**
 * @fileoverview Core middleware types and utilities.
 *
 * Middleware wraps the whole dispatch of a request: routing, endpoint setup,
 * argument extraction and the callback. It sees the normalized request and the
 * finished response.
 *
 * @example Type-hinting context properties
 * ```typescript
 * interface AppContext {
 *   requestId: string;
 * }
 *
 * const tagResponse: Middleware<AppContext> = async (context, next) => {
 *   const response = await next();
 *   context.requestId; // typed as string | undefined
 *   return response;
 * };
 * ```
 */

import type { ServerRequest } from './request.js';
import type { ServerResponse } from './types.js';

/**
 * Base context properties always available to middleware.
 */
interface BaseMiddlewareContext {
  request: ServerRequest;
}

/**
 * Context passed to middleware functions.
 *
 * Properties from Ctx are optional since middleware builds them up.
 *
 * @typeParam Ctx - Context type including middleware-added properties
 */
export type MiddlewareContext<Ctx = {}> = BaseMiddlewareContext &
  Partial<Ctx> & {
    [key: string]: unknown;
  };

/**
 * Function to continue to the next middleware or the dispatcher.
 */
export type MiddlewareNext = () => Promise<ServerResponse>;

/**
 * Middleware function signature.
 *
 * @typeParam Ctx - Context type (default: {})
 *
 * @example
 * ```typescript
 * const poweredBy: Middleware = async (context, next) => {
 *   const response = await next();
 *   return { ...response, headers: [...response.headers, ['X-Powered-By', 'stemroute']] };
 * };
 * ```
 */
export type Middleware<Ctx = {}> = (
  context: MiddlewareContext<Ctx>,
  next: MiddlewareNext
) => Promise<ServerResponse> | ServerResponse;

/**
 * Runs a chain of middleware with a final handler.
 *
 * Middleware are executed in order. Each middleware receives the context and
 * a `next` function. Calling `next()` continues to the next middleware or the
 * final handler. Returning without calling `next()` short-circuits the chain.
 *
 * @param middleware - Array of middleware functions to run
 * @param context - The request context
 * @param finalHandler - Handler to call after all middleware complete
 * @returns The response from the middleware chain or final handler
 */
export async function runMiddleware(
  middleware: readonly Middleware[],
  context: MiddlewareContext,
  finalHandler: () => Promise<ServerResponse>
): Promise<ServerResponse> {
  let index = 0;

  const next: MiddlewareNext = async () => {
    if (index >= middleware.length) {
      return finalHandler();
    }

    const currentMiddleware = middleware[index++];
    return await currentMiddleware(context, next);
  };

  return next();
}

/**
 * Composes multiple middleware into a single middleware.
 *
 * Useful for grouping related middleware together.
 *
 * @example
 * ```typescript
 * const observability = compose(requestId(), logger());
 *
 * const dispatcher = new Dispatcher(router, { middleware: [observability] });
 * ```
 *
 * @param middleware - Middleware functions to compose
 * @returns A single middleware that runs all provided middleware in order
 */
export function compose(...middleware: Middleware[]): Middleware {
  return async (context, next) => {
    return runMiddleware(middleware, context, next);
  };
}
