/**
 * @fileoverview Request dispatcher.
 *
 * Each request moves through these steps:
 *
 * 1. Resolving: the router maps the path to an endpoint class (404 if none).
 * 2. Instantiated: a fresh endpoint instance runs `setup` with the parcel.
 * 3. Method lookup: the method picks a callback (405 with `Allow` if none).
 * 4. Invoking: sources extract their arguments, then the callback runs.
 * 5. Responded: the single emitted response is returned.
 *
 * A thrown `ErrorInfo` at any step becomes its own response. Anything else,
 * including configuration faults and double or missing responses, is logged
 * and answered with an empty 500. `handle` never rejects.
 */

import {
  ConfigurationError,
  DoubleResponseError,
  ErrorInfo,
  InternalServerError,
  MethodNotSupportedError,
  MissingResponseError,
  RoutingError,
} from './errors.js';
import { compileEndpoint, renderError, type CompiledEndpoint, type Endpoint, type EndpointClass } from './endpoint.js';
import { runMiddleware, type Middleware } from './middleware.js';
import {
  fromFetchRequest,
  toFetchResponse,
  type FetchBridgeOptions,
  type ServerRequest,
} from './request.js';
import { formatRoute, type Router } from './router.js';
import { collectArguments } from './sources.js';
import { normalizeMethod, type ClientAddress, type FetchHandler, type ServerResponse } from './types.js';

/** Dispatcher configuration. */
export interface DispatcherOptions {
  /** Middleware wrapping every dispatch, outermost first. */
  middleware?: readonly Middleware[];
  /** Receives unexpected errors (default: `console.error`). */
  log?: (error: Error, request: ServerRequest) => void;
  /** Path prefix stripped by `handler()`. */
  basePath?: string;
  /** Body limit used by `handler()`, in bytes (default: 1 MiB). */
  maxBodySize?: number;
}

function describeRequest(request: ServerRequest): string {
  return `${request.method} /${request.path.join('/')}`;
}

function defaultLog(error: Error, request: ServerRequest): void {
  console.error(`Error in ${describeRequest(request)}:`, error);
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Dispatches normalized requests to endpoints.
 *
 * Every endpoint class is compiled and the router frozen on construction, so
 * configuration mistakes in declarations surface before serving.
 *
 * @example
 * ```typescript
 * const router = new Router<EndpointClass>().register('/upsidedown', Upsidedown);
 * const dispatcher = new Dispatcher(router, { middleware: [logger()] });
 *
 * export default { fetch: dispatcher.handler() };
 * ```
 */
export class Dispatcher {
  readonly router: Router<EndpointClass>;
  private readonly compiled = new Map<EndpointClass, CompiledEndpoint>();
  private readonly middleware: readonly Middleware[];
  private readonly log: (error: Error, request: ServerRequest) => void;
  private readonly basePath: string | undefined;
  private readonly maxBodySize: number | undefined;

  constructor(router: Router<EndpointClass>, options: DispatcherOptions = {}) {
    this.router = router;
    this.middleware = options.middleware ?? [];
    this.log = options.log ?? defaultLog;
    this.basePath = options.basePath;
    this.maxBodySize = options.maxBodySize;

    for (const entry of router.entries()) {
      if (!this.compiled.has(entry.target)) {
        this.compiled.set(entry.target, compileEndpoint(entry.target));
      }
    }
    router.freeze();
  }

  /** Compiled method table of a registered endpoint class. */
  endpoint(target: EndpointClass): CompiledEndpoint {
    return this.compiled.get(target) ?? compileEndpoint(target);
  }

  /** Handles one request. Always resolves to a response. */
  async handle(request: ServerRequest): Promise<ServerResponse> {
    let response: ServerResponse;
    try {
      response = await runMiddleware(this.middleware, { request }, () => this.dispatch(request));
    } catch (error) {
      response = this.fail(error, request);
    }

    if (normalizeMethod(request.method) === 'HEAD' && response.body.length > 0) {
      return { ...response, body: [] };
    }
    return response;
  }

  /**
   * Creates a fetch handler. Options override the dispatcher's `basePath` and
   * `maxBodySize`.
   */
  handler(options: FetchBridgeOptions = {}): FetchHandler {
    return (request) => this.handleFetch(request, undefined, options);
  }

  /**
   * Handles one fetch request. `client` is the peer address where the runtime
   * exposes it. Options override the dispatcher's as in `handler()`.
   */
  async handleFetch(request: Request, client?: ClientAddress, options: FetchBridgeOptions = {}): Promise<Response> {
    const serverRequest = fromFetchRequest(
      request,
      {
        basePath: options.basePath ?? this.basePath,
        maxBodySize: options.maxBodySize ?? this.maxBodySize,
      },
      client
    );
    return toFetchResponse(await this.handle(serverRequest));
  }

  private async dispatch(request: ServerRequest): Promise<ServerResponse> {
    let endpoint: Endpoint | undefined;
    try {
      const match = this.router.resolve(request.path);
      if (!match) {
        throw new RoutingError();
      }
      const compiled = this.endpoint(match.target);
      const route = formatRoute(match.route.segments);

      endpoint = new match.target(request, match.flexibleSegments);
      if (endpoint.setup.length !== match.parcel.length) {
        throw new ConfigurationError(
          `${match.target.name}.setup() takes ${endpoint.setup.length} argument(s), ` +
            `route ${route} provides ${match.parcel.length}`
        );
      }
      await endpoint.setup(...match.parcel);

      const method = normalizeMethod(request.method);
      const entry = method === undefined ? undefined : compiled.methods.get(method);
      if (!method || !entry) {
        throw new MethodNotSupportedError(compiled.allowed);
      }

      const args = await collectArguments(entry.sources, request);
      const result: unknown = Reflect.apply(entry.callback, endpoint, [
        ...match.flexibleSegments,
        ...args,
      ]);
      await result;

      if (endpoint.emittedTwice) {
        throw new DoubleResponseError();
      }
      const response = endpoint.response;
      if (!response) {
        throw new MissingResponseError(method, route);
      }
      return response;
    } catch (error) {
      if (endpoint?.emittedTwice) {
        return this.fail(error instanceof DoubleResponseError ? error : new DoubleResponseError(), request);
      }
      return this.fail(error, request, endpoint);
    }
  }

  private fail(error: unknown, request: ServerRequest, endpoint?: Endpoint): ServerResponse {
    if (error instanceof ErrorInfo) {
      return renderError(error, endpoint?.headers);
    }
    this.log(toError(error), request);
    return renderError(new InternalServerError());
  }
}
