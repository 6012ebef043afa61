/**
 * @fileoverview Endpoint base class and per-class method compilation.
 *
 * An endpoint is a class whose prototype methods are named after HTTP methods
 * (`get`, `post`, ...). One instance serves one request. Callbacks build the
 * response through the instance's response methods and must emit exactly one
 * response.
 *
 * @example
 * ```typescript
 * class Upsidedown extends Endpoint {
 *   static methods: MethodDeclarations = {
 *     get: { sources: [body(json({ token: 'string' }))] },
 *   };
 *
 *   get(data: { token: string }) {
 *     this.sendJson({ result: [...data.token].reverse().join('') });
 *   }
 * }
 * ```
 */

import { MediaTypes } from './content-type.js';
import type { DataFormat } from './data.js';
import { ConfigurationError, DoubleResponseError, type ErrorInfo } from './errors.js';
import type { ServerRequest } from './request.js';
import type { AnySource } from './sources.js';
import { METHOD_NAMES, METHODS, type HeaderList, type Method, type MethodName, type ServerResponse } from './types.js';

/** Declaration attached to one callback. */
export interface MethodDeclaration {
  /** Argument sources, outermost first. */
  readonly sources?: readonly AnySource[];
  /** Response format. Documentation only; responses are not checked against it. */
  readonly output?: DataFormat<unknown>;
  /** Errors the callback may raise, for documentation. */
  readonly errors?: readonly ErrorInfo[];
  readonly summary?: string;
  readonly description?: string;
}

/** Per-method declarations, keyed by callback name. */
export type MethodDeclarations = Partial<Record<MethodName, MethodDeclaration>>;

/** Options for body-emitting response methods. */
export interface SendOptions {
  /** Response status (default: 200). */
  status?: number;
}

/** Options for `sendBody`. */
export interface SendBodyOptions extends SendOptions {
  /** `Content-Type` header value. */
  contentType?: string;
}

const encoder = new TextEncoder();

function chunksOf(body: string | Uint8Array | Iterable<Uint8Array>): Uint8Array[] {
  if (typeof body === 'string') return [encoder.encode(body)];
  if (body instanceof Uint8Array) return [body];
  return [...body];
}

function isHeaderList(headers: Record<string, string> | HeaderList): headers is HeaderList {
  return Array.isArray(headers);
}

function byteLength(chunks: readonly Uint8Array[]): number {
  return chunks.reduce((total, chunk) => total + chunk.length, 0);
}

/** Builds a response with `Content-Type` and `Content-Length` appended. */
function buildResponse(
  status: number,
  headers: HeaderList,
  chunks: readonly Uint8Array[],
  contentType: string | undefined
): ServerResponse {
  const list = headers.map(([name, value]): [string, string] => [name, value]);
  const length = byteLength(chunks);
  if (contentType !== undefined) {
    list.push(['Content-Type', contentType]);
  }
  if (length > 0) {
    list.push(['Content-Length', String(length)]);
  }
  return { status, headers: list, body: length > 0 ? chunks : [] };
}

/**
 * Converts an `ErrorInfo` into a response.
 *
 * Of the headers the handler had added, only those the error names in
 * `inheritedHeaders` are kept.
 */
export function renderError(error: ErrorInfo, pending: HeaderList = []): ServerResponse {
  const inherited = new Set(error.inheritedHeaders.map((name) => name.toLowerCase()));
  const kept = pending.filter(([name]) => inherited.has(name.toLowerCase()));
  const body = error.body();
  return buildResponse(
    error.status,
    [...kept, ...error.headers()],
    body.length > 0 ? [body] : [],
    error.contentType
  );
}

/**
 * Base class for endpoints.
 *
 * Subclasses add callbacks named after lower-case HTTP methods and may
 * override `setup` to receive the route's parcel.
 */
export abstract class Endpoint {
  /** Per-method declarations. */
  static methods?: MethodDeclarations;

  readonly request: ServerRequest;
  /** Captured flexible path segments, in route order. */
  readonly flexibleSegments: readonly string[];

  private readonly pendingHeaders: [string, string][] = [];
  private emitted: ServerResponse | undefined;
  private repeated = false;

  constructor(request: ServerRequest, flexibleSegments: readonly string[]) {
    this.request = request;
    this.flexibleSegments = flexibleSegments;
  }

  /**
   * Receives the route's parcel. Runs once, before the callback.
   *
   * The number of declared parameters must equal the parcel length.
   */
  setup(...parcel: unknown[]): void | Promise<void> {}

  /** The emitted response, if any. */
  get response(): ServerResponse | undefined {
    return this.emitted;
  }

  /** True if the callback tried to emit more than one response. */
  get emittedTwice(): boolean {
    return this.repeated;
  }

  /** Headers added so far. */
  get headers(): HeaderList {
    return this.pendingHeaders;
  }

  /**
   * Adds a response header. Parameters are appended as `; key=value`.
   *
   * @example
   * ```typescript
   * this.addHeader('Content-Disposition', 'attachment', { filename: 'a.txt' });
   * // Content-Disposition: attachment; filename=a.txt
   * ```
   */
  addHeader(name: string, value: string, params: Record<string, string | number> = {}): this {
    let full = value;
    for (const [key, param] of Object.entries(params)) {
      full += `; ${key}=${param}`;
    }
    this.pendingHeaders.push([name, full]);
    return this;
  }

  /** Adds several headers. */
  addHeaders(headers: Record<string, string> | HeaderList): this {
    const entries = isHeaderList(headers) ? headers : Object.entries(headers);
    for (const [name, value] of entries) {
      this.pendingHeaders.push([name, value]);
    }
    return this;
  }

  /** Emits a bodiless response. */
  sendStatus(status: number = 200): void {
    this.emit(buildResponse(status, this.pendingHeaders, [], undefined));
  }

  /** Emits a body. `Content-Length` is added for non-empty bodies. */
  sendBody(body: string | Uint8Array | Iterable<Uint8Array>, options: SendBodyOptions = {}): void {
    this.emit(buildResponse(options.status ?? 200, this.pendingHeaders, chunksOf(body), options.contentType));
  }

  /** Emits `JSON.stringify(value)` as `application/json; charset=utf-8`. */
  sendJson(value: unknown, options: SendOptions = {}): void {
    this.sendBody(JSON.stringify(value), {
      status: options.status,
      contentType: `${MediaTypes.json}; charset=utf-8`,
    });
  }

  /** Emits a value serialized by a data format. */
  sendData<T>(format: DataFormat<T>, value: T, options: SendOptions = {}): void {
    const contentType =
      format.kind === 'binary' ? format.mediaType : `${format.mediaType}; charset=utf-8`;
    this.sendBody(format.serialize(value), { status: options.status, contentType });
  }

  /** Emits an error response, keeping the headers the error inherits. */
  sendError(error: ErrorInfo): void {
    this.emit(renderError(error, this.pendingHeaders));
  }

  private emit(response: ServerResponse): void {
    if (this.emitted) {
      this.repeated = true;
      throw new DoubleResponseError();
    }
    this.emitted = response;
  }
}

/** A concrete endpoint class. */
export interface EndpointClass {
  new (request: ServerRequest, flexibleSegments: readonly string[]): Endpoint;
  readonly prototype: Endpoint;
  readonly name: string;
  readonly methods?: MethodDeclarations;
}

/** One resolved callback. */
export interface CompiledMethod {
  /** Method the callback serves. */
  readonly method: Method;
  readonly callback: Function;
  readonly sources: readonly AnySource[];
  readonly declaration: MethodDeclaration;
}

/** Method table of an endpoint class. */
export interface CompiledEndpoint {
  readonly endpoint: EndpointClass;
  readonly methods: ReadonlyMap<Method, CompiledMethod>;
  /** Methods for the `Allow` header: exactly those with a callback. */
  readonly allowed: readonly Method[];
}

const compiled = new WeakMap<EndpointClass, CompiledEndpoint>();

const METHOD_BY_NAME = new Map<string, Method>(METHODS.map((method) => [METHOD_NAMES[method], method]));

/**
 * Builds the method table of an endpoint class. Cached per class.
 *
 * @throws ConfigurationError if a declaration names an unknown method or a
 *   method without a callback.
 */
export function compileEndpoint(endpoint: EndpointClass): CompiledEndpoint {
  const cached = compiled.get(endpoint);
  if (cached) return cached;

  const declarations: MethodDeclarations = endpoint.methods ?? {};
  for (const name of Object.keys(declarations)) {
    const method = METHOD_BY_NAME.get(name);
    if (!method) {
      throw new ConfigurationError(`${endpoint.name} declares unknown method '${name}'`);
    }
    if (typeof Reflect.get(endpoint.prototype, name) !== 'function') {
      throw new ConfigurationError(`${endpoint.name} declares '${name}' but has no ${name}() callback`);
    }
  }

  const methods = new Map<Method, CompiledMethod>();
  for (const method of METHODS) {
    const name = METHOD_NAMES[method];
    const callback: unknown = Reflect.get(endpoint.prototype, name);
    if (typeof callback === 'function') {
      const declaration = declarations[name] ?? {};
      methods.set(method, { method, callback, sources: declaration.sources ?? [], declaration });
    }
  }

  const result: CompiledEndpoint = {
    endpoint,
    methods,
    allowed: METHODS.filter((method) => methods.has(method)),
  };
  compiled.set(endpoint, result);
  return result;
}
