/**
 * @fileoverview Normalized server request and the fetch bridge.
 *
 * `ServerRequest` is what the dispatcher consumes: a method, decoded path
 * segments, multi-valued header and query maps, and a lazily read body.
 * `createRequest` builds one directly (tests, custom transports);
 * `fromFetchRequest` and `toFetchResponse` translate from and to the
 * web-standard `Request` and `Response`.
 */

import { parseContentType, type ContentType } from './content-type.js';
import { PayloadTooLargeError } from './errors.js';
import type { ClientAddress, ServerResponse } from './types.js';

/** Default body limit: 1 MiB. */
export const DEFAULT_MAX_BODY_SIZE = 1024 * 1024;

/** Multi-valued string map with normalized keys. */
export class ParamMap {
  private readonly values = new Map<string, string[]>();

  constructor(
    entries: Iterable<readonly [string, string]> = [],
    private readonly normalize: (key: string) => string = (key) => key
  ) {
    for (const [key, value] of entries) {
      this.append(key, value);
    }
  }

  private append(key: string, value: string): void {
    const normalized = this.normalize(key);
    const existing = this.values.get(normalized);
    if (existing) {
      existing.push(value);
    } else {
      this.values.set(normalized, [value]);
    }
  }

  /** First value for a key. */
  get(key: string): string | undefined {
    return this.values.get(this.normalize(key))?.[0];
  }

  /** Every value for a key, in arrival order. */
  getAll(key: string): readonly string[] {
    return this.values.get(this.normalize(key)) ?? [];
  }

  has(key: string): boolean {
    return this.values.has(this.normalize(key));
  }

  keys(): IterableIterator<string> {
    return this.values.keys();
  }

  *entries(): IterableIterator<[string, string]> {
    for (const [key, values] of this.values) {
      for (const value of values) {
        yield [key, value];
      }
    }
  }

  /** First value of every key. */
  toRecord(): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [key, values] of this.values) {
      record[key] = values[0];
    }
    return record;
  }
}

/** Lower-cases a header name and maps `_` to `-`. */
export function normalizeHeaderName(name: string): string {
  return name.toLowerCase().replaceAll('_', '-');
}

/** Header map. `X_Request_Id`, `x-request-id` and `X-Request-ID` are one key. */
export class HeaderMap extends ParamMap {
  constructor(entries: Iterable<readonly [string, string]> = []) {
    super(entries, normalizeHeaderName);
  }
}

/** Request body as accepted by `createRequest`. */
export type RequestBody =
  | string
  | Uint8Array
  | AsyncIterable<Uint8Array>
  | ReadableStream<Uint8Array>;

/** Normalized request consumed by the dispatcher. */
export interface ServerRequest {
  /** Method as received (not yet case-normalized). */
  readonly method: string;
  /** Percent-decoded path segments. The root path is `[]`. */
  readonly path: readonly string[];
  readonly headers: HeaderMap;
  readonly query: ParamMap;
  /** Declared `Content-Length`, if any. */
  readonly contentLength: number | undefined;
  readonly contentType: ContentType;
  /** Peer address, when the transport knows it. */
  readonly client: ClientAddress | undefined;
  /** Reads the whole body. Repeated calls return the same bytes. */
  body(): Promise<Uint8Array>;
}

/** Input for `createRequest`. */
export interface ServerRequestInit {
  method?: string;
  /** `/a/b?x=1` or pre-split segments. */
  path: string | readonly string[];
  /** Query parameters, merged after any query string in `path`. */
  query?: Record<string, string | readonly string[]> | Iterable<readonly [string, string]>;
  headers?: Record<string, string | readonly string[]> | Iterable<readonly [string, string]>;
  body?: RequestBody;
  /** Peer address, e.g. from `socket.remoteAddress` and `socket.remotePort`. */
  client?: ClientAddress;
  /** Body limit in bytes (default: 1 MiB). */
  maxBodySize?: number;
}

const encoder = new TextEncoder();

function isEntryIterable(
  value: Record<string, string | readonly string[]> | Iterable<readonly [string, string]>
): value is Iterable<readonly [string, string]> {
  return Symbol.iterator in value;
}

function toEntries(
  value: Record<string, string | readonly string[]> | Iterable<readonly [string, string]> | undefined
): [string, string][] {
  if (!value) return [];
  if (isEntryIterable(value)) {
    return Array.from(value, ([k, v]): [string, string] => [k, v]);
  }
  const entries: [string, string][] = [];
  for (const [key, item] of Object.entries(value)) {
    if (typeof item === 'string') {
      entries.push([key, item]);
    } else {
      for (const element of item) entries.push([key, element]);
    }
  }
  return entries;
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/**
 * Splits a URL path into percent-decoded segments.
 *
 * Leading and trailing slashes are ignored, so `/`, `` and `//` give `[]`
 * and `/users/` equals `/users`.
 */
export function splitPath(pathname: string): string[] {
  const trimmed = pathname.replace(/^\/+/, '').replace(/\/+$/, '');
  if (!trimmed) return [];
  return trimmed.split('/').map(decodeSegment);
}

/** Concatenates chunks into one new buffer. */
export function concatChunks(chunks: readonly Uint8Array[]) {
  let total = 0;
  for (const chunk of chunks) total += chunk.length;
  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}

function isReadableStream(body: RequestBody): body is ReadableStream<Uint8Array> {
  return typeof body === 'object' && 'getReader' in body;
}

async function* streamChunks(body: RequestBody): AsyncGenerator<Uint8Array> {
  if (typeof body === 'string') {
    yield encoder.encode(body);
  } else if (body instanceof Uint8Array) {
    yield body;
  } else if (isReadableStream(body)) {
    const reader = body.getReader();
    let finished = false;
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) {
          finished = true;
          break;
        }
        yield value;
      }
    } finally {
      if (!finished) await reader.cancel();
      reader.releaseLock();
    }
  } else {
    yield* body;
  }
}

/** Reads a body source, failing once more than `limit` bytes arrive. */
async function readBody(body: RequestBody | undefined, limit: number, declared?: number) {
  if (declared !== undefined && declared > limit) {
    throw new PayloadTooLargeError(limit);
  }
  if (body === undefined) return new Uint8Array(0);

  const chunks: Uint8Array[] = [];
  let total = 0;
  for await (const chunk of streamChunks(body)) {
    total += chunk.length;
    if (total > limit) {
      throw new PayloadTooLargeError(limit);
    }
    chunks.push(chunk);
  }
  return concatChunks(chunks);
}

function parseLength(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value.trim())) return undefined;
  return Number(value.trim());
}

function buildRequest(
  method: string,
  path: readonly string[],
  headers: HeaderMap,
  query: ParamMap,
  body: RequestBody | undefined,
  maxBodySize: number,
  client: ClientAddress | undefined
): ServerRequest {
  const contentLength = parseLength(headers.get('content-length'));
  let cached: Promise<Uint8Array> | undefined;

  return {
    method,
    path,
    headers,
    query,
    contentLength,
    contentType: parseContentType(headers.get('content-type')),
    client,
    body() {
      cached ??= readBody(body, maxBodySize, contentLength);
      return cached;
    },
  };
}

/**
 * Creates a request without a transport.
 *
 * `Content-Length` is filled in for string and byte bodies when not given.
 *
 * @example
 * ```typescript
 * const request = createRequest({
 *   method: 'GET',
 *   path: '/upsidedown',
 *   headers: { 'Content-Type': 'application/json' },
 *   body: '{"token":"abcdefg"}',
 * });
 * ```
 */
export function createRequest(init: ServerRequestInit): ServerRequest {
  let segments: readonly string[];
  const queryEntries: [string, string][] = [];

  if (typeof init.path === 'string') {
    const mark = init.path.indexOf('?');
    const pathname = mark === -1 ? init.path : init.path.slice(0, mark);
    segments = splitPath(pathname);
    if (mark !== -1) {
      queryEntries.push(...new URLSearchParams(init.path.slice(mark + 1)));
    }
  } else {
    segments = [...init.path];
  }
  queryEntries.push(...toEntries(init.query));

  const headers = new HeaderMap(toEntries(init.headers));
  const body = typeof init.body === 'string' ? encoder.encode(init.body) : init.body;
  const headerEntries = [...headers.entries()];
  if (body instanceof Uint8Array && !headers.has('content-length')) {
    headerEntries.push(['content-length', String(body.length)]);
  }

  return buildRequest(
    init.method ?? 'GET',
    segments,
    new HeaderMap(headerEntries),
    new ParamMap(queryEntries),
    body,
    init.maxBodySize ?? DEFAULT_MAX_BODY_SIZE,
    init.client
  );
}

/** Options for `fromFetchRequest`. */
export interface FetchBridgeOptions {
  /** Path prefix removed before routing, e.g. `/api`. */
  basePath?: string;
  /** Body limit in bytes (default: 1 MiB). */
  maxBodySize?: number;
}

/** Strips a base path. Returns `undefined` when the path is outside it. */
export function stripBasePath(pathname: string, basePath: string | undefined): string | undefined {
  const base = basePath?.replace(/\/+$/, '');
  if (!base) return pathname;
  if (pathname === base) return '/';
  if (pathname.startsWith(`${base}/`)) return pathname.slice(base.length);
  return undefined;
}

/**
 * Converts a fetch `Request`.
 *
 * Fetch joins repeated headers into one comma-separated value, so header
 * sources see a single value for them. A fetch `Request` carries no peer
 * address; runtimes that know it pass it as `client`.
 */
export function fromFetchRequest(
  request: Request,
  options: FetchBridgeOptions = {},
  client?: ClientAddress
): ServerRequest {
  const url = new URL(request.url);
  const pathname = stripBasePath(url.pathname, options.basePath) ?? url.pathname;
  const body = request.body ?? undefined;

  return buildRequest(
    request.method,
    splitPath(pathname),
    new HeaderMap(request.headers.entries()),
    new ParamMap(url.searchParams.entries()),
    body,
    options.maxBodySize ?? DEFAULT_MAX_BODY_SIZE,
    client
  );
}

const NULL_BODY_STATUSES = new Set([101, 204, 205, 304]);

/** Converts a dispatcher response to a fetch `Response`. */
export function toFetchResponse(response: ServerResponse): Response {
  const headers = new Headers();
  for (const [name, value] of response.headers) {
    headers.append(name, value);
  }
  const bytes = concatChunks(response.body);
  const body = bytes.length === 0 || NULL_BODY_STATUSES.has(response.status) ? null : bytes;
  return new Response(body, { status: response.status, headers });
}
