/**
 * @fileoverview Argument sources.
 *
 * An argument source extracts one value from the request (a header, a query
 * parameter, or the validated body) and the dispatcher passes it to the
 * endpoint callback. Sources are declared per method, listed outermost first:
 * the source listed last sits closest to the callback and its value comes
 * first, right after the captured flexible segments.
 *
 * @example
 * ```typescript
 * class Timeline extends Endpoint {
 *   static methods = {
 *     get: {
 *       sources: [
 *         query('before', { absent: new QueryNotFoundError('before') }),
 *         query('after', { map: Number }),
 *       ],
 *     },
 *   } satisfies MethodDeclarations;
 *
 *   get(after: number | undefined, before: string) {
 *     // ...
 *   }
 * }
 * ```
 *
 * Extraction runs in listed order and stops at the first failure, so the
 * callback never runs when a source throws.
 */

import { isIP } from 'node:net';
import type { DataFormat } from './data.js';
import {
  ClientNotAllowedError,
  ConfigurationError,
  NotUniqueError,
  UnsupportedMediaTypeError,
  ValidationFailedError,
  type ErrorInfo,
} from './errors.js';
import type { ServerRequest } from './request.js';
import type { ClientAddress } from './types.js';

/** Extracts one callback argument from a request. */
export interface ArgumentSource<T> {
  readonly kind: 'header' | 'query' | 'body' | 'client';
  /** Header or query parameter name. */
  readonly key?: string;
  /** True when extraction fails without a value. */
  readonly required: boolean;
  /** True when every occurrence is injected as an array. */
  readonly many: boolean;
  /** Body format, for body sources. */
  readonly format?: DataFormat<unknown>;
  /** Errors extraction may raise. */
  readonly errors: readonly ErrorInfo[];
  readonly description?: string;
  extract(request: ServerRequest): Promise<T>;
}

/** Any argument source. */
export type AnySource = ArgumentSource<unknown>;

/** Options for `header()` and `query()`. */
export interface ValueSourceOptions {
  /** Raised when the key is absent. Without it an absent key injects `undefined` (or `[]`). */
  absent?: ErrorInfo;
  /** Raised when a scalar is wanted and the key occurs more than once. */
  notUnique?: ErrorInfo | true;
  /** Inject every occurrence as an array. */
  many?: boolean;
  /** Applied to each raw value before injection. */
  map?: (raw: string) => unknown;
  /** Shown in generated documentation. */
  description?: string;
}

/** Options for `header()` and `query()` apart from `map`. */
export type ValueSourceFlags = Omit<ValueSourceOptions, 'map'>;

/** Value type a header or query source injects, given its mapped type `V`. */
export type SourceValue<O, V = string> = O extends { many: true }
  ? V[]
  : O extends { absent: ErrorInfo }
    ? V
    : V | undefined;

function valueSource(
  kind: 'header' | 'query',
  key: string,
  options: ValueSourceOptions,
  lookup: (request: ServerRequest) => readonly string[]
): AnySource {
  const many = options.many ?? false;
  const notUnique =
    options.notUnique === true ? new NotUniqueError(key) : options.notUnique;
  const map = options.map ?? ((raw: string) => raw);
  const errors = [options.absent, many ? undefined : notUnique].filter(
    (error): error is ErrorInfo => error !== undefined
  );

  return {
    kind,
    key,
    required: options.absent !== undefined,
    many,
    errors,
    description: options.description,
    async extract(request) {
      const values = lookup(request);
      if (values.length === 0 && options.absent) {
        throw options.absent;
      }
      if (many) {
        return values.map(map);
      }
      if (values.length > 1 && notUnique) {
        throw notUnique;
      }
      return values.length === 0 ? undefined : map(values[0]);
    },
  };
}

/**
 * Injects a request header.
 *
 * Names are case-insensitive and `_` matches `-`.
 *
 * @example
 * ```typescript
 * header('Authorization', { absent: new HeaderNotFoundError('Authorization') }); // string
 * header('Accept-Language');                                                   // string | undefined
 * header('X-Forwarded-For', { many: true });                                     // string[]
 * ```
 */
export function header<V = string, const O extends ValueSourceFlags = {}>(
  name: string,
  options?: O & { map?: (raw: string) => V }
): ArgumentSource<SourceValue<O, V>> {
  const source = valueSource('header', name, options ?? {}, (request) =>
    request.headers.getAll(name)
  );
  return source as ArgumentSource<SourceValue<O, V>>;
}

/**
 * Injects a query parameter.
 *
 * @example
 * ```typescript
 * query('page', { map: Number });                              // number | undefined
 * query('q', { absent: new QueryNotFoundError('q'), notUnique: true }); // string
 * query('tag', { many: true });                                // string[]
 * ```
 */
export function query<V = string, const O extends ValueSourceFlags = {}>(
  name: string,
  options?: O & { map?: (raw: string) => V }
): ArgumentSource<SourceValue<O, V>> {
  const source = valueSource('query', name, options ?? {}, (request) => request.query.getAll(name));
  return source as ArgumentSource<SourceValue<O, V>>;
}

/** Options for `body()`. */
export interface BodySourceOptions {
  /** Raised instead of a validation failure (default: `UnsupportedMediaTypeError`, 415). */
  error?: ErrorInfo;
  description?: string;
}

/**
 * Injects the request body parsed by a data format.
 *
 * Validation failures become `options.error`. Other errors (such as an
 * oversized body) propagate unchanged.
 */
export function body<T>(format: DataFormat<T>, options: BodySourceOptions = {}): ArgumentSource<T> {
  return {
    kind: 'body',
    required: true,
    many: false,
    format,
    errors: [options.error ?? new UnsupportedMediaTypeError()],
    description: options.description,
    async extract(request) {
      const raw = await request.body();
      try {
        return format.parse(raw, request.contentType);
      } catch (error) {
        if (error instanceof ValidationFailedError) {
          throw options.error ?? new UnsupportedMediaTypeError(error.message, { cause: error });
        }
        throw error;
      }
    },
  };
}

// =============================================================================
// Client restriction
// =============================================================================

/** Options for `restrictClient()`. */
export interface RestrictClientOptions {
  /** Raised for clients off the list (default: `ClientNotAllowedError`, 403). */
  error?: ErrorInfo;
  description?: string;
}

/** Canonical form of an address: `localhost` and IPv4-mapped IPv6 become IPv4. */
function canonicalIp(ip: string): string {
  if (ip === 'localhost') return '127.0.0.1';
  const mapped = /^::ffff:(\d+\.\d+\.\d+\.\d+)$/i.exec(ip);
  return mapped ? mapped[1] : ip.toLowerCase();
}

/**
 * Admits only the listed clients and injects the verified address.
 *
 * A rule without a port admits every port of its address. Requests whose
 * transport reports no address are refused.
 *
 * @throws ConfigurationError for an invalid IP address in `clients`.
 *
 * @example
 * ```typescript
 * restrictClient([{ ip: 'localhost' }, { ip: '10.0.0.7', port: 8443 }]); // ClientAddress
 * ```
 */
export function restrictClient(
  clients: readonly ClientAddress[],
  options: RestrictClientOptions = {}
): ArgumentSource<ClientAddress> {
  const allowed = new Map<string, Set<number | undefined>>();
  for (const client of clients) {
    const ip = canonicalIp(client.ip);
    if (isIP(ip) === 0) {
      throw new ConfigurationError(`${client.ip} is not a valid IP address`);
    }
    const ports = allowed.get(ip) ?? new Set<number | undefined>();
    ports.add(client.port);
    allowed.set(ip, ports);
  }
  const error = options.error ?? new ClientNotAllowedError();

  return {
    kind: 'client',
    required: true,
    many: false,
    errors: [error],
    description: options.description,
    async extract(request) {
      const client = request.client;
      const ports = client && allowed.get(canonicalIp(client.ip));
      if (!client || !ports || !(ports.has(undefined) || ports.has(client.port))) {
        throw error;
      }
      return client;
    },
  };
}

// =============================================================================
// Argument assembly
// =============================================================================

/** Reverses a tuple type. */
export type Reverse<T extends readonly unknown[]> = T extends readonly [infer Head, ...infer Rest]
  ? [...Reverse<Rest>, Head]
  : [];

/** Values produced by a source list, in listed order. */
export type SourceValues<S extends readonly AnySource[]> = {
  [K in keyof S]: S[K] extends ArgumentSource<infer T> ? T : never;
};

/** Arguments a source list injects, in callback order. */
export type Injected<S extends readonly AnySource[]> = Reverse<SourceValues<S>>;

/**
 * Extracts every source in listed order and returns the values in callback
 * order (last-listed first).
 */
export async function collectArguments(
  sources: readonly AnySource[],
  request: ServerRequest
): Promise<unknown[]> {
  const values: unknown[] = [];
  for (const source of sources) {
    values.push(await source.extract(request));
  }
  return values.reverse();
}
