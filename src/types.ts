/**
 * @fileoverview Core type definitions shared by the router, endpoints and dispatcher.
 *
 * The dispatcher works on a transport-neutral request/response pair. Adapters
 * (the fetch bridge in `request.ts`, the Hono adapter, a `node:http` server)
 * translate to and from these shapes.
 */

/** Standard HTTP methods, upper-case as they appear on the wire. */
export type Method = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'DELETE' | 'OPTIONS' | 'PATCH' | 'TRACE';

/** Every supported method, in the order used for `Allow` headers. */
export const METHODS: readonly Method[] = [
  'GET',
  'HEAD',
  'POST',
  'PUT',
  'DELETE',
  'OPTIONS',
  'PATCH',
  'TRACE',
];

/** Callback property names on endpoint classes. */
export type MethodName = Lowercase<Method>;

/** Maps each method to the endpoint property that implements it. */
export const METHOD_NAMES: Readonly<Record<Method, MethodName>> = {
  GET: 'get',
  HEAD: 'head',
  POST: 'post',
  PUT: 'put',
  DELETE: 'delete',
  OPTIONS: 'options',
  PATCH: 'patch',
  TRACE: 'trace',
};

/** Case-normalizes a method string. Returns `undefined` for unknown methods. */
export function normalizeMethod(method: string): Method | undefined {
  const upper = method.toUpperCase();
  return METHODS.find((m) => m === upper);
}

/** Ordered response header list. Names keep the case they were added with. */
export type HeaderList = readonly (readonly [string, string])[];

/** Response produced by the dispatcher. */
export interface ServerResponse {
  status: number;
  headers: HeaderList;
  /** Body chunks. Empty for HEAD and bodiless responses. */
  body: readonly Uint8Array[];
}

/** Network address of the peer that sent a request. */
export interface ClientAddress {
  ip: string;
  port?: number;
}

/** Fetch handler type (works with Node.js 20, Bun, Deno, Cloudflare Workers). */
export type FetchHandler = (request: Request) => Promise<Response>;
