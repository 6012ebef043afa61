/**
 * @fileoverview stemroute - segment-tree routing and class-based endpoint dispatch.
 *
 * A small request-routing core for fetch-compatible runtimes. Works with
 * Node.js, Hono, and anything that speaks `Request`/`Response`.
 *
 * ## Core Concepts
 *
 * - **Router** - Maps path segments to endpoint classes; static segments beat flexible ones
 * - **Endpoints** - Classes with `get`, `post`, ... callbacks and a response builder
 * - **Sources** - Headers, query parameters and validated bodies injected as arguments
 * - **Data formats** - JSON, form and binary payloads validated against a schema
 * - **Dispatcher** - Runs the request lifecycle and turns errors into responses
 *
 * ## Quick Start
 *
 * ```typescript
 * import { Dispatcher, Endpoint, Router, body, json, type EndpointClass } from 'stemroute';
 *
 * class Upsidedown extends Endpoint {
 *   static methods = {
 *     get: { sources: [body(json({ token: 'string' }))] },
 *   };
 *
 *   get(data: { token: string }) {
 *     this.sendJson({ result: [...data.token].reverse().join('') });
 *   }
 * }
 *
 * const router = new Router<EndpointClass>().register('/upsidedown', Upsidedown);
 * export default { fetch: new Dispatcher(router).handler() };
 * ```
 *
 * @module
 */

// Core types
export type { ClientAddress, FetchHandler, HeaderList, Method, MethodName, ServerResponse } from './types.js';
export { METHOD_NAMES, METHODS, normalizeMethod } from './types.js';

// Content types
export type { ContentType } from './content-type.js';
export { formatContentType, MediaTypes, parseContentType } from './content-type.js';

// Errors
export type { ApiErrorOptions, ErrorInfoOptions } from './errors.js';
export {
  ApiErrorInfo,
  BadRequestError,
  ClientNotAllowedError,
  ConfigurationError,
  DoubleResponseError,
  ErrorInfo,
  HeaderNotFoundError,
  InternalServerError,
  MethodNotSupportedError,
  MissingResponseError,
  NotUniqueError,
  PayloadTooLargeError,
  QueryNotFoundError,
  RouteConflictError,
  RoutingError,
  UnsupportedMediaTypeError,
  ValidationFailedError,
} from './errors.js';

// Schema validation
export type {
  CompiledSchema,
  InferSchema,
  InferSchemaField,
  JsonSchema,
  SchemaDefinition,
  SchemaField,
  SchemaOptions,
  SchemaType,
  ValidationResult,
} from './schema.js';
export { compileSchema, toJsonSchema } from './schema.js';

// Data formats
export type { BinaryData, DataFormat, DataOf, FormOptions, JsonOptions } from './data.js';
export { binary, form, json } from './data.js';

// Requests
export type { FetchBridgeOptions, RequestBody, ServerRequest, ServerRequestInit } from './request.js';
export {
  createRequest,
  fromFetchRequest,
  HeaderMap,
  ParamMap,
  splitPath,
  toFetchResponse,
} from './request.js';

// Routing
export type {
  FlexibleSegment,
  RegisterOptions,
  ResolvedMatch,
  RouteEntry,
  RouteInput,
  RouterOptions,
  Segment,
  SegmentMatcher,
  StaticSegment,
} from './router.js';
export { anyString, digits, flexible, formatRoute, literal, parseRoute, Router } from './router.js';

// Argument sources
export type {
  AnySource,
  ArgumentSource,
  BodySourceOptions,
  Injected,
  RestrictClientOptions,
  SourceValue,
  SourceValues,
  ValueSourceFlags,
  ValueSourceOptions,
} from './sources.js';
export { body, collectArguments, header, query, restrictClient } from './sources.js';

// Endpoints and dispatch
export type {
  CompiledEndpoint,
  CompiledMethod,
  EndpointClass,
  MethodDeclaration,
  MethodDeclarations,
} from './endpoint.js';
export { compileEndpoint, Endpoint, renderError } from './endpoint.js';
export type { DispatcherOptions } from './dispatcher.js';
export { Dispatcher } from './dispatcher.js';

// Middleware
export type { Middleware, MiddlewareContext, MiddlewareNext } from './middleware.js';
export { compose, runMiddleware } from './middleware.js';

// Documentation
export type { OpenApiDocument, OpenApiOperation, OpenApiParameter } from './docs.js';
export { generateDocs } from './docs.js';
