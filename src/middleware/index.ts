/**
 * @fileoverview Dispatcher-level middleware.
 *
 * - **Error Handling** - Convert errors thrown by later middleware
 * - **Logging** - Request/response logging with customizable format
 * - **Request ID** - Add unique identifiers to requests for tracing
 *
 * Import via: `import { logger, requestId } from 'stemroute/middleware';`
 *
 * @example
 * ```typescript
 * import { Dispatcher } from 'stemroute';
 * import { logger, requestId } from 'stemroute/middleware';
 *
 * const dispatcher = new Dispatcher(router, {
 *   middleware: [requestId(), logger()],
 * });
 * ```
 */

export { compose } from '../middleware.js';
export type { ErrorHandlerOptions, LoggerOptions, LogInfo, RequestIdOptions } from './common.js';
export { errorHandler, logger, requestId } from './common.js';
