/**
 * @fileoverview Ready-to-use middleware.
 *
 * - **Error Handling** - Catch and format errors with optional logging
 * - **Logging** - Request/response logging with the matched route template
 * - **Request ID** - Add unique identifiers to requests for tracing
 * - **Timeout** - Answer 408 when a request takes too long
 *
 * Import via: `import { errorHandler, logger } from 'tramline/middleware';`
 *
 * @example
 * ```typescript
 * import { Router } from 'tramline';
 * import { errorHandler, logger, requestId } from 'tramline/middleware';
 *
 * const api = new Router({ prefix: '/api' });
 * api.use(requestId(), logger(), errorHandler({ expose: false }));
 * ```
 */

export { compose } from '../middleware.js';
export type {
  ErrorHandlerOptions,
  LoggerOptions,
  LogInfo,
  RequestIdOptions,
  TimeoutOptions,
} from './common.js';
export { errorHandler, HttpError, logger, requestId, timeout } from './common.js';
