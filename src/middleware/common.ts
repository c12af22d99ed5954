/**
 * @fileoverview Common middleware: error handling, logging, request IDs, and
 * timeouts.
 */

import type { Middleware, MiddlewareContext } from '../middleware.js';

// =============================================================================
// Error Handler
// =============================================================================

/**
 * HTTP error with status code for use with errorHandler middleware.
 *
 * Throw this in route handlers to return a specific HTTP status code.
 * The errorHandler middleware will catch it and format the response.
 *
 * @example
 * ```typescript
 * import { HttpError } from 'tramline/middleware';
 *
 * router.get('/users/{id:int}', async (c) => {
 *   const user = await db.findUser(c.params.id);
 *   if (!user) throw new HttpError('User not found', 404);
 *   return user;
 * });
 * ```
 */
export class HttpError extends Error {
  constructor(
    message: string,
    public status: number,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

/**
 * Extracts HTTP status code from an error object.
 *
 * Supports errors with `status` or `statusCode` properties (common patterns
 * in frameworks like Express, Koa, Hono, and custom HTTP error classes).
 */
function getErrorStatus(error: unknown): number {
  if (typeof error !== 'object' || error === null) {
    return 500;
  }
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return 500;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/** Error handler middleware configuration. */
export interface ErrorHandlerOptions {
  /** Custom error logger (default: console.error). */
  log?: (error: Error, context: MiddlewareContext) => void | Promise<void>;
  /** Expose error details in response (dangerous in production). */
  expose?: boolean;
  /** Custom error response formatter. */
  formatter?: (error: Error, context: MiddlewareContext) => Response | Promise<Response>;
}

/**
 * Creates an error handling middleware that catches and formats errors.
 *
 * @example
 * ```typescript
 * const api = new Router({ prefix: '/api', middleware: [errorHandler({ expose: false })] });
 * ```
 */
export function errorHandler(options: ErrorHandlerOptions = {}): Middleware {
  return async (context, next) => {
    try {
      return await next();
    } catch (error) {
      const err = toError(error);

      if (options.log) {
        await options.log(err, context);
      } else {
        console.error(`Error in ${context.request.method} ${context.route.template}:`, err);
      }

      if (options.formatter) {
        return await options.formatter(err, context);
      }

      const status = getErrorStatus(error);
      const message = options.expose ? err.message : 'Internal Server Error';

      return Response.json(
        {
          error: message,
          ...(options.expose && {
            stack: err.stack,
            name: err.name,
          }),
        },
        { status },
      );
    }
  };
}

// =============================================================================
// Logger
// =============================================================================

/** Logger middleware configuration. */
export interface LoggerOptions {
  /** Custom logger function (default: console.log). */
  log?: (message: string) => void;
  /** Include request headers in log info. */
  includeHeaders?: boolean;
  /** Custom log formatter. */
  formatter?: (info: LogInfo) => string;
}

/** Information logged for each request. */
export interface LogInfo {
  method: string;
  url: string;
  /** Template of the matched route. */
  route: string;
  status: number;
  duration: number;
  headers?: Record<string, string>;
  error?: Error;
}

/**
 * Creates a request/response logging middleware.
 *
 * Default lines:
 * - `→ GET /users/7 (/users/{id:int})`
 * - `← 200 (3ms)`
 * - `✗ 500 Error: boom (3ms)`
 *
 * @example
 * ```typescript
 * router.use(logger({ includeHeaders: true }));
 * ```
 */
export function logger(options: LoggerOptions = {}): Middleware {
  const log = options.log ?? console.log;

  return async (context, next) => {
    const { request } = context;
    const start = Date.now();
    const url = new URL(request.url);

    const info: LogInfo = {
      method: request.method,
      url: `${url.pathname}${url.search}`,
      route: context.route.template,
      status: 0,
      duration: 0,
    };

    if (options.includeHeaders) {
      info.headers = Object.fromEntries(request.headers.entries());
    }

    log(
      options.formatter
        ? options.formatter({ ...info })
        : `→ ${info.method} ${info.url} (${info.route})`,
    );

    try {
      const response = await next();

      info.status = response.status;
      info.duration = Date.now() - start;

      const statusText = response.statusText ? ` ${response.statusText}` : '';
      log(
        options.formatter
          ? options.formatter(info)
          : `← ${info.status}${statusText} (${info.duration}ms)`,
      );

      return response;
    } catch (error) {
      const err = toError(error);
      info.status = 500;
      info.duration = Date.now() - start;
      info.error = err;

      log(
        options.formatter
          ? options.formatter(info)
          : `✗ ${info.status} Error: ${err.message} (${info.duration}ms)`,
      );

      throw error;
    }
  };
}

// =============================================================================
// Request ID
// =============================================================================

/** Request ID middleware configuration. */
export interface RequestIdOptions {
  /** Header name for request ID (default: X-Request-ID). */
  headerName?: string;
  /** Function to generate request ID (default: crypto.randomUUID). */
  generator?: () => string;
}

/**
 * Creates a middleware that adds a unique request ID to each request.
 *
 * An incoming ID header is reused. The ID is stored as `context.requestId`
 * and echoed on the response.
 */
export function requestId(options: RequestIdOptions = {}): Middleware {
  const headerName = options.headerName ?? 'X-Request-ID';
  const generator = options.generator ?? (() => crypto.randomUUID());

  return async (context, next) => {
    const id = context.request.headers.get(headerName) || generator();
    context.requestId = id;

    const response = await next();

    const headers = new Headers(response.headers);
    headers.set(headerName, id);

    return new Response(response.body, {
      status: response.status,
      statusText: response.statusText,
      headers,
    });
  };
}

// =============================================================================
// Timeout
// =============================================================================

/** Timeout middleware configuration. */
export interface TimeoutOptions {
  /** Timeout in milliseconds. */
  timeout: number;
  /** Body of the 408 response (default: 'Request timeout'). */
  message?: string;
}

/**
 * Creates a middleware that answers 408 when the inner chain takes longer
 * than `timeout` milliseconds. The inner chain is not cancelled.
 *
 * @example
 * ```typescript
 * router.use(timeout({ timeout: 5000 }));
 * ```
 */
export function timeout(options: TimeoutOptions): Middleware {
  return async (_context, next) => {
    let timedOut = false;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), options.timeout);
    });

    const pending = next();
    // A failure after the deadline has nobody waiting on it.
    void pending.catch((error: unknown) => {
      if (timedOut) console.error('Request failed after timeout:', error);
    });

    try {
      const result = await Promise.race([pending, expired]);
      if (result === 'timeout') {
        timedOut = true;
        return new Response(options.message ?? 'Request timeout', { status: 408 });
      }
      return result;
    } finally {
      clearTimeout(timer);
    }
  };
}
