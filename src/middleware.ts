/**
 * @fileoverview Core middleware types and chain composition.
 *
 * A middleware unit receives the request context and a `next` function.
 * Calling `next()` runs the rest of the chain (inner units, then the handler)
 * and resolves to its response; code after the `await` sees that response on
 * the way out. Returning without calling `next()` short-circuits the chain.
 *
 * @example
 * ```typescript
 * const timing: Middleware = async (context, next) => {
 *   const start = Date.now();
 *   const response = await next();
 *   response.headers.set('X-Response-Time', `${Date.now() - start}ms`);
 *   return response;
 * };
 *
 * router.use(timing);
 * ```
 */

import { MiddlewareError } from './errors.js';
import type { PathParams } from './pattern.js';
import type { ExecutionContext, RouteInfo } from './types.js';

/**
 * Context passed to middleware and handlers.
 *
 * Middleware may attach extra properties (a user, a request id); they stay on
 * the same object all the way to the handler.
 */
export interface MiddlewareContext {
  /** The original Request. */
  request: Request;
  /** Converted path parameters of the matched route. */
  params: PathParams;
  /** The matched route. */
  route: RouteInfo;
  /** Environment bindings passed to the fetch handler. */
  env: unknown;
  /** Execution context for background tasks. */
  executionCtx?: ExecutionContext;
  [key: string]: unknown;
}

/** Continues to the next unit of a chain. */
export type ChainNext<R> = () => Promise<R>;

/** One unit of a chain over context `C` producing `R`. */
export type ChainUnit<C, R> = (context: C, next: ChainNext<R>) => Promise<R> | R;

/** A fully composed chain. */
export type ComposedChain<C, R> = (context: C) => Promise<R>;

/** Function to continue to the next middleware or handler. */
export type MiddlewareNext = ChainNext<Response>;

/**
 * Middleware function signature.
 *
 * @example
 * ```typescript
 * const auth: Middleware = async (context, next) => {
 *   const token = context.request.headers.get('Authorization');
 *   if (!token) return new Response('Unauthorized', { status: 401 });
 *   context.user = await lookupUser(token);
 *   return next();
 * };
 * ```
 */
export type Middleware = ChainUnit<MiddlewareContext, Response>;

/**
 * Composes units (outer first) around a terminal step into one callable.
 *
 * The composition is done once; the returned function can be invoked for any
 * number of exchanges. Errors from inner units or the terminal propagate to
 * the caller untouched.
 */
export function composeChain<C, R>(
  units: readonly ChainUnit<C, R>[],
  terminal: (context: C) => Promise<R> | R,
): ComposedChain<C, R> {
  const innermost: ComposedChain<C, R> = async (context) => terminal(context);

  return units.reduceRight<ComposedChain<C, R>>(
    (inner, unit) => async (context) => {
      let called = false;
      return unit(context, () => {
        if (called) {
          return Promise.reject(new MiddlewareError('next() called multiple times'));
        }
        called = true;
        return inner(context);
      });
    },
    innermost,
  );
}

/**
 * Runs a chain of middleware with a final handler.
 *
 * Middleware are executed in order. Each middleware receives the context and
 * a `next` function. Calling `next()` continues to the next middleware or the
 * final handler. Returning without calling `next()` short-circuits the chain.
 */
export async function runMiddleware(
  middleware: readonly Middleware[],
  context: MiddlewareContext,
  finalHandler: () => Promise<Response>,
): Promise<Response> {
  return composeChain(middleware, () => finalHandler())(context);
}

/**
 * Composes multiple middleware into a single middleware.
 *
 * Useful for grouping related middleware together.
 *
 * @example
 * ```typescript
 * const security = compose(requestId(), errorHandler(), timeout({ timeout: 5000 }));
 * router.use(security);
 * ```
 */
export function compose(...middleware: Middleware[]): Middleware {
  return async (context, next) => {
    return runMiddleware(middleware, context, next);
  };
}
