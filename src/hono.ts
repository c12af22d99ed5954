/**
 * @fileoverview Hono adapter for tramline routers.
 *
 * Routing stays in tramline: the adapter installs a single Hono middleware
 * that matches through a {@link Matcher}, runs the composed chain on a hit,
 * and hands unmatched paths back to Hono.
 *
 * @example
 * ```typescript
 * import { Hono } from 'hono';
 * import { mount } from 'tramline/hono';
 *
 * const app = new Hono();
 * mount(app, api);
 * app.get('/legacy', (c) => c.text('still served by hono'));
 * ```
 */

import type { Context, Hono, MiddlewareHandler } from 'hono';
import { methodNotAllowedResponse } from './handler.js';
import { Matcher, type MatcherOptions } from './matcher.js';
import type { Router } from './router.js';
import type { ExecutionContext } from './types.js';

/** Hono adapter configuration. */
export interface HonoAdapterOptions extends MatcherOptions {
  /**
   * Answer 405 for known paths with an unsupported method (default: true).
   * When false, those requests fall through to Hono like unknown paths.
   */
  methodNotAllowed?: boolean;
}

/** Reads Hono's execution context, which throws outside Cloudflare Workers. */
function getExecutionCtx(c: Context): ExecutionContext | undefined {
  try {
    return c.executionCtx;
  } catch {
    return undefined;
  }
}

/** Creates a Hono middleware that dispatches to a router. */
export function honoMiddleware(router: Router, options: HonoAdapterOptions = {}): MiddlewareHandler {
  const rejectMethods = options.methodNotAllowed ?? true;
  const matcher = new Matcher(router, options);

  return async (c, next) => {
    // Hono's c.req.path may already be URI-decoded; match on the raw pathname.
    const result = matcher.match(c.req.method, new URL(c.req.url).pathname);

    if (result.kind === 'method-not-allowed' && rejectMethods) {
      return methodNotAllowedResponse(result.allowed);
    }
    if (result.kind !== 'match') {
      await next();
      return;
    }

    return result.chain({
      request: c.req.raw,
      params: result.params,
      route: result.route,
      env: c.env,
      executionCtx: getExecutionCtx(c),
    });
  };
}

/** Mounts a router onto a Hono app for every path and method. */
export function mount(app: Hono, router: Router, options: HonoAdapterOptions = {}): void {
  app.use('*', honoMiddleware(router, options));
}
