/**
 * @fileoverview Fetch handler built on a router.
 *
 * Unmatched paths get a 404, known paths with an unsupported method a 405
 * with an `Allow` header. Both responses can be replaced through options.
 */

import { Matcher, type MatcherOptions } from './matcher.js';
import type { Router } from './router.js';
import type { ExecutionContext, FetchHandler } from './types.js';

/** Fetch handler configuration. */
export interface HandlerOptions extends MatcherOptions {
  /** Response for paths no route matches. */
  notFound?: (request: Request) => Response | Promise<Response>;
  /** Response for matched paths whose routes do not accept the method. */
  methodNotAllowed?: (request: Request, allowed: readonly string[]) => Response | Promise<Response>;
}

/** Default 405 response, shared with the adapters. */
export function methodNotAllowedResponse(allowed: readonly string[]): Response {
  return Response.json(
    { error: 'Method Not Allowed' },
    { status: 405, headers: { Allow: allowed.join(', ') } },
  );
}

const defaults = {
  notFound: () => Response.json({ error: 'Not Found' }, { status: 404 }),
  methodNotAllowed: (_request: Request, allowed: readonly string[]) =>
    methodNotAllowedResponse(allowed),
};

/**
 * Creates a fetch handler from a router.
 *
 * @example
 * ```typescript
 * const api = new Router({ prefix: '/api' });
 * api.get('/health', async () => ({ status: 'ok' }));
 * api.get('/users/{id:int}', async (c) => ({ id: c.params.id }));
 *
 * export default { fetch: createHandler(api, { middleware: [logger()] }) };
 * ```
 */
export function createHandler(router: Router, options: HandlerOptions = {}): FetchHandler {
  const notFound = options.notFound ?? defaults.notFound;
  const methodNotAllowed = options.methodNotAllowed ?? defaults.methodNotAllowed;
  const matcher = new Matcher(router, options);

  return async (request: Request, env?: unknown, ctx?: ExecutionContext): Promise<Response> => {
    const url = new URL(request.url);
    const result = matcher.match(request.method, url.pathname);

    switch (result.kind) {
      case 'no-path-match':
        return notFound(request);
      case 'method-not-allowed':
        return methodNotAllowed(request, result.allowed);
      case 'match':
        return result.chain({
          request,
          params: result.params,
          route: result.route,
          env,
          executionCtx: ctx,
        });
    }
  };
}
