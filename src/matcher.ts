/**
 * @fileoverview Request matching against a router's flattened table.
 */

import type { ComposedChain, Middleware, MiddlewareContext } from './middleware.js';
import { composeChain } from './middleware.js';
import type { PathParams } from './pattern.js';
import { matchPattern, splitPath } from './pattern.js';
import type { ResolvedRoute, Router } from './router.js';
import type { Handler, RouteInfo } from './types.js';

/** Outcome of a lookup. Misses are values, never thrown. */
export type MatchResult =
  | {
      kind: 'match';
      entry: ResolvedRoute;
      route: RouteInfo;
      /** Fully-qualified route name. */
      name?: string;
      handler: Handler;
      params: PathParams;
      /** Global, router, and route middleware composed around the handler. */
      chain: ComposedChain<MiddlewareContext, Response>;
    }
  | { kind: 'no-path-match' }
  | {
      kind: 'method-not-allowed';
      /** Methods of every structurally matching route, in table order. */
      allowed: string[];
    };

/** Matcher configuration. */
export interface MatcherOptions {
  /** Middleware wrapped around every route's chain, outermost. */
  middleware?: Middleware[];
}

interface CompiledRoute {
  info: RouteInfo;
  chain: ComposedChain<MiddlewareContext, Response>;
}

/**
 * Turns a handler's return value into a Response: a `Response` passes
 * through, `undefined` becomes 204, anything else is sent as JSON.
 */
export function toResponse(result: unknown): Response {
  if (result instanceof Response) return result;
  if (result === undefined) return new Response(null, { status: 204 });
  return Response.json(result);
}

/**
 * Scans a router's table in registration order. The first entry whose
 * pattern and method both match wins; there is no specificity ranking, so
 * `/users/{id}` registered before `/users/me` also serves `/users/me`.
 *
 * Composed chains are built on first match and kept per table entry, so a
 * router change (which produces a new table) never serves a stale chain.
 */
export class Matcher {
  private readonly router: Router;
  private readonly middleware: readonly Middleware[];
  private readonly compiled = new WeakMap<ResolvedRoute, CompiledRoute>();

  constructor(router: Router, options: MatcherOptions = {}) {
    this.router = router;
    this.middleware = [...(options.middleware ?? [])];
  }

  match(method: string, path: string): MatchResult {
    const upper = method.toUpperCase();
    const segments = splitPath(path);
    const allowed: string[] = [];

    for (const entry of this.router.resolve()) {
      const params = matchPattern(entry.pattern, segments, entry.trailingSlash);
      if (!params) continue;

      if (entry.route.methods.has(upper)) {
        const { info, chain } = this.compile(entry);
        return {
          kind: 'match',
          entry,
          route: info,
          name: entry.name,
          handler: entry.route.handler,
          params,
          chain,
        };
      }

      for (const candidate of entry.route.methods) {
        if (!allowed.includes(candidate)) allowed.push(candidate);
      }
    }

    return allowed.length > 0 ? { kind: 'method-not-allowed', allowed } : { kind: 'no-path-match' };
  }

  private compile(entry: ResolvedRoute): CompiledRoute {
    const cached = this.compiled.get(entry);
    if (cached) return cached;

    const { handler } = entry.route;
    const compiled: CompiledRoute = {
      info: Object.freeze({
        name: entry.name,
        template: entry.pattern.template,
        methods: Object.freeze([...entry.route.methods]),
        metadata: entry.route.metadata,
      }),
      chain: composeChain([...this.middleware, ...entry.middleware], async (context) =>
        toResponse(await handler(context)),
      ),
    };
    this.compiled.set(entry, compiled);
    return compiled;
  }
}
