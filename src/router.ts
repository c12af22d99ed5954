/**
 * @fileoverview HTTP router: route registration, mounting, and lookup.
 *
 * @example
 * ```typescript
 * const users = new Router({ prefix: '/users', name: 'users' });
 * users.get('/', async () => db.users.list(), { name: 'list' });
 * users.get('/{id:int}', async (c) => db.users.get(c.params.id), { name: 'detail' });
 *
 * const api = new Router({ prefix: '/api' });
 * api.use(errorHandler());
 * api.mount(users);
 *
 * api.urlFor('users.detail', { id: 7 }); // '/api/users/7'
 * export default { fetch: api.handler() };
 * ```
 */

import { InvalidRouteError } from './errors.js';
import { createHandler, type HandlerOptions } from './handler.js';
import { Matcher, type MatchResult } from './matcher.js';
import type { Middleware } from './middleware.js';
import { compilePattern, type PathParams } from './pattern.js';
import type { DeclaredRoute, ResolvedEntry, RouteKey, TreeOptions } from './tree.js';
import { RouteTree } from './tree.js';
import type { FetchHandler, Handler, InferParams } from './types.js';
import { DEFAULT_METHODS } from './types.js';

/** A registered HTTP route. */
export interface RouteEntry extends DeclaredRoute<Middleware> {
  /** Upper-case methods, never empty. */
  readonly methods: ReadonlySet<string>;
  readonly handler: Handler;
}

/** A row of the flattened HTTP route table. */
export type ResolvedRoute = ResolvedEntry<RouteEntry, Middleware>;

/** Per-route registration options. */
export interface RouteOptions {
  /** Accepted methods (default: the router's `defaultMethods`). */
  methods?: readonly string[];
  /** Name for `urlFor()`, unique within the resolved table. */
  name?: string;
  /** Route-level middleware, run inside router-level middleware. */
  middleware?: Middleware[];
  /** Opaque values passed through to `context.route.metadata`. */
  metadata?: Record<string, unknown>;
}

/** Options for a single-method shorthand such as `router.get()`. */
export type MethodRouteOptions = Omit<RouteOptions, 'methods'>;

/** Router configuration. */
export interface RouterOptions extends TreeOptions<Middleware> {
  /** Methods used when a route does not list any. */
  defaultMethods?: readonly string[];
}

export class Router extends RouteTree<RouteEntry, Middleware> {
  readonly defaultMethods: readonly string[];
  private defaultMatcher?: Matcher;

  constructor(options: RouterOptions = {}) {
    super(options);
    this.defaultMethods = options.defaultMethods ?? DEFAULT_METHODS;
  }

  /**
   * Registers a route.
   *
   * @throws DuplicateRouteError when this router already has the same method
   *   on an equivalent pattern
   * @throws InvalidRouteError when `methods` is empty
   */
  addRoute<T extends string>(
    template: T,
    handler: Handler<InferParams<T> & PathParams>,
    options: RouteOptions = {},
  ): this {
    const methods = (options.methods ?? this.defaultMethods).map((method) => method.toUpperCase());
    if (methods.length === 0) {
      throw new InvalidRouteError(`Route ${template} must accept at least one method`);
    }

    this.register({
      pattern: compilePattern(template, this.converters),
      methods: new Set(methods),
      handler,
      name: options.name,
      middleware: [...(options.middleware ?? [])],
      metadata: { ...options.metadata },
    });
    return this;
  }

  get<T extends string>(
    template: T,
    handler: Handler<InferParams<T> & PathParams>,
    options: MethodRouteOptions = {},
  ): this {
    return this.addRoute(template, handler, { ...options, methods: ['GET'] });
  }

  post<T extends string>(
    template: T,
    handler: Handler<InferParams<T> & PathParams>,
    options: MethodRouteOptions = {},
  ): this {
    return this.addRoute(template, handler, { ...options, methods: ['POST'] });
  }

  put<T extends string>(
    template: T,
    handler: Handler<InferParams<T> & PathParams>,
    options: MethodRouteOptions = {},
  ): this {
    return this.addRoute(template, handler, { ...options, methods: ['PUT'] });
  }

  patch<T extends string>(
    template: T,
    handler: Handler<InferParams<T> & PathParams>,
    options: MethodRouteOptions = {},
  ): this {
    return this.addRoute(template, handler, { ...options, methods: ['PATCH'] });
  }

  delete<T extends string>(
    template: T,
    handler: Handler<InferParams<T> & PathParams>,
    options: MethodRouteOptions = {},
  ): this {
    return this.addRoute(template, handler, { ...options, methods: ['DELETE'] });
  }

  options<T extends string>(
    template: T,
    handler: Handler<InferParams<T> & PathParams>,
    options: MethodRouteOptions = {},
  ): this {
    return this.addRoute(template, handler, { ...options, methods: ['OPTIONS'] });
  }

  head<T extends string>(
    template: T,
    handler: Handler<InferParams<T> & PathParams>,
    options: MethodRouteOptions = {},
  ): this {
    return this.addRoute(template, handler, { ...options, methods: ['HEAD'] });
  }

  /**
   * Looks up a method and path. Registration order decides between patterns
   * that both match; see {@link Matcher}.
   */
  match(method: string, path: string): MatchResult {
    this.defaultMatcher ??= new Matcher(this);
    return this.defaultMatcher.match(method, path);
  }

  /**
   * Creates a fetch handler for use with Cloudflare Workers, Deno, Bun,
   * or a Node.js adapter.
   */
  handler(options: HandlerOptions = {}): FetchHandler {
    return createHandler(this, options);
  }

  protected routeKeys(route: RouteEntry): RouteKey[] {
    return [...route.methods].map((method) => ({ key: method, method }));
  }
}
