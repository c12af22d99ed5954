/**
 * @fileoverview Router tree shared by HTTP and socket routers.
 *
 * A tree node holds its own middleware and an ordered list of items: route
 * registrations and mounted child routers, interleaved in registration order.
 * `resolve()` flattens the tree depth-first into a frozen table where every
 * entry carries its fully-qualified pattern, name, and middleware list.
 */

import { ConverterRegistry } from './converters.js';
import {
  CyclicMountError,
  DuplicateRouteError,
  DuplicateRouteNameError,
  PrefixCollisionError,
  UnknownRouteNameError,
} from './errors.js';
import type { CompiledPattern, PathParams, TrailingSlash } from './pattern.js';
import { compilePrefix, joinPatterns } from './pattern.js';
import { reverseUrl } from './url.js';

/** Fields every declared route has. */
export interface DeclaredRoute<TMiddleware> {
  /** Pattern as registered, without mount prefixes. */
  readonly pattern: CompiledPattern;
  /** Name as registered, without router namespaces. */
  readonly name?: string;
  readonly middleware: readonly TMiddleware[];
  readonly metadata: Readonly<Record<string, unknown>>;
}

/** One row of a flattened route table. */
export interface ResolvedEntry<TRoute, TMiddleware> {
  readonly route: TRoute;
  /** Pattern with every ancestor prefix applied. */
  readonly pattern: CompiledPattern;
  /** Name with every ancestor namespace applied. */
  readonly name?: string;
  /** Ancestor middleware, then router middleware, then route middleware. */
  readonly middleware: readonly TMiddleware[];
  /** Trailing-slash policy of the router that declared the route. */
  readonly trailingSlash: TrailingSlash;
}

/**
 * Discriminator combined with a pattern's key for duplicate detection: the
 * method for HTTP routes, a constant for socket routes.
 */
export interface RouteKey {
  key: string;
  method?: string;
}

/** Options shared by every router. */
export interface TreeOptions<TMiddleware> {
  /** Path prefix for every route in this router (default: none). */
  prefix?: string;
  /** Namespace added in front of route names (`users` gives `users.detail`). */
  name?: string;
  /** Router-level middleware. */
  middleware?: TMiddleware[];
  /** Converter registry used to compile templates (default: built-ins). */
  converters?: ConverterRegistry;
  /**
   * Whether a trailing slash is significant when matching this router's
   * routes (default: the policy of the router it is mounted in, else 'strict').
   */
  trailingSlash?: TrailingSlash;
}

type TreeItem<TRoute, TChild> =
  | { kind: 'route'; route: TRoute }
  | { kind: 'mount'; child: TChild; prefix: CompiledPattern };

export abstract class RouteTree<TRoute extends DeclaredRoute<TMiddleware>, TMiddleware> {
  /** Declared prefix, normalized. */
  readonly prefix: string;
  readonly name?: string;
  readonly converters: ConverterRegistry;
  /** Policy used when this router is resolved as the root. */
  readonly trailingSlash: TrailingSlash;

  private readonly declaredPrefix: CompiledPattern;
  private readonly declaredTrailingSlash?: TrailingSlash;
  private readonly ownMiddleware: TMiddleware[];
  private readonly items: TreeItem<TRoute, this>[] = [];
  private readonly parents = new Set<RouteTree<TRoute, TMiddleware>>();
  private table?: readonly ResolvedEntry<TRoute, TMiddleware>[];
  private names?: Map<string, ResolvedEntry<TRoute, TMiddleware>>;

  constructor(options: TreeOptions<TMiddleware> = {}) {
    this.converters = options.converters ?? new ConverterRegistry();
    this.declaredPrefix = compilePrefix(options.prefix ?? '', this.converters);
    this.prefix = this.declaredPrefix.segments.length > 0 ? this.declaredPrefix.template : '';
    this.name = options.name;
    this.declaredTrailingSlash = options.trailingSlash;
    this.trailingSlash = options.trailingSlash ?? 'strict';
    this.ownMiddleware = [...(options.middleware ?? [])];
  }

  /** Discriminators under which a pattern may not be registered twice. */
  protected abstract routeKeys(route: TRoute): RouteKey[];

  /** Appends a route after checking it against this router's own routes. */
  protected register(route: TRoute): void {
    const taken = new Set<string>();
    for (const item of this.items) {
      if (item.kind !== 'route') continue;
      for (const { key } of this.routeKeys(item.route)) {
        taken.add(`${key} ${item.route.pattern.key}`);
      }
      if (route.name !== undefined && item.route.name === route.name) {
        throw new DuplicateRouteNameError(route.name);
      }
    }
    for (const { key, method } of this.routeKeys(route)) {
      if (taken.has(`${key} ${route.pattern.key}`)) {
        throw new DuplicateRouteError(method, route.pattern.template);
      }
    }

    this.items.push({ kind: 'route', route });
    this.invalidate();
  }

  /**
   * Appends middleware to this router. It wraps every route registered here
   * or in a mounted child, before or after this call.
   */
  addMiddleware(...middleware: TMiddleware[]): this {
    this.ownMiddleware.push(...middleware);
    this.invalidate();
    return this;
  }

  /** Alias of {@link addMiddleware}. */
  use(...middleware: TMiddleware[]): this {
    return this.addMiddleware(...middleware);
  }

  /**
   * Mounts a child router under `prefix`, or under the child's own declared
   * prefix when none is given.
   *
   * @throws PrefixCollisionError when a sibling is already mounted at that prefix
   * @throws CyclicMountError when the child is this router or contains it
   */
  mount(child: this, prefix?: string): this {
    if (child === this || child.contains(this)) {
      throw new CyclicMountError();
    }

    const effective =
      prefix === undefined ? child.declaredPrefix : compilePrefix(prefix, child.converters);

    for (const item of this.items) {
      if (item.kind === 'mount' && item.prefix.template === effective.template) {
        throw new PrefixCollisionError(effective.segments.length > 0 ? effective.template : '');
      }
    }

    this.items.push({ kind: 'mount', child, prefix: effective });
    child.parents.add(this);
    this.invalidate();
    return this;
  }

  /**
   * Flattens the tree into the route table.
   *
   * The table is cached until this router or any descendant changes.
   *
   * @throws DuplicateRouteError, DuplicateRouteNameError, or a pattern error
   *   when prefixes and routes combine into an invalid table
   */
  resolve(): readonly ResolvedEntry<TRoute, TMiddleware>[] {
    if (this.table) return this.table;

    const entries: ResolvedEntry<TRoute, TMiddleware>[] = [];
    this.collect(this.declaredPrefix, [], [], this.trailingSlash, entries);

    const keys = new Set<string>();
    const names = new Map<string, ResolvedEntry<TRoute, TMiddleware>>();
    for (const entry of entries) {
      for (const { key, method } of this.routeKeys(entry.route)) {
        const qualified = `${key} ${entry.pattern.key}`;
        if (keys.has(qualified)) {
          throw new DuplicateRouteError(method, entry.pattern.template);
        }
        keys.add(qualified);
      }
      if (entry.name !== undefined) {
        if (names.has(entry.name)) throw new DuplicateRouteNameError(entry.name);
        names.set(entry.name, entry);
      }
    }

    this.names = names;
    this.table = Object.freeze(entries);
    return this.table;
  }

  /** Finds a route by its fully-qualified name. */
  lookup(name: string): ResolvedEntry<TRoute, TMiddleware> | undefined {
    this.resolve();
    return this.names?.get(name);
  }

  /**
   * Builds the path of a named route.
   *
   * @example
   * ```typescript
   * router.get('/items/{id:int}', handler, { name: 'item' });
   * router.urlFor('item', { id: 42 }); // '/items/42'
   * ```
   */
  urlFor(name: string, params: PathParams = {}): string {
    const entry = this.lookup(name);
    if (!entry) {
      throw new UnknownRouteNameError(name);
    }
    return reverseUrl(entry.pattern, name, params);
  }

  /** Whether `node` is this router or mounted anywhere below it. */
  private contains(node: RouteTree<TRoute, TMiddleware>): boolean {
    if (node === this) return true;
    return this.items.some((item) => item.kind === 'mount' && item.child.contains(node));
  }

  /** Drops the cached table here and in every router this one is mounted in. */
  private invalidate(): void {
    this.table = undefined;
    this.names = undefined;
    for (const parent of this.parents) parent.invalidate();
  }

  private collect(
    prefix: CompiledPattern,
    middleware: readonly TMiddleware[],
    namespace: readonly string[],
    trailingSlash: TrailingSlash,
    out: ResolvedEntry<TRoute, TMiddleware>[],
  ): void {
    const scopeMiddleware = [...middleware, ...this.ownMiddleware];
    const scopeNamespace = this.name ? [...namespace, this.name] : namespace;
    const scopeTrailingSlash = this.declaredTrailingSlash ?? trailingSlash;

    for (const item of this.items) {
      if (item.kind === 'mount') {
        item.child.collect(
          joinPatterns(prefix, item.prefix),
          scopeMiddleware,
          scopeNamespace,
          scopeTrailingSlash,
          out,
        );
        continue;
      }

      const { route } = item;
      out.push(
        Object.freeze({
          route,
          pattern: joinPatterns(prefix, route.pattern),
          name: route.name === undefined ? undefined : [...scopeNamespace, route.name].join('.'),
          middleware: Object.freeze([...scopeMiddleware, ...route.middleware]),
          trailingSlash: scopeTrailingSlash,
        }),
      );
    }
  }
}
