/**
 * @fileoverview Socket routes: handshake-path matching and session dispatch.
 *
 * A socket router is a route tree without methods. Matching, prefixes,
 * mounting, names, and middleware all behave as on the HTTP {@link Router};
 * the matched handler drives a {@link SocketSession} instead of producing a
 * Response.
 *
 * @example
 * ```typescript
 * const sockets = new SocketRouter({ prefix: '/ws' });
 * sockets.addRoute('/echo', async ({ session }) => {
 *   await session.accept();
 *   for await (const message of session.messages()) await session.send(message);
 * });
 * ```
 */

import type { ChainUnit, ComposedChain } from './middleware.js';
import { composeChain } from './middleware.js';
import type { PathParams } from './pattern.js';
import { compilePattern, matchPattern, splitPath } from './pattern.js';
import { SocketSession, type SocketTransport } from './socket.js';
import type { DeclaredRoute, ResolvedEntry, RouteKey, TreeOptions } from './tree.js';
import { RouteTree } from './tree.js';
import type { InferParams, RouteInfo } from './types.js';

/** Context passed to socket middleware and handlers. */
export interface SocketContext {
  session: SocketSession;
  /** Converted path parameters of the matched route. */
  params: PathParams;
  route: RouteInfo;
  /** Handshake request headers. */
  headers: Headers;
  [key: string]: unknown;
}

/** Socket handler context with typed path parameters. */
export interface TypedSocketContext<P extends PathParams = PathParams> extends SocketContext {
  params: P;
}

/**
 * Socket handler. It owns the session: accept it, exchange messages, and
 * return. A session left open is closed with 1000; one never accepted is
 * refused with 403.
 */
export type SocketHandler<P extends PathParams = PathParams> = {
  bivarianceHack(context: TypedSocketContext<P>): Promise<void> | void;
}['bivarianceHack'];

/** Socket middleware; runs before the handshake completes. */
export type SocketMiddleware = ChainUnit<SocketContext, void>;

/** A registered socket route. */
export interface SocketRouteEntry extends DeclaredRoute<SocketMiddleware> {
  readonly handler: SocketHandler;
}

export type ResolvedSocketRoute = ResolvedEntry<SocketRouteEntry, SocketMiddleware>;

export interface SocketRouteOptions {
  name?: string;
  middleware?: SocketMiddleware[];
  metadata?: Record<string, unknown>;
}

export type SocketRouterOptions = TreeOptions<SocketMiddleware>;

export type SocketMatchResult =
  | {
      kind: 'match';
      entry: ResolvedSocketRoute;
      route: RouteInfo;
      name?: string;
      handler: SocketHandler;
      params: PathParams;
      chain: ComposedChain<SocketContext, void>;
    }
  | { kind: 'no-path-match' };

interface CompiledSocketRoute {
  info: RouteInfo;
  chain: ComposedChain<SocketContext, void>;
}

/** Discriminator shared by every socket route: the pattern alone must be unique. */
const SOCKET_KEY: RouteKey = { key: 'SOCKET' };

export class SocketRouter extends RouteTree<SocketRouteEntry, SocketMiddleware> {
  private readonly compiled = new WeakMap<ResolvedSocketRoute, CompiledSocketRoute>();

  constructor(options: SocketRouterOptions = {}) {
    super(options);
  }

  /**
   * Registers a socket route.
   *
   * @throws DuplicateRouteError when this router already has an equivalent pattern
   */
  addRoute<T extends string>(
    template: T,
    handler: SocketHandler<InferParams<T> & PathParams>,
    options: SocketRouteOptions = {},
  ): this {
    this.register({
      pattern: compilePattern(template, this.converters),
      handler,
      name: options.name,
      middleware: [...(options.middleware ?? [])],
      metadata: { ...options.metadata },
    });
    return this;
  }

  /** Matches a handshake path. First registered wins. */
  match(path: string): SocketMatchResult {
    const segments = splitPath(path);

    for (const entry of this.resolve()) {
      const params = matchPattern(entry.pattern, segments, entry.trailingSlash);
      if (!params) continue;

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

    return { kind: 'no-path-match' };
  }

  protected routeKeys(): RouteKey[] {
    return [SOCKET_KEY];
  }

  private compile(entry: ResolvedSocketRoute): CompiledSocketRoute {
    const cached = this.compiled.get(entry);
    if (cached) return cached;

    const { handler } = entry.route;
    const compiled: CompiledSocketRoute = {
      info: Object.freeze({
        name: entry.name,
        template: entry.pattern.template,
        methods: [],
        metadata: entry.route.metadata,
      }),
      chain: composeChain(entry.middleware, async (context) => {
        await handler(context);
      }),
    };
    this.compiled.set(entry, compiled);
    return compiled;
  }
}

/** The handshake being dispatched. */
export interface SocketHandshake {
  /** Request path, without query string. */
  path: string;
  headers?: Headers;
}

/**
 * Runs one handshake through a socket router.
 *
 * Unmatched paths are refused with 404. After the chain returns, a session
 * never accepted is refused with 403 and any other session not yet CLOSED is
 * closed with 1000; a peer close still holding unread frames finishes with the
 * peer's code. When the chain throws, the session is closed with 1011 (or
 * refused with 500 before the handshake completed) and the error is rethrown.
 *
 * @returns the session, or `undefined` when no route matched
 */
export async function dispatchSocket(
  router: SocketRouter,
  transport: SocketTransport,
  handshake: SocketHandshake,
): Promise<SocketSession | undefined> {
  const result = router.match(handshake.path);
  if (result.kind === 'no-path-match') {
    await transport.reject(404);
    return undefined;
  }

  const session = new SocketSession(transport);
  const context: SocketContext = {
    session,
    params: result.params,
    route: result.route,
    headers: handshake.headers ?? new Headers(),
  };

  try {
    await result.chain(context);
  } catch (error) {
    if (session.state === 'connecting') {
      await session.reject(500);
    } else if (session.state !== 'closed') {
      await session.close(1011, 'Internal Error');
    }
    throw error;
  }

  if (session.state === 'connecting') {
    await session.reject(403);
  } else if (session.state !== 'closed') {
    await session.close(1000);
  }
  return session;
}
