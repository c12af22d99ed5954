/**
 * @fileoverview tramline - request routing and dispatch for fetch-style
 * handlers and socket sessions.
 *
 * ## Core Concepts
 *
 * - **Templates** - `/users/{id:int}`, `/files/*`, `/static/{rest:path}` with
 *   typed converters
 * - **Routers** - Register routes, mount child routers under prefixes, and
 *   wrap them in onion-ordered middleware
 * - **Matching** - First registered route wins; unknown paths and unsupported
 *   methods come back as values, not errors
 * - **Reversal** - Build paths from route names with `urlFor`
 * - **Sockets** - The same templates route handshakes to session handlers
 *
 * ## Quick Start
 *
 * ```typescript
 * import { Router } from 'tramline';
 *
 * const users = new Router({ prefix: '/users', name: 'users' });
 * users.get('/', async () => db.users.list(), { name: 'list' });
 * users.get('/{id:int}', async (c) => db.users.get(c.params.id), { name: 'detail' });
 *
 * const api = new Router({ prefix: '/api' });
 * api.mount(users);
 *
 * api.urlFor('users.detail', { id: 42 }); // '/api/users/42'
 * export default { fetch: api.handler() };
 * ```
 *
 * Middleware lives in `tramline/middleware`, the Hono adapter in
 * `tramline/hono`, and the Node.js `ws` adapter in `tramline/ws`.
 */

// Converters.
export {
  BUILTIN_CONVERTERS,
  type ConversionResult,
  ConverterRegistry,
  createConverterRegistry,
  floatConverter,
  intConverter,
  type ParamConverter,
  pathConverter,
  type RegexConverterOptions,
  regexConverter,
  stringConverter,
  uuidConverter,
} from './converters.js';
// Errors.
export * from './errors.js';
// Fetch handler.
export { createHandler, type HandlerOptions, methodNotAllowedResponse } from './handler.js';
// Matching.
export { Matcher, type MatcherOptions, type MatchResult, toResponse } from './matcher.js';
// In-process socket transport.
export {
  MemoryTransport,
  type MemoryTransportOptions,
  type MemoryTransportStatus,
} from './memory-transport.js';
// Middleware types and chain composition.
export {
  type ChainNext,
  type ChainUnit,
  type ComposedChain,
  compose,
  composeChain,
  type Middleware,
  type MiddlewareContext,
  type MiddlewareNext,
  runMiddleware,
} from './middleware.js';
// Path templates.
export {
  type CompiledPattern,
  compilePattern,
  joinPatterns,
  matchPattern,
  type PathParams,
  type PathSegment,
  splitPath,
  type TrailingSlash,
} from './pattern.js';
// Routers.
export {
  type MethodRouteOptions,
  type ResolvedRoute,
  type RouteEntry,
  type RouteOptions,
  Router,
  type RouterOptions,
} from './router.js';
// Socket sessions.
export {
  ABNORMAL_CLOSURE,
  type AcceptOptions,
  type CloseInfo,
  type JsonMode,
  type SessionState,
  type SocketMessage,
  SocketSession,
  type SocketTransport,
  type TransportListener,
} from './socket.js';
export { type BroadcastReport, SocketGroup } from './socket-group.js';
export {
  dispatchSocket,
  type ResolvedSocketRoute,
  type SocketContext,
  type SocketHandler,
  type SocketHandshake,
  type SocketMatchResult,
  type SocketMiddleware,
  type SocketRouteEntry,
  type SocketRouteOptions,
  SocketRouter,
  type SocketRouterOptions,
  type TypedSocketContext,
} from './socket-router.js';
// Route trees.
export type { DeclaredRoute, ResolvedEntry, RouteKey, TreeOptions } from './tree.js';
// URL reversal.
export { reverseUrl } from './url.js';
// Core type definitions.
export {
  type Context,
  type ConverterTypeMap,
  DEFAULT_METHODS,
  type ExecutionContext,
  type FetchHandler,
  type Handler,
  type InferParams,
  type Method,
  type RouteInfo,
} from './types.js';
