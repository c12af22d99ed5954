/**
 * @fileoverview Core type definitions for the routing library.
 *
 * **Templates:**
 * - `/users` - literal segment
 * - `/users/{id}` - string parameter
 * - `/users/{id:int}` - typed parameter (`int`, `float`, `uuid`, `path`, or custom)
 * - `/files/*` - one-segment wildcard
 *
 * Parameter types are inferred from the template, so a handler registered on
 * `/items/{id:int}` sees `c.params.id` as a `number`.
 */

import type { MiddlewareContext } from './middleware.js';
import type { PathParams } from './pattern.js';

/** Standard HTTP methods. */
export type Method = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'OPTIONS' | 'HEAD';

/** Methods a route accepts when none are given. */
export const DEFAULT_METHODS: readonly Method[] = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'];

/** Execution context for background tasks (Cloudflare Workers compatible). */
export interface ExecutionContext {
  waitUntil(promise: Promise<unknown>): void;
  passThroughOnException(): void;
}

/** Public description of a matched route. */
export interface RouteInfo {
  /** Fully-qualified route name, if the route has one. */
  readonly name?: string;
  /** Fully-qualified template, mount prefixes included. */
  readonly template: string;
  /** Methods the route accepts (empty for socket routes). */
  readonly methods: readonly string[];
  /** Opaque values given at registration. */
  readonly metadata: Readonly<Record<string, unknown>>;
}

/**
 * Value types produced by named converters.
 *
 * Augment this interface to type custom converters:
 * ```typescript
 * declare module 'tramline' {
 *   interface ConverterTypeMap {
 *     year: number;
 *   }
 * }
 * ```
 */
export interface ConverterTypeMap {
  string: string;
  int: number;
  float: number;
  uuid: string;
  path: string;
}

/** Parameter type of one template segment. */
type SegmentParam<S extends string> = S extends `{${infer Name}:${infer Converter}}`
  ? { [K in Name]: Converter extends keyof ConverterTypeMap ? ConverterTypeMap[Converter] : unknown }
  : S extends `{${infer Name}}`
    ? { [K in Name]: string }
    : {};

/**
 * Infers the parameter object of a template.
 *
 * @example
 * ```typescript
 * type P = InferParams<'/orgs/{org}/items/{id:int}'>;
 * // { org: string } & { id: number }
 * ```
 */
export type InferParams<T extends string> = T extends `${infer Head}/${infer Rest}`
  ? SegmentParam<Head> & InferParams<Rest>
  : SegmentParam<T>;

/** Handler context with typed path parameters. */
export interface Context<P extends PathParams = PathParams> extends MiddlewareContext {
  params: P;
}

/**
 * Request handler. May return a `Response`, a JSON-serialisable value (sent
 * with `Response.json`) or nothing (204).
 */
export type Handler<P extends PathParams = PathParams> = {
  // Method syntax lets handlers with narrower params be stored as Handler.
  bivarianceHack(context: Context<P>): unknown;
}['bivarianceHack'];

/** Handler function signature for the fetch handler. */
export type FetchHandler = (
  request: Request,
  env?: unknown,
  ctx?: ExecutionContext,
) => Promise<Response>;
