/**
 * @fileoverview Error classes raised by the routing core.
 *
 * Errors fall into four groups:
 * - **Construction** - a route table that cannot be built. These indicate a
 *   programming mistake and should abort startup.
 * - **Reverse lookup** - `urlFor()` could not expand a route.
 * - **Socket** - a session operation that its current state does not allow.
 * - **Chain** - a middleware unit misused its `next` callable.
 *
 * Dispatch misses (no route, wrong method) are not errors; see `MatchResult`.
 */

/** Base class for every error thrown by the routing core. */
export class RouterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// =============================================================================
// Construction
// =============================================================================

/** A path template is malformed. */
export class InvalidPatternError extends RouterError {
  constructor(
    public readonly template: string,
    detail: string,
  ) {
    super(`Invalid path template '${template}': ${detail}`);
  }
}

/** A `{name:converter}` segment names a converter that is not registered. */
export class UnknownConverterError extends RouterError {
  constructor(
    public readonly converter: string,
    public readonly template: string,
  ) {
    super(`Unknown converter '${converter}' in '${template}'`);
  }
}

/** A converter is registered twice under the same name. */
export class DuplicateConverterError extends RouterError {
  constructor(public readonly converter: string) {
    super(`Converter '${converter}' is already registered`);
  }
}

/** The same parameter name appears twice in one (possibly prefixed) template. */
export class DuplicateParameterError extends RouterError {
  constructor(
    public readonly parameter: string,
    public readonly template: string,
  ) {
    super(`Parameter '${parameter}' appears more than once in '${template}'`);
  }
}

/** A `path` parameter is used anywhere but the final segment. */
export class InvalidGreedyPositionError extends RouterError {
  constructor(
    public readonly parameter: string,
    public readonly template: string,
  ) {
    super(`Path parameter '${parameter}' must be the last segment of '${template}'`);
  }
}

/** A route registration is invalid (for example an empty method list). */
export class InvalidRouteError extends RouterError {}

/** Two routes share a method and an equivalent pattern. */
export class DuplicateRouteError extends RouterError {
  constructor(
    public readonly method: string | undefined,
    public readonly template: string,
  ) {
    super(
      method
        ? `Route ${method} ${template} is already registered`
        : `Route ${template} is already registered`,
    );
  }
}

/** Two routes in one table share a name. */
export class DuplicateRouteNameError extends RouterError {
  constructor(public readonly routeName: string) {
    super(`Route name '${routeName}' is already in use`);
  }
}

/** Two sibling mounts share an effective prefix. */
export class PrefixCollisionError extends RouterError {
  constructor(public readonly prefix: string) {
    super(`A router is already mounted at '${prefix || '/'}'`);
  }
}

/** Mounting would make a router its own descendant. */
export class CyclicMountError extends RouterError {
  constructor() {
    super('Cannot mount a router inside itself or one of its descendants');
  }
}

// =============================================================================
// Reverse lookup
// =============================================================================

/** No route carries the requested name. */
export class UnknownRouteNameError extends RouterError {
  constructor(public readonly routeName: string) {
    super(`No route named '${routeName}'`);
  }
}

/** A parameter the template needs was not supplied. */
export class MissingParameterError extends RouterError {
  constructor(
    public readonly routeName: string,
    public readonly parameter: string,
  ) {
    super(`Missing parameter '${parameter}' for route '${routeName}'`);
  }
}

/** A supplied parameter names nothing in the template. */
export class UnexpectedParameterError extends RouterError {
  constructor(
    public readonly routeName: string,
    public readonly parameter: string,
  ) {
    super(`Route '${routeName}' has no parameter '${parameter}'`);
  }
}

/** A supplied value fails its converter. */
export class ParameterTypeError extends RouterError {
  constructor(
    public readonly routeName: string,
    public readonly parameter: string,
    detail: string,
  ) {
    super(`Invalid value for parameter '${parameter}' of route '${routeName}': ${detail}`);
  }
}

/** The template contains a `*` segment, which has no bound value. */
export class NonReversibleRouteError extends RouterError {
  constructor(public readonly routeName: string) {
    super(`Route '${routeName}' contains a wildcard segment and cannot be reversed`);
  }
}

// =============================================================================
// Socket sessions
// =============================================================================

/** The operation is not allowed in the session's current state. */
export class SessionStateError extends RouterError {
  constructor(
    public readonly state: string,
    operation: string,
  ) {
    super(`Cannot ${operation} while the session is ${state}`);
  }
}

/** The session is closing or closed. Carries the close code and reason. */
export class SessionClosedError extends RouterError {
  constructor(
    public readonly code: number,
    public readonly reason: string,
  ) {
    super(reason ? `Session closed (${code}): ${reason}` : `Session closed (${code})`);
  }
}

/** A received message does not have the expected kind or encoding. */
export class MessageTypeError extends RouterError {}

// =============================================================================
// Middleware chain
// =============================================================================

/** A middleware unit called `next()` more than once. */
export class MiddlewareError extends RouterError {}
