/**
 * @fileoverview Path template compilation and structural matching.
 *
 * Template syntax:
 * - `/users/me` - literal segments, compared exactly
 * - `/users/{id}` - parameter using the `string` converter (never matches `/`)
 * - `/items/{id:int}` - parameter with a named converter
 * - `/files/*` - wildcard, matches exactly one segment and binds nothing
 * - `/static/{rest:path}` - greedy tail, only valid as the last segment
 *
 * Matching walks the template and the request path segment by segment. A
 * converter's regex only ever sees one segment's decoded text (or, for a
 * greedy tail, the joined remainder), so there is no backtracking across
 * segment boundaries.
 */

import type { ConverterRegistry, ParamConverter } from './converters.js';
import {
  DuplicateParameterError,
  InvalidGreedyPositionError,
  InvalidPatternError,
  UnknownConverterError,
} from './errors.js';

/** Extracted path parameters, keyed by name, already converted. */
export type PathParams = Record<string, unknown>;

/** How a trailing slash on the request path is treated. */
export type TrailingSlash = 'strict' | 'ignore';

/** One segment of a compiled template. */
export type PathSegment =
  | { type: 'literal'; raw: string; text: string }
  | { type: 'param'; raw: string; name: string; converter: ParamConverter; matcher: RegExp }
  | { type: 'wildcard'; raw: string }
  | { type: 'greedy'; raw: string; name: string; converter: ParamConverter; matcher: RegExp };

/** A compiled path template. */
export interface CompiledPattern {
  /** Normalized template text. */
  readonly template: string;
  readonly segments: readonly PathSegment[];
  /** Parameter name to converter, in template order. */
  readonly params: ReadonlyMap<string, ParamConverter>;
  /**
   * Literal-equivalent signature: parameter names are erased, converter names
   * kept, so `/users/{id}` and `/users/{uid}` share a key.
   */
  readonly key: string;
}

const PARAM_NAME_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Compiles a segment matcher anchored to the whole text. */
function anchored(converter: ParamConverter): RegExp {
  return new RegExp(`^(?:${converter.regex})$`);
}

/** Classifies one raw template segment. */
function compileSegment(
  raw: string,
  template: string,
  converters: ConverterRegistry,
): PathSegment {
  if (raw === '*') {
    return { type: 'wildcard', raw };
  }

  if (raw.startsWith('{') && raw.endsWith('}')) {
    const inner = raw.slice(1, -1);
    if (inner.includes('{') || inner.includes('}')) {
      throw new InvalidPatternError(template, `nested braces in '${raw}'`);
    }

    const colon = inner.indexOf(':');
    const name = colon === -1 ? inner : inner.slice(0, colon);
    const converterName = colon === -1 ? 'string' : inner.slice(colon + 1);

    if (!PARAM_NAME_RE.test(name)) {
      throw new InvalidPatternError(template, `invalid parameter name '${name}'`);
    }

    const converter = converters.get(converterName);
    if (!converter) {
      throw new UnknownConverterError(converterName, template);
    }

    return converter.greedy
      ? { type: 'greedy', raw, name, converter, matcher: anchored(converter) }
      : { type: 'param', raw, name, converter, matcher: anchored(converter) };
  }

  if (raw.includes('{') || raw.includes('}')) {
    throw new InvalidPatternError(template, `parameter must span the whole segment in '${raw}'`);
  }

  return { type: 'literal', raw, text: raw };
}

/** Renders segments back to template text. */
function renderTemplate(segments: readonly PathSegment[]): string {
  return `/${segments.map((segment) => segment.raw).join('/')}`;
}

/** Builds the literal-equivalent key of a segment list. */
function renderKey(segments: readonly PathSegment[]): string {
  const parts = segments.map((segment) => {
    switch (segment.type) {
      case 'literal':
        return segment.text;
      case 'wildcard':
        return '*';
      case 'param':
      case 'greedy':
        return `{:${segment.converter.name}}`;
    }
  });
  return `/${parts.join('/')}`;
}

/**
 * Validates a segment list and wraps it as a pattern.
 *
 * Duplicate names and greedy placement are checked here so that joined
 * (prefix + route) patterns get the same checks as single templates.
 */
function buildPattern(segments: readonly PathSegment[]): CompiledPattern {
  const template = renderTemplate(segments);
  const params = new Map<string, ParamConverter>();

  segments.forEach((segment, index) => {
    if (segment.type !== 'param' && segment.type !== 'greedy') return;

    if (params.has(segment.name)) {
      throw new DuplicateParameterError(segment.name, template);
    }
    if (segment.type === 'greedy' && index !== segments.length - 1) {
      throw new InvalidGreedyPositionError(segment.name, template);
    }
    params.set(segment.name, segment.converter);
  });

  return { template, segments, params, key: renderKey(segments) };
}

/**
 * Compiles a path template against a converter registry.
 *
 * @throws InvalidPatternError when the template does not start with `/` or a
 *   segment is malformed
 * @throws UnknownConverterError, DuplicateParameterError, InvalidGreedyPositionError
 */
export function compilePattern(template: string, converters: ConverterRegistry): CompiledPattern {
  if (!template.startsWith('/')) {
    throw new InvalidPatternError(template, "must start with '/'");
  }

  const body = template.slice(1);
  const raws = body === '' ? [] : body.split('/');
  return buildPattern(raws.map((raw) => compileSegment(raw, template, converters)));
}

/**
 * Normalizes and compiles a mount prefix. `''` and `'/'` are the empty prefix;
 * a trailing slash is dropped.
 */
export function compilePrefix(prefix: string, converters: ConverterRegistry): CompiledPattern {
  const trimmed = prefix.replace(/\/+$/, '');
  if (trimmed === '') {
    return buildPattern([]);
  }
  return compilePattern(trimmed, converters);
}

/** Concatenates a prefix and a pattern, re-validating the joined template. */
export function joinPatterns(prefix: CompiledPattern, pattern: CompiledPattern): CompiledPattern {
  if (prefix.segments.length === 0) return pattern;
  return buildPattern([...prefix.segments, ...pattern.segments]);
}

/** Decodes one path segment; `undefined` when it is not valid percent-encoding. */
function decodeSegment(raw: string): string | undefined {
  try {
    return decodeURIComponent(raw);
  } catch {
    return undefined;
  }
}

/**
 * Splits a request path into decoded segments. Undecodable segments come back
 * as `undefined` and never match a literal or parameter.
 */
export function splitPath(
  path: string,
  trailingSlash: TrailingSlash = 'strict',
): (string | undefined)[] {
  const body = path.startsWith('/') ? path.slice(1) : path;
  if (body === '') return [];

  const raws = body.split('/');
  if (trailingSlash === 'ignore' && raws.length > 1 && raws[raws.length - 1] === '') {
    raws.pop();
  }
  return raws.map(decodeSegment);
}

/** Pattern segments, minus a trailing empty literal when slashes are ignored. */
function effectiveSegments(
  pattern: CompiledPattern,
  trailingSlash: TrailingSlash,
): readonly PathSegment[] {
  const { segments } = pattern;
  const last = segments[segments.length - 1];
  if (trailingSlash === 'ignore' && segments.length > 1 && last?.type === 'literal' && last.text === '') {
    return segments.slice(0, -1);
  }
  return segments;
}

/** Runs a converter over matched text. */
function convert(
  segment: Extract<PathSegment, { type: 'param' | 'greedy' }>,
  text: string,
): { value: unknown } | undefined {
  if (!segment.matcher.test(text)) return undefined;
  const result = segment.converter.parse(text);
  return result.success ? { value: result.value } : undefined;
}

/**
 * Structurally matches split path segments against a pattern.
 *
 * Under 'ignore', a trailing slash on either side is dropped before matching,
 * so a path split with the default policy can be matched under both.
 *
 * @returns the converted parameters, or `undefined` when the path does not match
 */
export function matchPattern(
  pattern: CompiledPattern,
  requested: readonly (string | undefined)[],
  trailingSlash: TrailingSlash = 'strict',
): PathParams | undefined {
  const segments = effectiveSegments(pattern, trailingSlash);
  const path =
    trailingSlash === 'ignore' && requested.length > 1 && requested[requested.length - 1] === ''
      ? requested.slice(0, -1)
      : requested;
  const params: PathParams = {};

  for (let i = 0; i < segments.length; i++) {
    const segment = segments[i];

    if (segment.type === 'greedy') {
      const rest = path.slice(i);
      if (rest.length === 0) return undefined;

      const parts: string[] = [];
      for (const part of rest) {
        if (part === undefined) return undefined;
        parts.push(part);
      }

      const converted = convert(segment, parts.join('/'));
      if (!converted) return undefined;
      params[segment.name] = converted.value;
      return params;
    }

    const text = path[i];
    if (text === undefined) return undefined;

    switch (segment.type) {
      case 'literal':
        if (text !== segment.text) return undefined;
        break;
      case 'wildcard':
        if (text === '') return undefined;
        break;
      case 'param': {
        const converted = convert(segment, text);
        if (!converted) return undefined;
        params[segment.name] = converted.value;
        break;
      }
    }
  }

  return path.length === segments.length ? params : undefined;
}
