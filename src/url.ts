/**
 * @fileoverview URL reversal: expands a compiled pattern back into a path.
 */

import {
  MissingParameterError,
  NonReversibleRouteError,
  ParameterTypeError,
  UnexpectedParameterError,
} from './errors.js';
import type { CompiledPattern, PathParams, PathSegment } from './pattern.js';

/** Formats, validates, and percent-encodes one parameter value. */
function expandParam(
  segment: Extract<PathSegment, { type: 'param' | 'greedy' }>,
  routeName: string,
  value: unknown,
): string {
  const formatted = segment.converter.format(value);
  if (!formatted.success) {
    throw new ParameterTypeError(routeName, segment.name, formatted.error);
  }
  if (!segment.matcher.test(formatted.value)) {
    throw new ParameterTypeError(
      routeName,
      segment.name,
      `'${formatted.value}' does not match the ${segment.converter.name} converter`,
    );
  }

  if (segment.type === 'greedy') {
    return formatted.value.split('/').map(encodeURIComponent).join('/');
  }
  return encodeURIComponent(formatted.value);
}

/**
 * Substitutes parameter values into a pattern.
 *
 * @param routeName - Used in error messages.
 * @throws NonReversibleRouteError when the pattern has a `*` segment
 * @throws MissingParameterError, UnexpectedParameterError, ParameterTypeError
 */
export function reverseUrl(pattern: CompiledPattern, routeName: string, params: PathParams): string {
  if (pattern.segments.some((segment) => segment.type === 'wildcard')) {
    throw new NonReversibleRouteError(routeName);
  }

  for (const key of Object.keys(params)) {
    if (!pattern.params.has(key)) {
      throw new UnexpectedParameterError(routeName, key);
    }
  }

  const parts = pattern.segments.map((segment) => {
    switch (segment.type) {
      case 'literal':
        return segment.text;
      case 'wildcard':
        throw new NonReversibleRouteError(routeName);
      case 'param':
      case 'greedy': {
        const value = params[segment.name];
        if (value === undefined || value === null) {
          throw new MissingParameterError(routeName, segment.name);
        }
        return expandParam(segment, routeName, value);
      }
    }
  });

  return `/${parts.join('/')}`;
}
