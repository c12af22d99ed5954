/**
 * @fileoverview Path parameter converters.
 *
 * A converter validates one parameter's text and turns it into a typed value
 * (and back, for URL reversal). Templates select a converter by name with
 * `{name:converter}`; `{name}` uses `string`.
 *
 * Built-ins:
 * - `string` - any non-empty segment without `/`
 * - `int` - signed integer, yields a `number`
 * - `float` - signed decimal, yields a `number`
 * - `uuid` - 8-4-4-4-12 hex, yields the lower-cased string
 * - `path` - the rest of the path including `/`; only valid as the last segment
 *
 * @example
 * ```typescript
 * const converters = createConverterRegistry();
 * converters.register(regexConverter('slug', '[a-z0-9-]+'));
 * converters.register(regexConverter('year', '[0-9]{4}', { parse: Number }));
 *
 * const router = new Router({ converters });
 * router.get('/posts/{slug:slug}', (c) => ({ slug: c.params.slug }));
 * ```
 */

import { DuplicateConverterError } from './errors.js';

/** Outcome of parsing or formatting a parameter value. */
export type ConversionResult<T> =
  | { success: true; value: T; error?: undefined }
  | { success: false; value?: undefined; error: string };

/** A named parser/validator for one path parameter type. */
export interface ParamConverter<T = unknown> {
  /** Name used in `{param:name}`. */
  readonly name: string;
  /** Regex source the decoded text must match in full. */
  readonly regex: string;
  /** Consumes the remaining path, slashes included. */
  readonly greedy?: boolean;
  /** Parses matched text into a typed value. */
  parse(raw: string): ConversionResult<T>;
  /** Formats a value back to (unencoded) path text. */
  format(value: unknown): ConversionResult<string>;
}

/** Builds a successful conversion result. */
export function ok<T>(value: T): ConversionResult<T> {
  return { success: true, value };
}

/** Builds a failed conversion result. */
export function fail<T>(error: string): ConversionResult<T> {
  return { success: false, error };
}

/** Formats strings (and finite numbers) as-is. */
function formatText(value: unknown): ConversionResult<string> {
  if (typeof value === 'string') return ok(value);
  if (typeof value === 'number' && Number.isFinite(value)) return ok(String(value));
  return fail(`expected a string, got ${typeof value}`);
}

const INT_RE = /^-?[0-9]+$/;
const FLOAT_RE = /^-?[0-9]+(?:\.[0-9]+)?$/;
const UUID_SOURCE = '[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}';

export const stringConverter: ParamConverter<string> = {
  name: 'string',
  regex: '[^/]+',
  parse: (raw) => ok(raw),
  format: formatText,
};

export const intConverter: ParamConverter<number> = {
  name: 'int',
  regex: '-?[0-9]+',
  parse(raw) {
    const value = Number.parseInt(raw, 10);
    return Number.isSafeInteger(value) ? ok(value) : fail(`'${raw}' is out of integer range`);
  },
  format(value) {
    if (typeof value === 'number') {
      return Number.isSafeInteger(value) ? ok(String(value)) : fail(`${value} is not an integer`);
    }
    if (typeof value === 'string' && INT_RE.test(value)) {
      return ok(String(Number.parseInt(value, 10)));
    }
    return fail(`expected an integer, got ${JSON.stringify(value)}`);
  },
};

export const floatConverter: ParamConverter<number> = {
  name: 'float',
  regex: '-?[0-9]+(?:\\.[0-9]+)?',
  parse(raw) {
    const value = Number.parseFloat(raw);
    return Number.isFinite(value) ? ok(value) : fail(`'${raw}' is not a finite number`);
  },
  format(value) {
    if (typeof value === 'number' && Number.isFinite(value)) {
      return ok(String(value));
    }
    if (typeof value === 'string' && FLOAT_RE.test(value)) {
      return ok(value);
    }
    return fail(`expected a number, got ${JSON.stringify(value)}`);
  },
};

export const uuidConverter: ParamConverter<string> = {
  name: 'uuid',
  regex: UUID_SOURCE,
  parse: (raw) => ok(raw.toLowerCase()),
  format(value) {
    if (typeof value === 'string' && new RegExp(`^${UUID_SOURCE}$`).test(value)) {
      return ok(value.toLowerCase());
    }
    return fail(`expected a UUID, got ${JSON.stringify(value)}`);
  },
};

export const pathConverter: ParamConverter<string> = {
  name: 'path',
  regex: '.+',
  greedy: true,
  parse: (raw) => ok(raw),
  format: formatText,
};

/** The converters every registry starts with. */
export const BUILTIN_CONVERTERS: readonly ParamConverter[] = [
  stringConverter,
  intConverter,
  floatConverter,
  uuidConverter,
  pathConverter,
];

/** Parsing and formatting hooks for {@link regexConverter}. */
export interface RegexConverterOptions<T> {
  /** Turns matched text into a value. Throwing rejects the segment. */
  parse: (raw: string) => T;
  /** Turns a value back into path text for `urlFor()`. */
  format?: (value: unknown) => string | undefined;
}

/**
 * Creates a custom converter from a regex fragment.
 *
 * The regex is matched against a single segment's decoded text. Without a
 * `parse` hook the value stays a string.
 */
export function regexConverter(name: string, regex: string): ParamConverter<string>;
export function regexConverter<T>(
  name: string,
  regex: string,
  options: RegexConverterOptions<T>,
): ParamConverter<T>;
export function regexConverter<T>(
  name: string,
  regex: string,
  options?: RegexConverterOptions<T>,
): ParamConverter<T | string> {
  const matcher = new RegExp(`^(?:${regex})$`);
  const parse = options?.parse;
  const format = options?.format ?? ((value: unknown) => formatText(value).value);

  return {
    name,
    regex,
    parse(raw) {
      if (!parse) return ok(raw);
      try {
        return ok(parse(raw));
      } catch (error) {
        return fail(error instanceof Error ? error.message : String(error));
      }
    },
    format(value) {
      const text = format(value);
      if (text === undefined || !matcher.test(text)) {
        return fail(`${JSON.stringify(value)} does not match /${regex}/`);
      }
      return ok(text);
    },
  };
}

/** Named converter lookup used when compiling templates. */
export class ConverterRegistry {
  private readonly converters = new Map<string, ParamConverter>();

  constructor(converters: Iterable<ParamConverter> = BUILTIN_CONVERTERS) {
    for (const converter of converters) {
      this.register(converter);
    }
  }

  /** Adds a converter. Names are unique within a registry. */
  register(converter: ParamConverter): this {
    if (this.converters.has(converter.name)) {
      throw new DuplicateConverterError(converter.name);
    }
    this.converters.set(converter.name, converter);
    return this;
  }

  get(name: string): ParamConverter | undefined {
    return this.converters.get(name);
  }

  has(name: string): boolean {
    return this.converters.has(name);
  }

  /** Registered converter names, in registration order. */
  names(): string[] {
    return [...this.converters.keys()];
  }
}

/** Creates a registry holding the built-in converters. */
export function createConverterRegistry(): ConverterRegistry {
  return new ConverterRegistry();
}
