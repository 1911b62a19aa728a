/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import type { HttpHandler } from './handlers.js';
import { unmatched } from './result.js';

type FormatSpecifier = 's' | 'i' | 'd' | 'f' | 'b' | 'c';

type FormatValue<C extends FormatSpecifier> = C extends 'i' | 'f'
  ? number
  : C extends 'd'
    ? bigint
    : C extends 'b'
      ? boolean
      : string;

type RouteValue = string | number | bigint | boolean;

type ParseFormat<T extends string> =
  T extends `${string}%${infer C}${infer Rest}`
    ? C extends '%'
      ? ParseFormat<Rest>
      : C extends FormatSpecifier
        ? [FormatValue<C>, ...ParseFormat<Rest>]
        : ParseFormat<Rest>
    : [];

/**
 * Values captured by a route template, in order. `'/user/%i/%s'` yields
 * `[number, string]`.
 */
export type RouteFormatArgs<T extends string> = Extract<
  ParseFormat<T>,
  RouteValue[]
>;

interface Segment {
  specifier: FormatSpecifier;
  pattern: string;
  parse: (value: string) => RouteValue | undefined;
}

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

const segments: Record<FormatSpecifier, Segment> = {
  s: { specifier: 's', pattern: '([^/]+)', parse: (value) => value },
  i: {
    specifier: 'i',
    pattern: '([+-]?\\d+)',
    parse: (value) => {
      const parsed = Number(value);
      return parsed >= INT32_MIN && parsed <= INT32_MAX ? parsed : undefined;
    },
  },
  d: {
    specifier: 'd',
    pattern: '([+-]?\\d+)',
    parse: (value) => BigInt(value.startsWith('+') ? value.slice(1) : value),
  },
  f: {
    specifier: 'f',
    pattern: '([+-]?\\d+(?:\\.\\d+)?)',
    parse: (value) => Number(value),
  },
  b: {
    specifier: 'b',
    pattern: '([tT][rR][uU][eE]|[fF][aA][lL][sS][eE])',
    parse: (value) => value.toLowerCase() === 'true',
  },
  c: { specifier: 'c', pattern: '([^/])', parse: (value) => value },
};

function isFormatSpecifier(value: string): value is FormatSpecifier {
  return value in segments;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export interface RouteTemplate<T extends string> {
  readonly template: T;
  readonly specifiers: readonly FormatSpecifier[];
  match(path: string): RouteFormatArgs<T> | undefined;
}

/**
 * Compiles a printf style route template into a matcher. Throws on unknown
 * specifiers so broken route tables fail at startup.
 */
export function compileRouteTemplate<T extends string>(
  template: T,
): RouteTemplate<T> {
  const parsers: Segment[] = [];
  let pattern = '';
  let literal = '';

  for (let index = 0; index < template.length; index++) {
    const char = template[index];
    if (char !== '%') {
      literal += char;
      continue;
    }

    const specifier = template[index + 1] ?? '';
    index++;
    if (specifier === '%') {
      literal += '%';
      continue;
    }
    if (!isFormatSpecifier(specifier)) {
      throw new Error(
        `Invalid format specifier '%${specifier}' in route template '${template}'`,
      );
    }

    pattern += escapeRegExp(literal) + segments[specifier].pattern;
    literal = '';
    parsers.push(segments[specifier]);
  }
  pattern += escapeRegExp(literal);

  const regex = new RegExp(`^${pattern}$`);
  const isArgs = (values: RouteValue[]): values is RouteFormatArgs<T> &
    RouteValue[] => values.length === parsers.length;

  return {
    template,
    specifiers: parsers.map((segment) => segment.specifier),
    match(path) {
      const found = regex.exec(path);
      if (found === null) {
        return undefined;
      }

      const values: RouteValue[] = [];
      for (const [index, segment] of parsers.entries()) {
        let decoded: string;
        try {
          decoded = decodeURIComponent(found[index + 1]);
        } catch {
          // Malformed percent-encoding
          return undefined;
        }
        const value = segment.parse(decoded);
        if (value === undefined) {
          return undefined;
        }
        values.push(value);
      }

      return isArgs(values) ? values : undefined;
    },
  };
}

/**
 * Matches the request path against a typed template and hands the captured
 * values to `factory`. Falls through when the path does not match.
 *
 * @example
 * ```typescript
 * routef('/user/%i', (id) => text(`User ID: ${id}`));
 * ```
 */
export function routef<T extends string>(
  template: T,
  factory: (...args: RouteFormatArgs<T>) => HttpHandler,
): HttpHandler {
  const compiled = compileRouteTemplate(template);
  return async (next, ctx) => {
    const args = compiled.match(ctx.request.path);
    if (args === undefined) {
      return unmatched;
    }
    return factory(...args)(next, ctx);
  };
}
