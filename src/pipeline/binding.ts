/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { z } from 'zod';

import type { HttpContext } from './context.js';
import { mediaType } from './forms.js';
import { HttpHandler, pipe, setStatusCode, text } from './handlers.js';

export const defaultBindingErrorHandler = (): HttpHandler =>
  pipe(setStatusCode(400), text('Bad request'));

/**
 * Raw values to bind from: the JSON body, the form fields, or the query
 * string when the request has neither.
 */
export async function readBindingSource(ctx: HttpContext): Promise<unknown> {
  if (mediaType(ctx.request.headers['content-type']) === 'application/json') {
    return ctx.request.readJson();
  }
  if (ctx.request.form.hasFormContentType) {
    return (await ctx.request.form.readForm()).fields;
  }
  return ctx.request.query;
}

/**
 * Renames keys of `source` to the schema's own casing when they only differ
 * by case, so `name=...` binds to a `Name` property.
 */
export function alignKeys(source: unknown, keys: readonly string[]): unknown {
  if (
    typeof source !== 'object' ||
    source === null ||
    Array.isArray(source)
  ) {
    return source;
  }

  const byLowerCase = new Map(keys.map((key) => [key.toLowerCase(), key]));
  const aligned: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(source)) {
    const target = byLowerCase.get(key.toLowerCase()) ?? key;
    if (!(target in aligned) || target === key) {
      aligned[target] = value;
    }
  }
  return aligned;
}

/**
 * Binds the request to `schema` and continues with the handler built from
 * the bound model. Binding failures are logged and answered by `onError`.
 */
export function bindModel<S extends z.ZodTypeAny>(
  schema: S,
  handler: (model: z.output<S>) => HttpHandler,
  onError: (error: z.ZodError) => HttpHandler = defaultBindingErrorHandler,
): HttpHandler {
  const keys = schema instanceof z.ZodObject ? Object.keys(schema.shape) : [];
  return async (next, ctx) => {
    const source = alignKeys(await readBindingSource(ctx), keys);
    const result = await schema.safeParseAsync(source);
    if (!result.success) {
      ctx.log.debug('Model binding failed', {
        issues: result.error.issues.map(
          (issue) => `${issue.path.join('.')}: ${issue.message}`,
        ),
      });
      return onError(result.error)(next, ctx);
    }
    return handler(result.data)(next, ctx);
  };
}
