/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { contentTypes, headerNames } from '../constants.js';
import type { HttpContext } from './context.js';
import {
  Denied,
  HandlerResult,
  denied,
  isHandled,
  matched,
  unmatched,
} from './result.js';

/**
 * Continuation of a pipeline: everything that runs after the current stage.
 */
export type HttpFunc = (ctx: HttpContext) => Promise<HandlerResult>;

/**
 * A pipeline stage. A stage either calls `next` to pass control on, returns
 * `unmatched` to fall through, or returns a result of its own to stop the
 * pipeline.
 */
export type HttpHandler = (
  next: HttpFunc,
  ctx: HttpContext,
) => Promise<HandlerResult>;

/**
 * Terminal continuation. Ends a pipeline with whatever the context's response
 * holds.
 */
export const finish: HttpFunc = async (ctx) =>
  matched(ctx.response.toResponse());

//
// Combinators
//

/**
 * Sequences two handlers (`first >=> second`). `second` only runs when
 * `first` passes control on; otherwise the outcome of `first` is returned
 * untouched.
 */
export function compose(first: HttpHandler, second: HttpHandler): HttpHandler {
  return (next, ctx) => first((c) => second(next, c), ctx);
}

export function pipe(...handlers: HttpHandler[]): HttpHandler {
  if (handlers.length === 0) {
    return (next, ctx) => next(ctx);
  }
  return handlers.reduce(compose);
}

/**
 * Tries each handler in order and returns the first outcome that is not
 * `unmatched`. A `denied` outcome stops the search like a match does.
 */
export function choose(handlers: readonly HttpHandler[]): HttpHandler {
  const alternatives = [...handlers];
  return async (next, ctx) => {
    for (const handler of alternatives) {
      const result = await handler(next, ctx);
      if (isHandled(result)) {
        return result;
      }
    }
    return unmatched;
  };
}

/**
 * Builds the handler anew for every request. Without it, values computed while
 * assembling a route table are fixed for the lifetime of the process.
 */
export function warbler(
  factory: (ctx: HttpContext) => HttpHandler,
): HttpHandler {
  return (next, ctx) => factory(ctx)(next, ctx);
}

/**
 * Runs `handler` to completion and turns its outcome into a denial. Used by
 * guards to stop the pipeline with their failure response.
 */
export async function shortCircuit(
  handler: HttpHandler,
  ctx: HttpContext,
): Promise<Denied> {
  const result = await handler(finish, ctx);
  return denied(
    result.kind === 'unmatched' ? ctx.response.toResponse() : result.response,
  );
}

//
// Verbs and paths
//

export function httpVerb(method: string): HttpHandler {
  const expected = method.toUpperCase();
  return async (next, ctx) =>
    ctx.request.method === expected ? next(ctx) : unmatched;
}

export const GET = httpVerb('GET');
export const POST = httpVerb('POST');
export const PUT = httpVerb('PUT');
export const PATCH = httpVerb('PATCH');
export const DELETE = httpVerb('DELETE');
export const HEAD = httpVerb('HEAD');
export const OPTIONS = httpVerb('OPTIONS');

export function route(path: string): HttpHandler {
  return async (next, ctx) =>
    ctx.request.path === path ? next(ctx) : unmatched;
}

export function routeCi(path: string): HttpHandler {
  const expected = path.toLowerCase();
  return async (next, ctx) =>
    ctx.request.path.toLowerCase() === expected ? next(ctx) : unmatched;
}

export function routeStartsWith(prefix: string): HttpHandler {
  return async (next, ctx) =>
    ctx.request.path.startsWith(prefix) ? next(ctx) : unmatched;
}

//
// Response writers
//

export function setStatusCode(statusCode: number): HttpHandler {
  return async (next, ctx) => {
    ctx.response.statusCode = statusCode;
    return next(ctx);
  };
}

export function setHttpHeader(name: string, value: string): HttpHandler {
  return async (next, ctx) => {
    ctx.response.setHeader(name, value);
    return next(ctx);
  };
}

export const clearResponse: HttpHandler = async (next, ctx) => {
  ctx.response.clear();
  return next(ctx);
};

function respond(ctx: HttpContext, contentType: string, body: string) {
  ctx.response.setHeader(headerNames.contentType, contentType);
  ctx.response.body = body;
  return finish(ctx);
}

// Responders end the pipeline: `next` is deliberately not called

export function text(body: string): HttpHandler {
  return async (_next, ctx) => respond(ctx, contentTypes.text, body);
}

export function json(value: unknown): HttpHandler {
  return async (_next, ctx) =>
    respond(ctx, contentTypes.json, JSON.stringify(value) ?? 'null');
}

export function htmlString(html: string): HttpHandler {
  return async (_next, ctx) => respond(ctx, contentTypes.html, html);
}

/**
 * Renders a named view through the configured view engine.
 */
export function htmlView(viewName: string, model: unknown): HttpHandler {
  return async (_next, ctx) =>
    respond(
      ctx,
      contentTypes.html,
      await ctx.services.views.render(viewName, model),
    );
}

export function redirectTo(permanent: boolean, location: string): HttpHandler {
  return async (_next, ctx) => {
    ctx.response.statusCode = permanent ? 301 : 302;
    ctx.response.setHeader(headerNames.location, location);
    return finish(ctx);
  };
}
