/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as winston from 'winston';

import { toError } from '../lib/error.js';
import type { HttpContext, HttpResponse } from './context.js';
import {
  HttpHandler,
  clearResponse,
  finish,
  pipe,
  setStatusCode,
  text,
} from './handlers.js';
import { isHandled } from './result.js';

export type ErrorHandler = (error: Error, log: winston.Logger) => HttpHandler;

/**
 * Logs the failure and answers 500 with the raw error message as body.
 * The message is visible to clients, so it must not carry secrets.
 */
export const defaultErrorHandler: ErrorHandler = (error, log) => {
  log.error(
    'An unhandled exception has occurred while executing the request.',
    { message: error.message, stack: error.stack },
  );
  return pipe(clearResponse, setStatusCode(500), text(error.message));
};

export const defaultNotFoundHandler: HttpHandler = pipe(
  setStatusCode(404),
  text('Not Found'),
);

/**
 * Evaluates an ordered list of pipelines. The first pipeline that does not
 * fall through decides the response, denials included. Registration order is
 * the only priority.
 */
export class Router {
  private log: winston.Logger;
  private routes: readonly HttpHandler[];
  private notFound: HttpHandler;
  private errorHandler: ErrorHandler;

  constructor({
    log,
    routes,
    notFound = defaultNotFoundHandler,
    errorHandler = defaultErrorHandler,
  }: {
    log: winston.Logger;
    routes: readonly HttpHandler[];
    notFound?: HttpHandler;
    errorHandler?: ErrorHandler;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.routes = Object.freeze([...routes]);
    this.notFound = notFound;
    this.errorHandler = errorHandler;
  }

  async route(ctx: HttpContext): Promise<HttpResponse> {
    try {
      return await this.evaluate(ctx);
    } catch (error: unknown) {
      return this.handleError(toError(error), ctx);
    }
  }

  private async evaluate(ctx: HttpContext): Promise<HttpResponse> {
    for (const [index, pipeline] of this.routes.entries()) {
      const result = await pipeline(finish, ctx);
      if (!isHandled(result)) {
        continue;
      }

      this.log.debug('Request routed', {
        method: ctx.request.method,
        path: ctx.request.path,
        pipeline: index,
        outcome: result.kind,
        statusCode: result.response.statusCode,
      });
      return result.response;
    }

    this.log.debug('No route matched', {
      method: ctx.request.method,
      path: ctx.request.path,
    });
    const result = await this.notFound(finish, ctx);
    return result.kind === 'unmatched'
      ? ctx.response.toResponse()
      : result.response;
  }

  private async handleError(
    error: Error,
    ctx: HttpContext,
  ): Promise<HttpResponse> {
    try {
      const result = await this.errorHandler(error, this.log)(finish, ctx);
      return result.kind === 'unmatched'
        ? ctx.response.toResponse()
        : result.response;
    } catch (handlerError: unknown) {
      this.log.error('Error handler failed', {
        message: toError(handlerError).message,
        stack: toError(handlerError).stack,
        originalMessage: error.message,
      });
      return { statusCode: 500, headers: {}, body: undefined, cookies: [] };
    }
  }
}
