/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import cookieParser from 'cookie-parser';
import express, { ErrorRequestHandler } from 'express';
import * as winston from 'winston';

import type { Authentication } from './auth/types.js';
import { toError } from './lib/error.js';
import { createAbortSignalMiddleware } from './middleware/abort-signal.js';
import { createPipelineHandler } from './pipeline/express.js';
import type { HttpHandler } from './pipeline/handlers.js';
import { ErrorHandler, Router } from './pipeline/router.js';
import type { ViewEngine } from './views/view-engine.js';

export interface ServerConfig {
  log: winston.Logger;
  routes: readonly HttpHandler[];
  authentication: Authentication;
  views: ViewEngine;
  maxUploadFileSize: number;
  trustProxy?: boolean;
  errorHandler?: ErrorHandler;
}

/**
 * Failures raised outside the route table (body parsers, authentication)
 * get the same treatment as the router's error boundary.
 */
function createExpressErrorHandler(log: winston.Logger): ErrorRequestHandler {
  return (err: unknown, _req, res, next) => {
    const error = toError(err);
    log.error(
      'An unhandled exception has occurred while executing the request.',
      { message: error.message, stack: error.stack },
    );
    if (res.headersSent) {
      next(err);
      return;
    }
    res.status(500).type('text/plain').send(error.message);
  };
}

export function createServer({
  log,
  routes,
  authentication,
  views,
  maxUploadFileSize,
  trustProxy = false,
  errorHandler,
}: ServerConfig): express.Express {
  const app = express();

  app.set('trust proxy', trustProxy);
  app.disable('x-powered-by');

  app.use(createAbortSignalMiddleware());
  app.use(cookieParser());

  const router = new Router({ log, routes, errorHandler });
  app.use(
    createPipelineHandler({
      router,
      services: { log, authentication, views },
      form: { maxFileSize: maxUploadFileSize },
    }),
  );

  app.use(createExpressErrorHandler(log));

  return app;
}
