/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import express, { Handler, Request, Response } from 'express';
import { default as asyncHandler } from 'express-async-handler';

import {
  HttpContext,
  HttpResponse,
  HttpServices,
  RequestState,
} from './context.js';
import {
  ExpressFormFeature,
  FormReaderOptions,
  mediaType,
  runMiddleware,
} from './forms.js';
import type { Router } from './router.js';

function toStringRecord(source: unknown): Record<string, string> {
  const record: Record<string, string> = {};
  if (typeof source !== 'object' || source === null) {
    return record;
  }
  for (const [key, value] of Object.entries(source)) {
    if (typeof value === 'string') {
      record[key] = value;
    }
  }
  return record;
}

function toHeaderRecord(req: Request): Record<string, string | undefined> {
  const headers: Record<string, string | undefined> = {};
  for (const [name, value] of Object.entries(req.headers)) {
    headers[name] = Array.isArray(value) ? value.join(', ') : value;
  }
  return headers;
}

export function createRequestState(
  req: Request,
  res: Response,
  options: FormReaderOptions,
): RequestState {
  const jsonParser = express.json();
  return {
    method: req.method.toUpperCase(),
    path: req.path,
    query: toStringRecord(req.query),
    headers: toHeaderRecord(req),
    cookies: toStringRecord(req.cookies),
    secure: req.secure,
    signal: req.signal ?? new AbortController().signal,
    form: new ExpressFormFeature(req, res, options),
    async readJson() {
      if (mediaType(req.headers['content-type']) !== 'application/json') {
        return undefined;
      }
      await runMiddleware(jsonParser, req, res);
      return req.body;
    },
  };
}

export function writeResponse(res: Response, response: HttpResponse) {
  res.status(response.statusCode);
  for (const [name, value] of Object.entries(response.headers)) {
    res.setHeader(name, value);
  }
  for (const cookie of response.cookies) {
    if (cookie.kind === 'set') {
      res.cookie(cookie.name, cookie.value, cookie.options);
    } else {
      res.clearCookie(cookie.name, cookie.options);
    }
  }
  if (response.body !== undefined) {
    res.send(response.body);
  } else {
    res.end();
  }
}

/**
 * Mounts a router on express. Every request is authenticated with the
 * default scheme before the route table is evaluated.
 */
export function createPipelineHandler({
  router,
  services,
  form,
}: {
  router: Router;
  services: HttpServices;
  form: FormReaderOptions;
}): Handler {
  return asyncHandler(async (req: Request, res: Response) => {
    const ctx = new HttpContext({
      request: createRequestState(req, res, form),
      services: {
        ...services,
        log: services.log.child({ method: req.method, path: req.path }),
      },
    });

    await services.authentication.authenticate(ctx);
    writeResponse(res, await router.route(ctx));
  });
}
