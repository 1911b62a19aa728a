/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Handler, Request, Response } from 'express';

/**
 * Middleware that attaches an AbortSignal to each request. The signal is
 * aborted when the connection closes before the response completes, so
 * streaming form reads stop once the client has gone away.
 *
 * The response's `close` event is used rather than the request's: the
 * request emits `close` as soon as its body has been read, which is normal
 * for uploads.
 */
export function createAbortSignalMiddleware(): Handler {
  return (req: Request, res: Response, next) => {
    const controller = new AbortController();

    res.on('close', () => {
      if (!res.writableEnded) {
        controller.abort();
      }
    });

    req.signal = controller.signal;

    next();
  };
}
