/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { describe, it } from 'node:test';
import express from 'express';
import { default as request } from 'supertest';

import { createAbortSignalMiddleware } from './abort-signal.js';

describe('createAbortSignalMiddleware', () => {
  it('should leave the signal untouched when the response completes', async () => {
    let signal: AbortSignal | undefined;
    const app = express();
    app.use(createAbortSignalMiddleware());
    app.get('/', (req, res) => {
      signal = req.signal;
      res.send('ok');
    });

    await request(app).get('/').expect(200, 'ok');

    assert.ok(signal !== undefined);
    assert.equal(signal.aborted, false);
  });

  it('should abort the signal when the connection closes early', async () => {
    const app = express();
    app.use(createAbortSignalMiddleware());
    const aborted = new Promise<boolean>((resolve) => {
      app.get('/', (req, res) => {
        req.signal?.addEventListener('abort', () => resolve(true));
        res.destroy();
      });
    });

    await assert.rejects(request(app).get('/'));

    assert.equal(await aborted, true);
  });
});
