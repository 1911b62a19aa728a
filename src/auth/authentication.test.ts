/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { describe, it } from 'node:test';

import { claimTypes } from '../constants.js';
import { createTestContext } from '../../test/stubs.js';
import { createTestLogger } from '../../test/test-logger.js';
import { AuthenticationService } from './authentication.js';
import { CookieAuthenticationHandler } from './cookie-auth.js';
import { createClaim, createPrincipal } from './principal.js';

const log = createTestLogger({ suite: 'AuthenticationService' });

const cookieHandler = new CookieAuthenticationHandler({
  log,
  scheme: 'Cookie',
  secret: 'test-secret',
});

const principal = createPrincipal(
  [createClaim(claimTypes.name, 'John', 'test-issuer')],
  'Cookie',
);

describe('AuthenticationService', () => {
  it('should authenticate requests with the default scheme', async () => {
    const service = new AuthenticationService({
      log,
      handlers: [cookieHandler],
      defaultScheme: 'Cookie',
    });
    const signInCtx = createTestContext();
    await service.signIn(signInCtx, 'Cookie', principal);
    const [cookie] = signInCtx.response.toResponse().cookies;
    const token = cookie.kind === 'set' ? cookie.value : '';

    const ctx = createTestContext({ cookies: { Cookie: token } });
    await service.authenticate(ctx);

    assert.equal(ctx.user?.name, 'John');
  });

  it('should leave requests anonymous without a default scheme', async () => {
    const service = new AuthenticationService({
      log,
      handlers: [cookieHandler],
    });
    const ctx = createTestContext({ cookies: { Cookie: 'anything' } });

    await service.authenticate(ctx);

    assert.equal(ctx.user, undefined);
  });

  it('should reject an unknown scheme', async () => {
    const service = new AuthenticationService({
      log,
      handlers: [cookieHandler],
    });

    await assert.rejects(
      service.signOut(createTestContext(), 'Bearer'),
      {
        message:
          "No authentication handler is registered for the scheme 'Bearer'.",
      },
    );
  });

  it('should reject an unknown default scheme at construction', () => {
    assert.throws(
      () =>
        new AuthenticationService({
          log,
          handlers: [cookieHandler],
          defaultScheme: 'Bearer',
        }),
      {
        message:
          "No authentication handler is registered for the scheme 'Bearer'.",
      },
    );
  });
});
