/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { AuthenticationService } from './auth/authentication.js';
import { CookieAuthenticationHandler } from './auth/cookie-auth.js';
import * as config from './config.js';
import { authScheme } from './constants.js';
import log from './log.js';
import { createWebApp } from './routes/web-app.js';
import { createViewEngine } from './views/views.js';

export const cookieAuthenticationHandler = new CookieAuthenticationHandler({
  log,
  scheme: authScheme,
  secret: config.SESSION_SECRET,
  expireDays: config.AUTH_COOKIE_EXPIRE_DAYS,
  slidingExpiration: true,
});

export const authentication = new AuthenticationService({
  log,
  handlers: [cookieAuthenticationHandler],
  defaultScheme: authScheme,
});

export const views = createViewEngine();

export const routes = createWebApp({ claimsIssuer: config.CLAIMS_ISSUER });
