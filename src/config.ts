/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as env from './lib/env.js';

//
// HTTP server
//

// HTTP server port
export const PORT = env.numberOrDefault('PORT', 5000);

// Honour X-Forwarded-* headers (needed for secure cookies behind a proxy)
export const TRUST_PROXY = env.booleanOrDefault('TRUST_PROXY', false);

//
// Authentication
//

// Secret used to sign session tokens
export const SESSION_SECRET = env.varOrRandom('SESSION_SECRET');

// Session cookie lifetime, renewed while in use (sliding expiration)
export const AUTH_COOKIE_EXPIRE_DAYS = env.numberOrDefault(
  'AUTH_COOKIE_EXPIRE_DAYS',
  7,
);

// Issuer recorded on the claims granted at login
export const CLAIMS_ISSUER = env.varOrDefault(
  'CLAIMS_ISSUER',
  'http://localhost:5000',
);

//
// Uploads
//

// Per-file limit for buffered (small) uploads
export const MAX_UPLOAD_FILE_SIZE_BYTES = env.numberOrDefault(
  'MAX_UPLOAD_FILE_SIZE_BYTES',
  10 * 1024 * 1024,
);
