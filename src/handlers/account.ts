/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { createClaim, createPrincipal } from '../auth/principal.js';
import { authScheme, claimTypes } from '../constants.js';
import { signIn, signOff } from '../pipeline/auth.js';
import { HttpHandler, pipe, text } from '../pipeline/handlers.js';

/**
 * Signs in a fixed demonstration user. No credentials are checked.
 */
export function createLoginHandler(issuer: string): HttpHandler {
  const principal = createPrincipal(
    [
      createClaim(claimTypes.name, 'John', issuer),
      createClaim(claimTypes.surname, 'Doe', issuer),
      createClaim(claimTypes.role, 'Admin', issuer),
    ],
    authScheme,
  );
  return pipe(signIn(authScheme, principal), text('Successfully logged in'));
}

export const logoutHandler: HttpHandler = pipe(
  signOff(authScheme),
  text('Successfully logged out.'),
);

export const userHandler: HttpHandler = async (next, ctx) =>
  text(ctx.user?.name ?? '')(next, ctx);
