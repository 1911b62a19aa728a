/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { isInRole } from '../auth/principal.js';
import type { Principal } from '../auth/types.js';
import { HttpHandler, shortCircuit } from './handlers.js';

/**
 * Passes when the request carries a principal satisfying `policy`, otherwise
 * stops the pipeline with the outcome of `onFail`.
 */
export function requiresAuthPolicy(
  policy: (user: Principal) => boolean,
  onFail: HttpHandler,
): HttpHandler {
  return async (next, ctx) => {
    if (ctx.user !== undefined && policy(ctx.user)) {
      return next(ctx);
    }

    ctx.log.debug('Authorization failed', {
      method: ctx.request.method,
      path: ctx.request.path,
      name: ctx.user?.name,
    });
    return shortCircuit(onFail, ctx);
  };
}

export function requiresAuthentication(onFail: HttpHandler): HttpHandler {
  return requiresAuthPolicy(() => true, onFail);
}

export function requiresRole(role: string, onFail: HttpHandler): HttpHandler {
  return requiresAuthPolicy((user) => isInRole(user, role), onFail);
}

export function requiresRoleOf(
  roles: readonly string[],
  onFail: HttpHandler,
): HttpHandler {
  return requiresAuthPolicy(
    (user) => roles.some((role) => isInRole(user, role)),
    onFail,
  );
}

export function signIn(scheme: string, principal: Principal): HttpHandler {
  return async (next, ctx) => {
    await ctx.services.authentication.signIn(ctx, scheme, principal);
    return next(ctx);
  };
}

export function signOff(scheme: string): HttpHandler {
  return async (next, ctx) => {
    await ctx.services.authentication.signOut(ctx, scheme);
    return next(ctx);
  };
}
