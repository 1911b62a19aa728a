/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as winston from 'winston';

import { DetailedError } from '../lib/error.js';
import type { HttpContext } from '../pipeline/context.js';
import type {
  Authentication,
  AuthenticationHandler,
  Principal,
} from './types.js';

/**
 * Dispatches sign-in and sign-out to the handler registered for a scheme and
 * authenticates every request with the default scheme.
 */
export class AuthenticationService implements Authentication {
  private log: winston.Logger;
  private handlers: Map<string, AuthenticationHandler>;
  private defaultScheme: string | undefined;

  constructor({
    log,
    handlers,
    defaultScheme,
  }: {
    log: winston.Logger;
    handlers: AuthenticationHandler[];
    defaultScheme?: string;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.handlers = new Map(
      handlers.map((handler) => [handler.scheme, handler]),
    );
    this.defaultScheme = defaultScheme;

    if (defaultScheme !== undefined) {
      this.getHandler(defaultScheme);
    }
  }

  async authenticate(ctx: HttpContext): Promise<void> {
    if (this.defaultScheme === undefined) {
      return;
    }

    ctx.user = await this.getHandler(this.defaultScheme).authenticate(ctx);
    if (ctx.user !== undefined) {
      this.log.debug('Request authenticated', {
        scheme: this.defaultScheme,
        name: ctx.user.name,
      });
    }
  }

  async signIn(
    ctx: HttpContext,
    scheme: string,
    principal: Principal,
  ): Promise<void> {
    await this.getHandler(scheme).signIn(ctx, principal);
    this.log.info('Signed in', { scheme, name: principal.name });
  }

  async signOut(ctx: HttpContext, scheme: string): Promise<void> {
    await this.getHandler(scheme).signOut(ctx);
    this.log.info('Signed out', { scheme, name: ctx.user?.name });
  }

  private getHandler(scheme: string): AuthenticationHandler {
    const handler = this.handlers.get(scheme);
    if (handler === undefined) {
      throw new DetailedError(
        `No authentication handler is registered for the scheme '${scheme}'.`,
        { registeredSchemes: [...this.handlers.keys()] },
      );
    }
    return handler;
  }
}
