/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import jwt from 'jsonwebtoken';
import * as winston from 'winston';
import { z } from 'zod';

import type { CookieOptions, HttpContext } from '../pipeline/context.js';
import { claimSchema, createPrincipal } from './principal.js';
import type { AuthenticationHandler, Principal } from './types.js';

const DAY_SECONDS = 24 * 60 * 60;

const sessionTokenSchema = z.object({
  claims: z.array(claimSchema),
  iat: z.number(),
  exp: z.number(),
});

/**
 * Session cookie authentication. The principal's claims travel in a signed
 * token stored in a cookie named after the scheme.
 *
 * With sliding expiration enabled, a cookie past half of its lifetime is
 * re-issued on the next authenticated request.
 */
export class CookieAuthenticationHandler implements AuthenticationHandler {
  readonly scheme: string;
  private log: winston.Logger;
  private secret: string;
  private expireSeconds: number;
  private slidingExpiration: boolean;
  private now: () => number;

  constructor({
    log,
    scheme,
    secret,
    expireDays = 7,
    slidingExpiration = true,
    now = Date.now,
  }: {
    log: winston.Logger;
    scheme: string;
    secret: string;
    expireDays?: number;
    slidingExpiration?: boolean;
    now?: () => number;
  }) {
    this.log = log.child({ class: this.constructor.name, scheme });
    this.scheme = scheme;
    this.secret = secret;
    this.expireSeconds = Math.round(expireDays * DAY_SECONDS);
    this.slidingExpiration = slidingExpiration;
    this.now = now;
  }

  get cookieName(): string {
    return this.scheme;
  }

  async authenticate(ctx: HttpContext): Promise<Principal | undefined> {
    const token = ctx.request.cookies[this.cookieName];
    if (token === undefined || token === '') {
      return undefined;
    }

    const nowSeconds = this.nowSeconds();
    let session: z.infer<typeof sessionTokenSchema>;
    try {
      session = sessionTokenSchema.parse(
        jwt.verify(token, this.secret, {
          algorithms: ['HS256'],
          clockTimestamp: nowSeconds,
        }),
      );
    } catch (error: unknown) {
      this.log.debug('Rejected session cookie', {
        error: error instanceof Error ? error.message : String(error),
      });
      ctx.response.clearCookie(this.cookieName, this.cookieOptions(ctx));
      return undefined;
    }

    const principal = createPrincipal(session.claims, this.scheme);

    if (
      this.slidingExpiration &&
      session.exp - nowSeconds < this.expireSeconds / 2
    ) {
      this.log.debug('Renewing session cookie', { name: principal.name });
      this.issue(ctx, principal, nowSeconds);
    }

    return principal;
  }

  async signIn(ctx: HttpContext, principal: Principal): Promise<void> {
    this.issue(ctx, principal, this.nowSeconds());
  }

  async signOut(ctx: HttpContext): Promise<void> {
    ctx.response.clearCookie(this.cookieName, this.cookieOptions(ctx));
  }

  private issue(ctx: HttpContext, principal: Principal, nowSeconds: number) {
    const token = jwt.sign(
      { claims: principal.claims, iat: nowSeconds },
      this.secret,
      { algorithm: 'HS256', expiresIn: this.expireSeconds },
    );
    ctx.response.setCookie(this.cookieName, token, {
      ...this.cookieOptions(ctx),
      maxAge: this.expireSeconds * 1000,
    });
  }

  private cookieOptions(ctx: HttpContext): CookieOptions {
    return {
      httpOnly: true,
      secure: ctx.request.secure,
      sameSite: 'lax',
      path: '/',
    };
  }

  private nowSeconds(): number {
    return Math.floor(this.now() / 1000);
  }
}
