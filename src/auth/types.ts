/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import type { HttpContext } from '../pipeline/context.js';

export interface Claim {
  type: string;
  value: string;
  valueType: string;
  issuer: string;
}

export interface Principal {
  /** Value of the first name claim */
  readonly name: string | undefined;
  /** Scheme that authenticated the principal */
  readonly authenticationType: string;
  readonly claims: readonly Claim[];
  readonly roles: ReadonlySet<string>;
}

/**
 * One authentication scheme (session cookie, bearer token, ...).
 */
export interface AuthenticationHandler {
  readonly scheme: string;
  authenticate(ctx: HttpContext): Promise<Principal | undefined>;
  signIn(ctx: HttpContext, principal: Principal): Promise<void>;
  signOut(ctx: HttpContext): Promise<void>;
}

export interface Authentication {
  /** Resolves the principal of the request using the default scheme. */
  authenticate(ctx: HttpContext): Promise<void>;
  signIn(ctx: HttpContext, scheme: string, principal: Principal): Promise<void>;
  signOut(ctx: HttpContext, scheme: string): Promise<void>;
}
