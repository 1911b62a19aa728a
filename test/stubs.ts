/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import type { Authentication, Principal } from '../src/auth/types.js';
import {
  FormCollection,
  FormFeature,
  HttpContext,
} from '../src/pipeline/context.js';
import { ViewRegistry } from '../src/views/view-engine.js';
import { createTestLogger } from './test-logger.js';

export class StubFormFeature implements FormFeature {
  readonly hasFormContentType: boolean;
  private form: FormCollection;

  constructor({
    hasFormContentType = true,
    form = { fields: {}, files: [] },
  }: { hasFormContentType?: boolean; form?: FormCollection } = {}) {
    this.hasFormContentType = hasFormContentType;
    this.form = form;
  }

  async readForm(): Promise<FormCollection> {
    return this.form;
  }

  async streamForm(): Promise<FormCollection> {
    return this.form;
  }
}

export class StubAuthentication implements Authentication {
  signIns: { scheme: string; principal: Principal }[] = [];
  signOuts: string[] = [];

  async authenticate(): Promise<void> {
    return;
  }

  async signIn(
    _ctx: HttpContext,
    scheme: string,
    principal: Principal,
  ): Promise<void> {
    this.signIns.push({ scheme, principal });
  }

  async signOut(_ctx: HttpContext, scheme: string): Promise<void> {
    this.signOuts.push(scheme);
  }
}

export function createTestContext({
  method = 'GET',
  path = '/',
  headers = {},
  query = {},
  cookies = {},
  user,
  form = new StubFormFeature(),
  json,
  authentication = new StubAuthentication(),
  views = new ViewRegistry(),
}: {
  method?: string;
  path?: string;
  headers?: Record<string, string>;
  query?: Record<string, string>;
  cookies?: Record<string, string>;
  user?: Principal;
  form?: FormFeature;
  json?: unknown;
  authentication?: Authentication;
  views?: ViewRegistry;
} = {}): HttpContext {
  return new HttpContext({
    request: {
      method,
      path,
      query,
      headers,
      cookies,
      secure: false,
      signal: new AbortController().signal,
      form,
      readJson: async () => json,
    },
    services: {
      log: createTestLogger({ suite: 'HttpContext' }),
      authentication,
      views,
    },
    user,
  });
}
