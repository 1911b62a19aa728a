/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import type { Logger } from 'winston';

import type { Authentication, Principal } from '../auth/types.js';
import type { ViewEngine } from '../views/view-engine.js';

export interface CookieOptions {
  httpOnly?: boolean;
  secure?: boolean;
  sameSite?: 'lax' | 'strict' | 'none';
  path?: string;
  maxAge?: number; // milliseconds
}

export type CookieOperation =
  | { kind: 'set'; name: string; value: string; options: CookieOptions }
  | { kind: 'clear'; name: string; options: CookieOptions };

export interface UploadedFile {
  fieldName: string;
  fileName: string;
  contentType: string;
  size: number;
  // Only present for buffered reads
  content?: Buffer;
}

export interface FormCollection {
  fields: Record<string, string>;
  files: UploadedFile[];
}

/**
 * Access to a request body sent as `application/x-www-form-urlencoded` or
 * `multipart/form-data`. A body can only be consumed once: after `readForm`
 * resolves, `streamForm` returns the same collection.
 */
export interface FormFeature {
  readonly hasFormContentType: boolean;
  /** Buffers the whole form, file contents included. */
  readForm(): Promise<FormCollection>;
  /** Reads the form as it arrives, counting file bytes without keeping them. */
  streamForm(signal: AbortSignal): Promise<FormCollection>;
}

export interface RequestState {
  readonly method: string;
  readonly path: string;
  readonly query: Readonly<Record<string, string>>;
  readonly headers: Readonly<Record<string, string | undefined>>;
  readonly cookies: Readonly<Record<string, string>>;
  readonly secure: boolean;
  readonly signal: AbortSignal;
  readonly form: FormFeature;
  readJson(): Promise<unknown>;
}

export interface HttpResponse {
  readonly statusCode: number;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: string | undefined;
  readonly cookies: readonly CookieOperation[];
}

export class ResponseState {
  statusCode = 200;
  body: string | undefined;
  // Keyed by lower-cased name, keeps the name as first written
  private headers = new Map<string, [string, string]>();
  private cookies: CookieOperation[] = [];

  setHeader(name: string, value: string) {
    this.headers.set(name.toLowerCase(), [name, value]);
  }

  getHeader(name: string): string | undefined {
    return this.headers.get(name.toLowerCase())?.[1];
  }

  setCookie(name: string, value: string, options: CookieOptions) {
    this.cookies.push({ kind: 'set', name, value, options });
  }

  clearCookie(name: string, options: CookieOptions) {
    this.cookies.push({ kind: 'clear', name, options });
  }

  clear() {
    this.statusCode = 200;
    this.body = undefined;
    this.headers.clear();
    this.cookies = [];
  }

  toResponse(): HttpResponse {
    return {
      statusCode: this.statusCode,
      headers: Object.fromEntries(this.headers.values()),
      body: this.body,
      cookies: [...this.cookies],
    };
  }
}

export interface HttpServices {
  log: Logger;
  authentication: Authentication;
  views: ViewEngine;
}

/**
 * Per-request state threaded through handler pipelines. Handlers read the
 * request and the authenticated principal and write to `response`.
 */
export class HttpContext {
  readonly request: RequestState;
  readonly response = new ResponseState();
  readonly services: HttpServices;
  user: Principal | undefined;

  constructor({
    request,
    services,
    user,
  }: {
    request: RequestState;
    services: HttpServices;
    user?: Principal;
  }) {
    this.request = request;
    this.services = services;
    this.user = user;
  }

  get log(): Logger {
    return this.services.log;
  }
}
