/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import {
  createLoginHandler,
  logoutHandler,
  userHandler,
} from '../handlers/account.js';
import { submitCar } from '../handlers/cars.js';
import {
  largeFileUploadHandler,
  smallFileUploadHandler,
} from '../handlers/uploads.js';
import { requiresAuthentication, requiresRole } from '../pipeline/auth.js';
import {
  GET,
  HttpHandler,
  POST,
  choose,
  htmlString,
  htmlView,
  pipe,
  route,
  setStatusCode,
  text,
  warbler,
} from '../pipeline/handlers.js';
import { routef } from '../pipeline/routef.js';
import { personView } from '../views/views.js';

export const accessDenied = pipe(setStatusCode(401), text('Access Denied'));

export const mustBeUser = requiresAuthentication(accessDenied);

export const mustBeAdmin = pipe(
  requiresAuthentication(accessDenied),
  requiresRole('Admin', accessDenied),
);

export function showUserHandler(id: number): HttpHandler {
  return pipe(mustBeAdmin, text(`User ID: ${id}`));
}

export interface WebAppOptions {
  claimsIssuer: string;
  clock?: () => Date;
}

const formatTime = (date: Date) => date.toISOString();

/**
 * Builds the route table. Pipelines are tried in order; requests no pipeline
 * accepts get the router's 404.
 */
export function createWebApp({
  claimsIssuer,
  clock = () => new Date(),
}: WebAppOptions): readonly HttpHandler[] {
  // Captured once: /once keeps answering with the construction time
  const builtAt = formatTime(clock());

  return Object.freeze([
    pipe(
      GET,
      choose([
        pipe(route('/'), text('index')),
        pipe(route('/ping'), text('pong')),
        pipe(route('/error'), async () => {
          throw new Error('Something went wrong!');
        }),
        pipe(route('/login'), createLoginHandler(claimsIssuer)),
        pipe(route('/logout'), logoutHandler),
        pipe(route('/user'), mustBeUser, userHandler),
        routef('/user/%i', showUserHandler),
        pipe(route('/razor'), htmlView('Person', { Name: 'Razor' })),
        pipe(route('/razorHello'), htmlView('Hello', '')),
        pipe(route('/fileupload'), htmlView('FileUpload', '')),
        pipe(route('/person'), htmlString(personView({ Name: 'Html Node' }))),
        pipe(route('/once'), text(builtAt)),
        pipe(
          route('/everytime'),
          warbler(() => text(formatTime(clock()))),
        ),
      ]),
    ),
    pipe(
      POST,
      choose([
        pipe(route('/small-upload'), smallFileUploadHandler),
        pipe(route('/large-upload'), largeFileUploadHandler),
      ]),
    ),
    pipe(route('/car'), submitCar),
  ]);
}
