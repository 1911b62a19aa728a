/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

/**
 * Authentication scheme of the session cookie. The scheme name doubles as the
 * cookie name.
 */
export const authScheme = 'Cookie';

export const contentTypes = {
  text: 'text/plain; charset=utf-8',
  html: 'text/html; charset=utf-8',
  json: 'application/json; charset=utf-8',
};

export const headerNames = {
  contentType: 'Content-Type',
  location: 'Location',
};

/**
 * Claim type URIs, matching the identifiers used by WS-Federation style claim
 * sets so tokens stay readable by other stacks.
 */
export const claimTypes = {
  name: 'http://schemas.xmlsoap.org/ws/2005/05/identity/claims/name',
  surname: 'http://schemas.xmlsoap.org/ws/2005/05/identity/claims/surname',
  role: 'http://schemas.microsoft.com/ws/2008/06/identity/claims/role',
};

export const claimValueTypes = {
  string: 'http://www.w3.org/2001/XMLSchema#string',
};
