/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import type { HttpResponse } from './context.js';

/**
 * Outcome of evaluating a handler pipeline.
 *
 * - `matched`: the pipeline applied and produced a response.
 * - `unmatched`: the pipeline does not apply (wrong verb, path, ...), the
 *   caller should try the next alternative.
 * - `denied`: the pipeline applied but a guard refused the request. Unlike
 *   `unmatched` this ends the search with the attached response.
 */
export type HandlerResult = Matched | Unmatched | Denied;

export interface Matched {
  readonly kind: 'matched';
  readonly response: HttpResponse;
}

export interface Unmatched {
  readonly kind: 'unmatched';
}

export interface Denied {
  readonly kind: 'denied';
  readonly response: HttpResponse;
}

export const unmatched: Unmatched = Object.freeze({ kind: 'unmatched' });

export function matched(response: HttpResponse): Matched {
  return { kind: 'matched', response };
}

export function denied(response: HttpResponse): Denied {
  return { kind: 'denied', response };
}

export function isHandled(result: HandlerResult): result is Matched | Denied {
  return result.kind !== 'unmatched';
}
