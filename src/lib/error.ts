/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

interface DetailedErrorOptions {
  stack?: string;
  [key: string]: unknown;
}

/**
 * Error carrying structured context alongside its message. The extra
 * properties end up in log metadata; only `message` is ever sent to clients.
 */
export class DetailedError extends Error {
  [key: string]: unknown;

  constructor(message: string, options?: DetailedErrorOptions) {
    super(message);
    this.name = this.constructor.name;
    Object.assign(this, options);
    this.stack = options?.stack ?? new Error().stack;
  }

  toJSON(): Record<string, unknown> {
    const { name: _name, message: _message, ...rest } = this;
    return {
      message: this.message,
      stack: this.stack,
      ...rest,
    };
  }
}

export class AbortError extends DetailedError {
  constructor(
    message = 'The operation was aborted',
    options?: DetailedErrorOptions,
  ) {
    super(message, options);
  }
}

export function isError(value: unknown): value is Error {
  return value instanceof Error;
}

/**
 * Normalizes thrown values so the error boundary always has a message and a
 * stack to work with.
 */
export function toError(value: unknown): Error {
  if (isError(value)) {
    return value;
  }
  return new DetailedError(
    typeof value === 'string'
      ? value
      : `Non-error value thrown: ${String(value)}`,
    { thrown: value },
  );
}
